/**
 * Pipeline context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { SirilClient } from "./siril";
import type { MergeResult } from "./pipeline";
import type { DirectoryScope } from "../utils/directory-scope";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

export interface PipelineContext {
  // Input - resolved at initialization
  sessionPaths: string[]; // Absolute session roots, in merge order
  outputPath: string; // Absolute output directory
  calibrateScript: string; // Resolved when each session is calibrated
  stackScript: string; // Resolved when stacking starts
  processDir: string;
  seqName: string;
  sort: boolean;
  verbose?: boolean;
  logPath?: string; // Siril transcript, when one is being captured

  // Collaborators
  siril: SirilClient;
  scope: DirectoryScope; // Shared by every phase that talks to Siril
  logger: Logger;
  tracker: Tracker;

  // Merger fills this
  merge?: MergeResult;
}
