/**
 * Pipeline Orchestrator
 * Sequences calibrate → merge → stack inside one Siril session
 *
 * Errors are not caught here: a failure in any phase aborts the run and
 * leaves whatever was already calibrated or copied on disk.
 */

import { mkdir } from "fs/promises";
import * as modules from "./modules";
import {
  DirectoryScope,
  Logger,
  Tracker,
  assertUniqueSessions,
  resolvePath,
  withSession,
} from "./utils";
import type {
  PipelineContext,
  PipelineState,
  ProcessingStats,
  SirilClient,
  TransitionListener,
} from "./types";

export interface PipelineOptions {
  sessionPaths: string[];
  outputPath: string;
  calibrateScript: string;
  stackScript: string;
  processDir?: string;
  seqName?: string;
  sort?: boolean;
  verbose?: boolean;
  logPath?: string;
  siril: SirilClient;
  logger?: Logger;
  tracker?: Tracker;
  onTransition?: TransitionListener;
}

export class PipelineOrchestrator {
  private current: PipelineState = { phase: "idle" };
  private started = false;
  readonly context: PipelineContext;

  constructor(private options: PipelineOptions) {
    if (options.sessionPaths.length === 0) {
      throw new Error("At least one session path is required");
    }

    const sessionPaths = options.sessionPaths.map((p) => resolvePath(p));
    assertUniqueSessions(sessionPaths);

    this.context = {
      sessionPaths,
      outputPath: resolvePath(options.outputPath),
      calibrateScript: options.calibrateScript,
      stackScript: options.stackScript,
      processDir: options.processDir ?? "process",
      seqName: options.seqName ?? "pp_light",
      sort: options.sort ?? false,
      verbose: options.verbose,
      logPath: options.logPath,
      siril: options.siril,
      scope: new DirectoryScope(options.siril),
      logger: options.logger ?? new Logger(),
      tracker: options.tracker ?? new Tracker(),
    };
  }

  /**
   * Current phase; stays on the failing phase when a run aborts
   */
  get state(): PipelineState {
    return this.current;
  }

  /**
   * Run the pipeline
   * Pure orchestration - each phase lives in its module
   */
  async run(): Promise<ProcessingStats> {
    if (this.started) {
      throw new Error("Pipeline has already been run");
    }
    this.started = true;

    const ctx = this.context;

    await mkdir(ctx.outputPath, { recursive: true });

    await withSession(
      ctx.siril,
      async () => {
        const total = ctx.sessionPaths.length;
        for (const [i, session] of ctx.sessionPaths.entries()) {
          this.transition({ phase: "calibrating", session, index: i + 1, total });
          await modules.calibrate(ctx, session);
        }

        this.transition({ phase: "merging" });
        await modules.merge(ctx);

        this.transition({ phase: "stacking" });
        await modules.stack(ctx);
      },
      ctx.logger,
    );

    this.transition({ phase: "done" });
    return ctx.tracker.getStats();
  }

  private transition(next: PipelineState): void {
    this.current = next;
    this.options.onTransition?.(next);
  }
}
