/**
 * Pipeline state and module data types
 */

import type { ConversionManifest } from "../utils/conversion-manifest";

// ============================================================================
// State machine
// ============================================================================

/**
 * Linear run state:
 * idle → calibrating(s1) → … → calibrating(sN) → merging → stacking → done
 */
export type PipelineState =
  | { phase: "idle" }
  | { phase: "calibrating"; session: string; index: number; total: number }
  | { phase: "merging" }
  | { phase: "stacking" }
  | { phase: "done" };

export type PipelinePhase = PipelineState["phase"];

export type TransitionListener = (state: PipelineState) => void;

// ============================================================================
// Merger Module
// ============================================================================

export interface SessionMergeCount {
  sessionPath: string; // Absolute session root
  files: number; // Matched (and copied) files from its process directory
}

export interface MergeResult {
  manifest: ConversionManifest;
  manifestPath: string; // <output>/conversion.txt
  sessions: SessionMergeCount[];
}

// ============================================================================
// Stats Module
// ============================================================================

export interface ProcessingStats {
  sessionsCalibrated: number;
  sessions: SessionMergeCount[];
  totalFiles: number;
  stacked: boolean;
  duration: number; // Milliseconds since the tracker was created
}
