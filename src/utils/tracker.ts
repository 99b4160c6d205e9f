/**
 * Run Tracker
 * Collects statistics while the pipeline runs
 */

import type { ConfigError } from "../types/config";
import type { ProcessingStats, SessionMergeCount } from "../types/pipeline";

export class Tracker {
  private calibratedSessions = 0;
  private mergedSessions: SessionMergeCount[] = [];
  private stackedOutput = false;
  private configErrors: ConfigError[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  incrementCalibrated(): void {
    this.calibratedSessions++;
  }

  setMerged(sessions: SessionMergeCount[]): void {
    this.mergedSessions = [...sessions];
  }

  markStacked(): void {
    this.stackedOutput = true;
  }

  // ============================================================================
  // Config issues (non-fatal, shown as warnings)
  // ============================================================================

  trackConfigError(path: string, error: unknown): void {
    this.configErrors.push({ path, error });
  }

  getConfigErrors(): ConfigError[] {
    return this.configErrors;
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      sessionsCalibrated: this.calibratedSessions,
      sessions: this.mergedSessions,
      totalFiles: this.mergedSessions.reduce((sum, s) => sum + s.files, 0),
      stacked: this.stackedOutput,
      duration,
    };
  }
}
