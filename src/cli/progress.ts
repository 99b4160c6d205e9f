/**
 * Progress text for the operator spinner
 */

import type { PipelineState } from "../types";

export function describeState(state: PipelineState): string {
  switch (state.phase) {
    case "idle":
      return "Initializing...";
    case "calibrating":
      return `Calibrating session ${state.index}/${state.total}: ${state.session} ...`;
    case "merging":
      return "Merging sessions together ...";
    case "stacking":
      return "Stacking merged sessions ...";
    case "done":
      return "Done";
  }
}

export function describeFailure(state: PipelineState | undefined): string {
  if (!state || state.phase === "idle") {
    return "Pipeline failed before starting";
  }
  if (state.phase === "calibrating") {
    return `Calibration failed for session ${state.session}`;
  }
  if (state.phase === "done") {
    return "Pipeline failed after stacking";
  }
  return `Pipeline failed while ${state.phase}`;
}
