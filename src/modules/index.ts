/**
 * Pipeline modules export
 */

export { calibrate } from "./calibrator";
export { merge, mergeSessions } from "./merger";
export type { MergeSessionsOptions } from "./merger";
export { stack } from "./stacker";
export { stats } from "./stats";
