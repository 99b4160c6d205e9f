export { SirilCliClient } from "./siril-cli-client";
export type { SirilCliClientOptions } from "./siril-cli-client";
export { TranscriptLog, TRANSCRIPT_FILENAME } from "./transcript-log";
export { runProcess } from "./run-process";
export type { RunProcess, RunProcessOptions } from "./run-process";
