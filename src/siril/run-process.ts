/**
 * Child process runner for the Siril binary
 */

import { spawn } from "node:child_process";
import type { Writable } from "node:stream";

export interface RunProcessOptions {
  output: Writable; // Receives stdout and stderr, left open afterwards
}

/**
 * Resolves with the exit code; rejects only when the process cannot start
 */
export type RunProcess = (
  command: string,
  args: string[],
  options: RunProcessOptions,
) => Promise<number>;

export const runProcess: RunProcess = (command, args, { output }) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

    child.stdout.pipe(output, { end: false });
    child.stderr.pipe(output, { end: false });

    child.once("error", reject);
    child.once("close", (code, signal) => {
      // Killed by a signal: report the conventional shell exit code
      resolve(code ?? (signal ? 128 : 1));
    });
  });
