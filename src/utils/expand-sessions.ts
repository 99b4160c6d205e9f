/**
 * Session argument expansion
 * Lets --sessions take glob patterns ("~/astro/m31/night-*") next to plain paths
 */

import glob from "fast-glob";
import { resolvePath } from "./resolve-path";
import { assertUniqueSessions } from "./unique-sessions";

/**
 * Expand session arguments into absolute directory paths
 *
 * Plain paths are resolved as given. Patterns expand to matching directories,
 * sorted so that nights named by date calibrate and merge in date order.
 * A pattern that matches nothing is an error, and so is a directory reached twice.
 */
export async function expandSessions(
  inputs: string[],
  cwd: string = process.cwd(),
): Promise<string[]> {
  const sessions: string[] = [];

  for (const input of inputs) {
    const resolved = resolvePath(input, cwd);

    if (!glob.isDynamicPattern(input)) {
      sessions.push(resolved);
      continue;
    }

    const matches = await glob(toPattern(resolved), {
      onlyDirectories: true,
      absolute: true,
    });

    if (matches.length === 0) {
      throw new Error(`No session directories match pattern: ${input}`);
    }

    sessions.push(...matches.sort());
  }

  assertUniqueSessions(sessions);
  return sessions;
}

// fast-glob wants forward slashes, even on Windows
function toPattern(resolved: string): string {
  return resolved.replace(/\\/g, "/");
}
