import { homedir } from "node:os";
import path from "node:path";

/**
 * Expand a leading "~" to the home directory
 * Only "~" on its own or followed by a separator is expanded ("~user" is left alone)
 */
export function expandHome(filePath: string): string {
  if (filePath === "~") {
    return homedir();
  }
  if (filePath.startsWith("~/") || filePath.startsWith(`~${path.sep}`)) {
    return path.join(homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Resolve a user-supplied path to an absolute, normalized path
 * Does not check that the path exists (output directories may not yet)
 *
 * @example
 * resolvePath("~/astro/night-1") // "/home/me/astro/night-1"
 * resolvePath("lights/../darks", "/data") // "/data/darks"
 */
export function resolvePath(
  filePath: string,
  cwd: string = process.cwd(),
): string {
  return path.resolve(cwd, expandHome(filePath));
}
