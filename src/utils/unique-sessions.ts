/**
 * Reject a session listed twice
 * Merging the same directory twice would copy its lights under two numbers
 * while the manifest keeps only one line per original file
 */
export function assertUniqueSessions(sessionPaths: string[]): void {
  const seen = new Set<string>();

  for (const sessionPath of sessionPaths) {
    if (seen.has(sessionPath)) {
      throw new Error(`Session listed more than once: ${sessionPath}`);
    }
    seen.add(sessionPath);
  }
}
