/**
 * Directory Scope
 * Siril keeps a single "current directory" for every command it runs.
 * DirectoryScope owns that state for one client: it changes into a target
 * directory for the duration of an operation and always changes back.
 */

import type { SirilClient } from "../types/siril";
import { resolvePath } from "./resolve-path";

export class DirectoryScope {
  private directory: string;

  /**
   * @param initial - Directory Siril starts in (it inherits ours when launched)
   */
  constructor(
    private client: SirilClient,
    initial: string = process.cwd(),
  ) {
    this.directory = resolvePath(initial);
  }

  /**
   * Directory Siril is currently in, as far as this scope knows
   */
  get current(): string {
    return this.directory;
  }

  /**
   * Run an operation with Siril's directory set to `target`
   *
   * The previous directory is restored on every exit path, including when
   * the operation rejects. If changing into `target` fails the operation is
   * not run and nothing is restored.
   */
  async within<T>(target: string, operation: () => Promise<T>): Promise<T> {
    const saved = this.directory;
    const resolved = resolvePath(target);

    await this.client.changeDirectory(resolved);
    this.directory = resolved;

    try {
      return await operation();
    } finally {
      await this.client.changeDirectory(saved);
      this.directory = saved;
    }
  }
}
