/**
 * Transcript Log
 * File sink for everything Siril prints during a run
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { once } from "node:events";
import path from "node:path";

export const TRANSCRIPT_FILENAME = "siril-mulit-night.log";

export class TranscriptLog {
  private failure: Error | undefined;

  private constructor(
    readonly path: string,
    private writeStream: WriteStream,
  ) {
    // A failed write (ENOSPC, EIO) is kept and reported by close()
    writeStream.on("error", (error) => {
      this.failure ??= error;
    });
  }

  /**
   * Create (or truncate) the transcript in the output directory
   */
  static async open(outputDir: string): Promise<TranscriptLog> {
    const filepath = path.join(outputDir, TRANSCRIPT_FILENAME);
    const stream = createWriteStream(filepath, { flags: "w", encoding: "utf-8" });
    await once(stream, "open");
    return new TranscriptLog(filepath, stream);
  }

  get stream(): WriteStream {
    return this.writeStream;
  }

  get closed(): boolean {
    return this.writeStream.closed;
  }

  /**
   * First write error, if any
   */
  get error(): Error | undefined {
    return this.failure;
  }

  /**
   * Flush and close the file; rejects with the first write error
   */
  async close(): Promise<void> {
    if (!this.writeStream.closed) {
      if (!this.writeStream.destroyed) {
        this.writeStream.end();
      }
      try {
        await once(this.writeStream, "close");
      } catch (error) {
        if (error instanceof Error) this.failure ??= error;
      }
    }

    if (this.failure) {
      throw this.failure;
    }
  }
}
