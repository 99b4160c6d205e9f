/**
 * Logger Utility
 * Handles operator-facing output with different log levels
 *
 * Output goes to an injected sink so Siril's own transcript (see TranscriptLog)
 * and the operator channel never share a stream.
 */

import type { LogLevel } from "../types/config";

export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private sink: LogSink = console,
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.sink.log(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.sink.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.sink.warn(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: Error): void {
    this.sink.error(`[ERROR] ${message}`);
    if (error) {
      this.sink.error(error.stack ?? error.message);
    }
  }
}
