/**
 * Siril CLI Client
 * Drives the headless siril-cli binary behind the SirilClient interface
 *
 * siril-cli runs one script per invocation, so a "session" here is the span
 * between openSession and closeSession, and the working directory is passed
 * to every invocation with -d.
 */

import type { Writable } from "node:stream";
import type { SirilClient } from "../types";
import { runProcess, type RunProcess } from "./run-process";

export interface SirilCliClientOptions {
  binary?: string; // Default: "siril-cli"
  transcript: Writable; // Receives Siril's stdout and stderr
  run?: RunProcess;
  cwd?: string; // Initial working directory
}

export class SirilCliClient implements SirilClient {
  private binary: string;
  private transcript: Writable;
  private run: RunProcess;
  private directory: string;
  private open = false;
  private transcriptError: Error | undefined;

  constructor(options: SirilCliClientOptions) {
    this.binary = options.binary ?? "siril-cli";
    this.transcript = options.transcript;
    this.transcript.on("error", (error) => {
      this.transcriptError ??= error;
    });
    this.run = options.run ?? runProcess;
    this.directory = options.cwd ?? process.cwd();
  }

  get workingDirectory(): string {
    return this.directory;
  }

  get isOpen(): boolean {
    return this.open;
  }

  async openSession(): Promise<void> {
    if (this.open) {
      throw new Error("Siril session is already open");
    }

    const code = await this.exec(["--version"]);
    if (code !== 0) {
      throw new Error(`Could not start Siril: ${this.binary} --version exited with code ${code}`);
    }
    this.open = true;
  }

  async closeSession(): Promise<void> {
    this.assertOpen();
    this.open = false;
  }

  async changeDirectory(path: string): Promise<void> {
    this.assertOpen();
    this.directory = path;
    this.transcript.write(`> cd ${path}\n`);
  }

  async runScript(path: string): Promise<void> {
    this.assertOpen();

    const code = await this.exec(["-d", this.directory, "-s", path]);
    if (code !== 0) {
      throw new Error(`Siril script ${path} failed in ${this.directory} (exit code ${code})`);
    }
  }

  // A run whose output cannot be recorded fails, before and after Siril runs
  private async exec(args: string[]): Promise<number> {
    this.assertTranscript();
    this.transcript.write(`> ${this.binary} ${args.join(" ")}\n`);
    const code = await this.run(this.binary, args, { output: this.transcript });
    this.assertTranscript();
    return code;
  }

  private assertTranscript(): void {
    if (this.transcriptError) {
      throw new Error(
        `Siril transcript could not be written: ${this.transcriptError.message}`,
        { cause: this.transcriptError },
      );
    }
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new Error("Siril session is not open");
    }
  }
}
