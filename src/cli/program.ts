/**
 * Command-line program definition
 */

import { Command } from "commander";
import { processCommand, type ProcessOptions } from "./commands/process";
import { configCommand } from "./commands/config";

export interface ProgramActions {
  process: (opts: ProcessOptions) => void | Promise<void>;
  config: () => void | Promise<void>;
}

export function createProgram(
  actions: ProgramActions = { process: processCommand, config: configCommand },
): Command {
  const program = new Command();

  program
    .name("siril-multi-night")
    .description(
      "Calibrate each imaging session with Siril, merge them into one sequence and stack it",
    )
    .version("0.1.0");

  // Main pipeline command (default action)
  // Required inputs are enforced by ProcessOptionsSchema, so `config` still runs without them
  program
    .option("--sessions <paths...>", "Session directories (glob patterns allowed), in merge order")
    .option("--calibrate-script <path>", "Siril calibration script, run once per session")
    .option("--stack-script <path>", "Siril stacking script, run on the merged output")
    .option("-o, --output <path>", "Output directory for the merged sequence")
    .option("-p, --process-dir <name>", "Name of the Siril process directory in each session")
    .option("--seq-name <name>", "Sequence name of the preprocessed light files")
    .option("--sort", "Sort files by name within each session before numbering")
    .option("--siril <binary>", "Siril command-line executable")
    .option("-c, --config <path>", "Path to custom config file")
    .option("-v, --verbose", "Verbose output")
    .action(actions.process);

  // Config command - show config location
  program
    .command("config")
    .description("Show configuration file location")
    .action(actions.config);

  return program;
}
