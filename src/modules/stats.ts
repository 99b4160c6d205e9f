/**
 * Stats Module
 * Displays the run summary once the pipeline is done
 */

import chalk from "chalk";
import { ZodError } from "zod";
import type { ConfigError, PipelineContext, ProcessingStats } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Human-readable run duration: "250ms", "1.50s", "2m 5s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const totalSeconds = Math.round(ms / 1000);
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

type Paint = (text: string) => string;

// Label column is 18 wide so counts and paths line up
function label(text: string): string {
  return chalk.dim(text.padEnd(18));
}

function countRow(paint: Paint, name: string, count: number, icon = "◉"): string {
  return `   ${paint(icon)} ${label(name)} ${paint(String(count))}`;
}

function pathRow(name: string, filePath: string): string {
  return `   ${chalk.dim("→")} ${label(name)} ${filePath}`;
}

function printSection(title: string): void {
  console.log(`\n  ${chalk.bold(title)}`);
}

function describeConfigError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((e) => e.message).join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display run statistics to console
 */
export async function stats(ctx: PipelineContext): Promise<void> {
  const { tracker, verbose } = ctx;
  const stats = tracker.getStats();
  const configErrors = tracker.getConfigErrors();

  console.log("");

  const statusIcon =
    configErrors.length > 0 ? chalk.yellow("◆") : chalk.green("✔");
  console.log(
    `  ${statusIcon} ${chalk.bold("Sessions Stacked")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displaySessionsSection(stats, verbose);
  displayOutputSection(ctx);
  displayConfigSection(configErrors);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displaySessionsSection(
  stats: ProcessingStats,
  verbose?: boolean,
): void {
  printSection("Sessions");

  console.log(countRow(chalk.green, "Calibrated", stats.sessionsCalibrated));
  console.log(countRow(chalk.cyan, "Merged files", stats.totalFiles));

  const empty = stats.sessions.filter((s) => s.files === 0);
  if (empty.length > 0) {
    console.log(countRow(chalk.yellow, "Empty sessions", empty.length));
  }

  if (verbose) {
    for (const { sessionPath, files } of stats.sessions) {
      console.log(`      ${chalk.dim("·")} ${sessionPath} ${chalk.dim(`(${files})`)}`);
    }
  }
}

function displayOutputSection(ctx: PipelineContext): void {
  printSection("Output");
  console.log(pathRow("Directory", ctx.outputPath));

  if (ctx.merge) {
    console.log(pathRow("Manifest", ctx.merge.manifestPath));
  }
  if (ctx.logPath) {
    console.log(pathRow("Siril log", ctx.logPath));
  }
}

function displayConfigSection(errors: ConfigError[]): void {
  if (errors.length === 0) {
    return;
  }

  printSection(chalk.yellow("Warnings"));
  console.log(countRow(chalk.yellow, "Config ignored", errors.length, "✖"));
  for (const { path, error } of errors) {
    console.log(`      ${chalk.dim("·")} ${path}`);
    console.log(`        ${chalk.dim(describeConfigError(error))}`);
  }
}
