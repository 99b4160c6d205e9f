/**
 * Process command - Loads config, checks inputs and runs the pipeline
 */

import { mkdir } from "fs/promises";
import ora, { type Ora } from "ora";
import { z } from "zod";
import {
  Logger,
  Tracker,
  directoryExists,
  expandSessions,
  fileExists,
  loadConfig,
  resolvePath,
  type LogSink,
} from "../../utils";
import { PipelineOrchestrator } from "../../orchestrator";
import { SirilCliClient, TranscriptLog } from "../../siril";
import * as modules from "../../modules";
import { describeFailure, describeState } from "../progress";

export const ProcessOptionsSchema = z.object({
  sessions: z.array(z.string()).min(1),
  calibrateScript: z.string().min(1),
  stackScript: z.string().min(1),
  output: z.string().min(1),
  processDir: z.string().min(1).optional(),
  seqName: z.string().min(1).optional(),
  sort: z.boolean().optional(),
  siril: z.string().min(1).optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type ProcessOptions = z.infer<typeof ProcessOptionsSchema>;

/**
 * Reject missing inputs before anything touches Siril
 */
export async function checkInputs(
  sessionPaths: string[],
  scripts: string[],
): Promise<void> {
  const missing: string[] = [];

  for (const session of sessionPaths) {
    if (!(await directoryExists(session))) {
      missing.push(`session directory not found: ${session}`);
    }
  }
  for (const script of scripts) {
    if (!(await fileExists(script))) {
      missing.push(`script not found: ${script}`);
    }
  }

  if (missing.length > 0) {
    throw new Error(`Invalid input:\n  ${missing.join("\n  ")}`);
  }
}

// Keep log lines from tearing through the spinner frame
function spinnerSink(spinner: Ora): LogSink {
  const print = (write: (message: string) => void) => (message: string) => {
    const spinning = spinner.isSpinning;
    if (spinning) spinner.clear();
    write(message);
    if (spinning) spinner.render();
  };

  return {
    log: print((m) => console.log(m)),
    warn: print((m) => console.warn(m)),
    error: print((m) => console.error(m)),
  };
}

export async function processCommand(opts: ProcessOptions): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  let orchestrator: PipelineOrchestrator | undefined;
  let transcript: TranscriptLog | undefined;

  try {
    // Validate CLI options
    const options = ProcessOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then CLI overrides
    const { config, errors } = await loadConfig(options.config);
    const tracker = new Tracker();
    for (const err of errors) {
      tracker.trackConfigError(err.path, err.error);
    }

    if (!config.logging.showProgress) {
      spinner.stop();
    }

    const logger = new Logger(
      options.verbose ? "debug" : config.logging.level,
      spinnerSink(spinner),
    );

    const sessionPaths = await expandSessions(options.sessions);
    const calibrateScript = resolvePath(options.calibrateScript);
    const stackScript = resolvePath(options.stackScript);
    await checkInputs(sessionPaths, [calibrateScript, stackScript]);

    // The transcript lives in the output directory, so it must exist first
    const outputPath = resolvePath(options.output);
    await mkdir(outputPath, { recursive: true });
    transcript = await TranscriptLog.open(outputPath);

    const siril = new SirilCliClient({
      binary: options.siril ?? config.siril.binary,
      transcript: transcript.stream,
    });

    orchestrator = new PipelineOrchestrator({
      sessionPaths,
      outputPath,
      calibrateScript,
      stackScript,
      processDir: options.processDir ?? config.merge.processDir,
      seqName: options.seqName ?? config.merge.seqName,
      sort: options.sort ?? config.merge.sort,
      verbose: options.verbose,
      logPath: transcript.path,
      siril,
      logger,
      tracker,
      onTransition: (state) => {
        if (spinner.isSpinning) {
          spinner.text = describeState(state);
        } else {
          logger.info(describeState(state));
        }
      },
    });

    await orchestrator.run();
    await transcript.close();

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(orchestrator.context);
  } catch (error) {
    spinner.fail(describeFailure(orchestrator?.state));
    console.error(error);
    process.exitCode = 1;

    if (transcript && !transcript.closed) {
      await transcript.close().catch((closeError: unknown) => console.error(closeError));
    }
  }
}
