/**
 * Calibrator Module
 * Runs the calibration script for one session, with Siril inside that session
 */

import { resolvePath } from "../utils";
import type { PipelineContext } from "../types";

export async function calibrate(
  ctx: PipelineContext,
  sessionPath: string,
): Promise<void> {
  const script = resolvePath(ctx.calibrateScript);

  await ctx.scope.within(sessionPath, () => ctx.siril.runScript(script));

  ctx.tracker.incrementCalibrated();
  ctx.logger.debug(`Calibrated ${sessionPath} with ${script}`);
}
