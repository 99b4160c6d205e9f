/**
 * Stacker Module
 * Registers and stacks the merged sequence, with Siril inside the output directory
 */

import { resolvePath } from "../utils";
import type { PipelineContext } from "../types";

export async function stack(ctx: PipelineContext): Promise<void> {
  const script = resolvePath(ctx.stackScript);

  await ctx.scope.within(ctx.outputPath, () => ctx.siril.runScript(script));

  ctx.tracker.markStacked();
  ctx.logger.debug(`Stacked ${ctx.outputPath} with ${script}`);
}
