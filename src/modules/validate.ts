/**
 * Validate Module
 * Runs the pre-flight suite; any failure aborts the build before scheduling
 */

import type { BuildContext } from "../types";

export async function validate(ctx: BuildContext): Promise<void> {
  await ctx.validator.preflight(ctx.config);
}
