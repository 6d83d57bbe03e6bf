/**
 * Clean Module
 * Removes previous build output and recreates the temp directory
 */

import { mkdir, rm } from "fs/promises";
import { resolve } from "node:path";
import type { BuildContext } from "../types";

export async function clean(ctx: BuildContext): Promise<void> {
  const { outputDir, distDir, tempDir } = ctx.config.build;

  for (const directory of [outputDir, distDir, tempDir]) {
    const path = resolve(directory);
    await rm(path, { recursive: true, force: true });
    ctx.logger.debug(`Removed ${path}`);
  }

  await mkdir(resolve(tempDir), { recursive: true });
}
