/**
 * Dist command - ZIP each built format directory
 */

import ora from "ora";
import { z } from "zod";
import type { Command } from "commander";
import { createDistributions } from "../../modules";
import { fail, globalOptions, openSession } from "../shared";

const DistOptionsSchema = z.object({
  buildDir: z.string().optional(),
  distDir: z.string().optional(),
});

type Options = z.infer<typeof DistOptionsSchema>;

export async function distCommand(opts: Options, command: Command): Promise<void> {
  const options = DistOptionsSchema.parse(opts);
  const globals = globalOptions(command);
  const spinner = ora({ text: "Packaging...", indent: 2 }).start();

  try {
    const { config, logger } = await openSession(globals);
    const archives = await createDistributions(
      options.buildDir ?? config.build.outputDir,
      options.distDir ?? config.build.distDir,
      config.template.artifactName,
      logger,
    );
    spinner.succeed(`Created ${archives.length} archive(s)`);
  } catch (error) {
    fail(spinner, "Packaging failed", error, globals.verbose);
  }
}
