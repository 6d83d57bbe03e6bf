/**
 * Test artifacts command - Post-flight validation of built files
 */

import ora from "ora";
import { z } from "zod";
import type { Command } from "commander";
import { Validator } from "../../validator";
import { fail, globalOptions, openSession } from "../shared";

const TestArtifactsOptionsSchema = z.object({
  buildDir: z.string().optional(),
});

type Options = z.infer<typeof TestArtifactsOptionsSchema>;

export async function testArtifactsCommand(opts: Options, command: Command): Promise<void> {
  const options = TestArtifactsOptionsSchema.parse(opts);
  const globals = globalOptions(command);
  const spinner = ora({ text: "Validating artifacts...", indent: 2 }).start();

  try {
    const { config, logger } = await openSession(globals);
    const buildDir = options.buildDir ?? config.build.outputDir;
    await new Validator(logger).validateArtifacts(buildDir);
    spinner.succeed(`Artifacts in ${buildDir} are valid`);
  } catch (error) {
    fail(spinner, "Artifact validation failed", error, globals.verbose);
  }
}
