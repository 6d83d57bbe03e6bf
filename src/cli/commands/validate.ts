/**
 * Validate command - Pre-flight suite only
 */

import ora from "ora";
import type { Command } from "commander";
import { Validator } from "../../validator";
import { fail, globalOptions, openSession } from "../shared";

export async function validateCommand(_opts: unknown, command: Command): Promise<void> {
  const globals = globalOptions(command);
  const spinner = ora({ text: "Validating template...", indent: 2 }).start();

  try {
    const { config, logger } = await openSession(globals);
    await new Validator(logger).preflight(config);
    spinner.succeed("Pre-flight validation passed");
  } catch (error) {
    fail(spinner, "Validation failed", error, globals.verbose);
  }
}
