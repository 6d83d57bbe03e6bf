/**
 * Shared CLI plumbing - global options, config loading and error output
 */

import chalk from "chalk";
import { z } from "zod";
import type { Command } from "commander";
import type { Ora } from "ora";
import { DocMatrixError, Logger, finalizeConfig, loadConfig, mergeConfig } from "../utils";
import type { BuildConfig } from "../types";

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CliSession {
  config: BuildConfig;
  logger: Logger;
  verbose: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  return GlobalOptionsSchema.parse(command.optsWithGlobals());
}

/**
 * Load configuration (default → user → --config → env).
 * --verbose forces debug logging.
 */
export async function openSession(globals: GlobalOptions): Promise<CliSession> {
  const loaded = await loadConfig({ custom: globals.config });
  const config = globals.verbose
    ? finalizeConfig(mergeConfig(loaded.config, { logging: { level: "debug" } }))
    : loaded.config;

  const logger = new Logger(config.logging.level);
  for (const source of loaded.sources) {
    logger.debug(`Loaded configuration from ${source}`);
  }

  return { config, logger, verbose: globals.verbose ?? false };
}

export function printError(error: unknown, verbose = false): void {
  if (error instanceof DocMatrixError) {
    console.error(chalk.red(`\n  ${error.message}\n`));
    if (verbose && error.details) {
      console.error(chalk.dim(JSON.stringify(error.toJSON(), null, 2)));
    }
    return;
  }
  console.error(error);
}

/**
 * Report a fatal error and exit 1
 */
export function fail(spinner: Ora, text: string, error: unknown, verbose = false): never {
  spinner.fail(text);
  printError(error, verbose);
  process.exit(1);
}
