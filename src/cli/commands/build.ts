/**
 * Build command - Runs the orchestrator over the selected matrix
 */

import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import type { Command } from "commander";
import { Builder } from "../../builder";
import * as modules from "../../modules";
import type { BuildState } from "../../types";
import { fail, globalOptions, openSession } from "../shared";
import { hasSelectors, narrowConfig } from "../selectors";

const BuildOptionsSchema = z.object({
  lang: z.array(z.string()).optional(),
  format: z.array(z.string()).optional(),
  flavor: z.array(z.string()).optional(),
  all: z.boolean().optional(),
});

type Options = z.infer<typeof BuildOptionsSchema>;

const STATE_TEXT: Partial<Record<BuildState, string>> = {
  cleaning: "Cleaning build directories...",
  validating: "Running pre-flight validation...",
  scheduling: "Scheduling tasks...",
  executing: "Converting...",
  aggregating: "Aggregating results...",
};

export async function buildCommand(opts: Options, command: Command): Promise<void> {
  const options = BuildOptionsSchema.parse(opts);
  if (!hasSelectors(options)) {
    command.help();
  }

  const globals = globalOptions(command);
  const spinner = ora({ text: "Loading configuration...", indent: 2 }).start();

  try {
    const session = await openSession(globals);
    const config = options.all ? session.config : narrowConfig(session.config, options, session.logger);

    const builder = new Builder(config, { logger: session.logger, verbose: session.verbose });
    builder.onStateChange((state) => {
      const text = STATE_TEXT[state];
      if (text) spinner.text = text;
    });

    const report = await builder.run();

    spinner.clear();
    spinner.stop();
    modules.stats(builder.context, report.summaryPath);

    if (report.error) {
      console.error(chalk.red(`  ${report.error.message.split("\n").join("\n  ")}\n`));
      process.exitCode = 1;
    }
  } catch (error) {
    fail(spinner, "Build failed", error, globals.verbose);
  }
}
