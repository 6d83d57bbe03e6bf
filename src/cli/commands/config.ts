/**
 * Config command - Show configuration file location and the effective settings
 */

import chalk from "chalk";
import { stringify } from "yaml";
import { z } from "zod";
import type { Command } from "commander";
import { getUserConfigPath, loadConfig } from "../../utils";
import { globalOptions, printError } from "../shared";

const ConfigOptionsSchema = z.object({
  show: z.boolean().optional(),
});

type Options = z.infer<typeof ConfigOptionsSchema>;

export async function configCommand(opts: Options, command: Command): Promise<void> {
  const options = ConfigOptionsSchema.parse(opts);
  const globals = globalOptions(command);

  console.log("User configuration file location:");
  console.log(getUserConfigPath());

  if (!options.show) {
    console.log("\nCreate this file (YAML) to customize build settings.");
    console.log("Run with --show to print the effective configuration.");
    return;
  }

  try {
    const { config, sources } = await loadConfig({ custom: globals.config });
    console.log(chalk.dim(`\nMerged from: defaults${sources.map((s) => `, ${s}`).join("")}\n`));
    console.log(stringify(config));
  } catch (error) {
    printError(error, globals.verbose);
    process.exit(1);
  }
}
