/**
 * List formats command - Registered converters with priority and extension
 */

import chalk from "chalk";
import type { Command } from "commander";
import { createDefaultRegistry } from "../../converters";
import { globalOptions, openSession, printError } from "../shared";

export async function listFormatsCommand(_opts: unknown, command: Command): Promise<void> {
  const globals = globalOptions(command);

  try {
    const { config } = await openSession(globals);
    const registry = createDefaultRegistry();

    console.log(`\n  ${chalk.bold("Available formats")}\n`);
    for (const converter of registry.list()) {
      const enabled = config.formats[converter.name]?.enabled ?? false;
      const marker = enabled ? chalk.green("●") : chalk.dim("○");
      console.log(
        `   ${marker} ${converter.name.padEnd(20)} ${chalk.dim(`priority ${converter.priority}`)}  ${chalk.dim(converter.outputExtension())}`,
      );
    }
    console.log("");
  } catch (error) {
    printError(error, globals.verbose);
    process.exit(1);
  }
}
