/**
 * Check command - Dependency check of every enabled format
 */

import chalk from "chalk";
import type { Command } from "commander";
import { createDefaultRegistry } from "../../converters";
import { globalOptions, openSession, printError } from "../shared";

export async function checkCommand(_opts: unknown, command: Command): Promise<void> {
  const globals = globalOptions(command);

  try {
    const { config, logger } = await openSession(globals);
    const registry = createDefaultRegistry();
    const enabled = Object.entries(config.formats).filter(([, spec]) => spec.enabled);
    let missing = 0;

    console.log(`\n  ${chalk.bold("Dependencies")}\n`);
    for (const [name] of enabled) {
      if (!registry.has(name)) {
        missing++;
        console.log(`   ${chalk.red("✖")} ${name.padEnd(20)} ${chalk.red("no converter registered")}`);
        continue;
      }

      const ok = await registry.resolve(name).checkDependencies(logger);
      if (!ok) missing++;
      console.log(`   ${ok ? chalk.green("✔") : chalk.red("✖")} ${name}`);
    }
    console.log("");

    if (missing > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    printError(error, globals.verbose);
    process.exit(1);
  }
}
