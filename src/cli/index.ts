#!/usr/bin/env node

/**
 * CLI entry point for docmatrix
 * Builds documentation artifacts across languages, flavors and formats
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { validateCommand } from "./commands/validate";
import { listFormatsCommand } from "./commands/list-formats";
import { checkCommand } from "./commands/check";
import { testArtifactsCommand } from "./commands/test-artifacts";
import { distCommand } from "./commands/dist";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("docmatrix")
  .description("Build a language × flavor × format matrix of documents from an AsciiDoc template")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output");

program
  .command("build")
  .description("Build the selected documents")
  .option("--lang <codes...>", "Languages to build (e.g., --lang EN DE)")
  .option("--format <names...>", "Formats to build")
  .option("--flavor <names...>", "Flavors to build")
  .option("--all", "Build every configured language, flavor and format")
  .action(buildCommand);

program
  .command("validate")
  .description("Run the pre-flight validation suite")
  .action(validateCommand);

program
  .command("list-formats")
  .description("List available output formats")
  .action(listFormatsCommand);

program
  .command("check")
  .description("Check external tools for every enabled format")
  .action(checkCommand);

program
  .command("test-artifacts")
  .description("Validate built artifacts")
  .option("--build-dir <path>", "Build directory to scan")
  .action(testArtifactsCommand);

program
  .command("dist")
  .description("Package built artifacts as ZIP archives")
  .option("--build-dir <path>", "Build directory to package")
  .option("--dist-dir <path>", "Destination for archives")
  .action(distCommand);

program
  .command("config")
  .description("Show configuration file location")
  .option("--show", "Print the effective configuration")
  .action(configCommand);

await program.parseAsync();
