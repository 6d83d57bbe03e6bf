/**
 * Converter contract - every format plugin implements this interface
 */

import type { AssemblySettings, Priority } from "./config";
import type { Logger } from "../utils/logger";

export const FORMAT_NAMES = [
  "html",
  "pdf",
  "docx",
  "markdown",
  "markdown_mp",
  "asciidoc",
  "github_markdown",
  "github_markdown_mp",
  "rst",
  "textile",
  "confluence",
] as const;

export type FormatName = (typeof FORMAT_NAMES)[number];

export function isFormatName(name: string): name is FormatName {
  return (FORMAT_NAMES as readonly string[]).includes(name);
}

/**
 * Per-task execution context, built fresh by the orchestrator for each task
 * and owned by the converter invocation that consumes it.
 */
export interface ConversionContext {
  language: string;
  flavor: string;
  format: string;

  templateDirectory: string; // {template}/{language}
  sourceDirectory: string; // {template}/{language}/{sourceDir}
  mainDocument: string; // Absolute path to the main document
  outputDirectory: string; // {outputDir}/{language}/{flavor}/{format}
  tempDirectory: string; // Unique per task, removed by the orchestrator

  artifactName: string; // Basename prefix, e.g. "template"
  versionProps: Record<string, string>;
  attributes: string[]; // Attribute names defined for the flavor (besides `flavor`)
  options: Record<string, unknown>;
  assembly: AssemblySettings; // Include flattening settings

  logger: Logger;
  signal: AbortSignal; // Fires on task timeout
}

export interface Converter {
  readonly name: FormatName;
  readonly priority: Priority;

  /**
   * Verify required external tools are reachable.
   * Resolves false (and logs) when a tool is absent, never rejects for that.
   */
  checkDependencies(logger: Logger): Promise<boolean>;

  /**
   * Produce exactly one primary artifact under `context.outputDirectory`
   * and resolve with its path. Rejects with a ConversionError.
   */
  convert(context: ConversionContext): Promise<string>;

  outputExtension(): string;
}
