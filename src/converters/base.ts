/**
 * Base Converter
 * Shared conversion flow for every format: tool probing, asciidoctor
 * attributes, intermediate HTML and cleanup of partial output
 */

import { rm, mkdir } from "fs/promises";
import { join } from "node:path";
import { ZodError } from "zod";
import type { z } from "zod";
import {
  CommandError,
  ConversionError,
  ErrorCodes,
  copyDirectory,
  fileExists,
  formatCommand,
  runCommand,
} from "../utils";
import type { CommandRunner, CommandOutput, Logger } from "../utils";
import type { Priority } from "../types/config";
import type { ConversionContext, Converter, FormatName } from "../types/converter";

export interface ConverterOptions {
  runner?: CommandRunner;
}

/**
 * Files a single render call creates. Outputs are removed when the render
 * fails; intermediates are removed either way.
 */
export class RenderScope {
  readonly outputs: string[] = [];
  readonly intermediates: string[] = [];

  constructor(
    readonly context: ConversionContext,
    readonly artifact: string,
  ) {}

  /**
   * Reserve a path in the task's temp directory
   */
  intermediate(name: string): string {
    const path = join(this.context.tempDirectory, name);
    this.intermediates.push(path);
    return path;
  }

  /**
   * Register an extra output (directory or file) besides the primary artifact
   */
  output(path: string): string {
    this.outputs.push(path);
    return path;
  }
}

export abstract class BaseConverter implements Converter {
  abstract readonly name: FormatName;
  abstract readonly priority: Priority;

  /** Executables probed by checkDependencies */
  protected abstract readonly tools: readonly string[];

  protected readonly run: CommandRunner;

  constructor(options: ConverterOptions = {}) {
    this.run = options.runner ?? runCommand;
  }

  outputExtension(): string {
    return `.${this.name}`;
  }

  // ==========================================================================
  // Dependencies
  // ==========================================================================

  async checkDependencies(logger: Logger): Promise<boolean> {
    for (const tool of this.tools) {
      if (!(await this.probe(tool, logger))) {
        return false;
      }
    }
    return true;
  }

  protected async probe(tool: string, logger: Logger): Promise<boolean> {
    try {
      const { stdout } = await this.run(tool, ["--version"]);
      logger.debug(`Found ${tool}: ${stdout.split("\n")[0].trim()}`);
      return true;
    } catch (error) {
      if (!(error instanceof CommandError)) throw error;
      logger.error(`${tool} not found. ${this.name} conversion requires: ${this.tools.join(", ")}`);
      return false;
    }
  }

  // ==========================================================================
  // Conversion
  // ==========================================================================

  /**
   * Render the artifact, verify it exists and clean up after the render.
   * Subclasses implement `render` only.
   */
  async convert(context: ConversionContext): Promise<string> {
    await mkdir(context.outputDirectory, { recursive: true });
    await mkdir(context.tempDirectory, { recursive: true });

    const scope = new RenderScope(context, this.artifactPath(context));

    try {
      const produced = await this.render(context, scope);
      if (!(await fileExists(produced))) {
        throw new ConversionError(context, `No output produced: ${produced}`);
      }

      context.logger.info(`Created ${produced}`);
      return produced;
    } catch (error) {
      await Promise.all(
        [scope.artifact, ...scope.outputs].map((path) => rm(path, { recursive: true, force: true })),
      );
      throw this.wrapError(context, error);
    } finally {
      await Promise.all(scope.intermediates.map((path) => rm(path, { recursive: true, force: true })));
    }
  }

  protected abstract render(context: ConversionContext, scope: RenderScope): Promise<string>;

  /**
   * {outputDirectory}/{artifactName}-{language}-{flavor}{extension}
   */
  protected artifactPath(context: ConversionContext, extension = this.outputExtension()): string {
    return join(context.outputDirectory, `${this.baseName(context)}${extension}`);
  }

  protected baseName(context: ConversionContext): string {
    return `${context.artifactName}-${context.language}-${context.flavor}`;
  }

  protected wrapError(context: ConversionContext, error: unknown): ConversionError {
    if (error instanceof ConversionError) return error;

    if (error instanceof CommandError) {
      return new ConversionError(context, error.message, {
        diagnostics: error.diagnostics,
        cause: error,
        retryable: !error.result.notFound,
        code: error.result.notFound ? ErrorCodes.MISSING_DEPENDENCIES : undefined,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ConversionError(context, message, { cause: error });
  }

  /**
   * Validate format options against a schema. Bad options are not retried.
   */
  protected parseOptions<T extends z.ZodType>(schema: T, context: ConversionContext): z.infer<T> {
    try {
      return schema.parse(context.options);
    } catch (error) {
      if (!(error instanceof ZodError)) throw error;
      const issues = error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`);
      throw new ConversionError(context, `Invalid ${this.name} options: ${issues.join("; ")}`, {
        retryable: false,
      });
    }
  }

  // ==========================================================================
  // Tools
  // ==========================================================================

  protected async exec(
    context: ConversionContext,
    command: string,
    args: string[],
  ): Promise<CommandOutput> {
    context.logger.debug(`Executing: ${formatCommand(command, args)}`);
    return this.run(command, args, { cwd: context.sourceDirectory, signal: context.signal });
  }

  /**
   * Asciidoctor `-a` arguments shared by every backend: version metadata,
   * the flavor, every flavor attribute, then per-call overrides
   */
  protected attributeArgs(
    context: ConversionContext,
    overrides: Record<string, string | true> = {},
  ): string[] {
    const attributes: Record<string, string | true> = {
      revnumber: context.versionProps.revnumber ?? "",
      revdate: context.versionProps.revdate ?? "",
      revremark: context.versionProps.revremark ?? "",
      flavor: context.flavor,
    };
    for (const name of context.attributes) {
      attributes[name] = true;
    }
    Object.assign(attributes, overrides);

    const args: string[] = [];
    for (const [key, value] of Object.entries(attributes)) {
      args.push("-a", value === true || value === "" ? key : `${key}=${value}`);
    }
    return args;
  }

  protected imagesDirectory(context: ConversionContext): string {
    return join(context.sourceDirectory, "images");
  }

  /**
   * Copy the source images next to the output so relative references resolve.
   * Returns the attribute value to use for `imagesdir`.
   */
  protected async publishImages(context: ConversionContext): Promise<string> {
    const source = this.imagesDirectory(context);
    if (!(await fileExists(source))) {
      return source;
    }

    await copyDirectory(source, join(context.outputDirectory, "images"));
    context.logger.debug(`Copied images to ${context.outputDirectory}`);
    return "images";
  }

  /**
   * Render the main document to a single HTML file in the temp directory
   */
  protected async renderHtml(
    context: ConversionContext,
    scope: RenderScope,
    overrides: Record<string, string | true> = {},
  ): Promise<string> {
    const html = scope.intermediate(`${this.baseName(context)}.html`);

    await this.exec(context, "asciidoctor", [
      "-b",
      "html5",
      ...this.attributeArgs(context, { imagesdir: this.imagesDirectory(context), ...overrides }),
      "-o",
      html,
      context.mainDocument,
    ]);

    return html;
  }

  protected async pandoc(
    context: ConversionContext,
    input: string,
    output: string,
    to: string,
    extraArgs: string[] = [],
  ): Promise<void> {
    await this.exec(context, "pandoc", [input, "-f", "html", "-t", to, ...extraArgs, "-o", output]);
  }
}
