/**
 * Execute Module
 * Runs every scheduled task on a bounded worker pool and records one
 * result per task
 */

import { mkdir, rm } from "fs/promises";
import { join, resolve } from "node:path";
import {
  ConversionError,
  ErrorCodes,
  UnknownFormatError,
  languageLayout,
  loadVersionProps,
  runPool,
  toError,
} from "../utils";
import type { Logger } from "../utils";
import type {
  BuildContext,
  BuildTask,
  ConversionContext,
  ConversionResult,
  Converter,
  FailureResult,
} from "../types";

// How long a timed-out conversion may take to wind down after abort
const ABORT_GRACE_MS = 10000;

export async function execute(ctx: BuildContext): Promise<void> {
  if (!ctx.tasks) {
    throw new Error("Scheduler must run before executor");
  }

  // ============================================================================
  // Shared State (closure variables)
  // ============================================================================

  const { config, registry, tracker, logger, idGenerator } = ctx;
  const tasks = ctx.tasks;

  const outputRoot = resolve(config.build.outputDir);
  const tempRoot = resolve(config.build.tempDir);
  const maxAttempts = config.advanced.retryCount + 1;
  const timeout = config.build.taskTimeout;
  const haltOnFailure = config.advanced.failFast || !config.advanced.continueOnError;
  const concurrency = config.build.parallel ? config.build.maxWorkers : 1;

  // Checked once per converter per run, shared by concurrent tasks
  const dependencyChecks = new Map<string, Promise<boolean>>();
  const versionProps = new Map<string, Promise<Record<string, string>>>();
  let halted = false;

  // ============================================================================
  // Helper Functions
  // ============================================================================

  function dependenciesAvailable(converter: Converter): Promise<boolean> {
    let check = dependencyChecks.get(converter.name);
    if (!check) {
      check = converter.checkDependencies(logger).catch((error: unknown) => {
        logger.error(`Dependency check for ${converter.name} failed`, toError(error));
        return false;
      });
      dependencyChecks.set(converter.name, check);
    }
    return check;
  }

  function versionPropsFor(language: string): Promise<Record<string, string>> {
    let props = versionProps.get(language);
    if (!props) {
      props = loadVersionProps(languageLayout(config.template, language).versionFile, logger);
      versionProps.set(language, props);
    }
    return props;
  }

  function toConversionError(task: BuildTask, error: unknown): ConversionError {
    if (error instanceof ConversionError) return error;
    return new ConversionError(task, toError(error).message, { cause: error });
  }

  function failure(task: BuildTask, error: ConversionError, attempts: number, started: number): FailureResult {
    return { status: "failure", task, error, attempts, duration: Date.now() - started };
  }

  /**
   * One conversion attempt under the task timeout.
   * The attempt's temp directory is removed whatever the outcome.
   */
  async function attempt(task: BuildTask, converter: Converter, taskLogger: Logger): Promise<string> {
    const layout = languageLayout(config.template, task.language);
    const outputDirectory = join(outputRoot, task.language, task.flavor, task.format);
    const tempDirectory = join(
      tempRoot,
      idGenerator.generate(`${task.language}-${task.flavor}-${task.format}`),
    );

    await mkdir(outputDirectory, { recursive: true });
    await mkdir(tempDirectory, { recursive: true });

    const controller = new AbortController();
    const context: ConversionContext = {
      language: task.language,
      flavor: task.flavor,
      format: task.format,
      templateDirectory: layout.directory,
      sourceDirectory: layout.sourceDirectory,
      mainDocument: layout.mainDocument,
      outputDirectory,
      tempDirectory,
      artifactName: config.template.artifactName,
      versionProps: await versionPropsFor(task.language),
      attributes: [...(config.flavorAttributes[task.flavor] ?? [])],
      options: { ...task.options },
      assembly: config.assembly,
      logger: taskLogger,
      signal: controller.signal,
    };

    let timer: NodeJS.Timeout | undefined;
    try {
      const conversion = converter.convert(context);
      if (timeout <= 0) {
        return await conversion;
      }

      const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(
            new ConversionError(task, `timed out after ${timeout} ms`, {
              code: ErrorCodes.TIMEOUT,
            }),
          );
          // Abort after rejecting so the timeout wins the race
          controller.abort();
        }, timeout);
      });

      try {
        return await Promise.race([conversion, expired]);
      } catch (error) {
        if (controller.signal.aborted) {
          await settle(conversion, taskLogger);
        }
        throw error;
      }
    } finally {
      clearTimeout(timer);
      await rm(tempDirectory, { recursive: true, force: true });
    }
  }

  /**
   * Wait for an aborted conversion to finish its own cleanup before the
   * temp directory is removed or a retry writes to the same output directory
   */
  async function settle(conversion: Promise<string>, taskLogger: Logger): Promise<void> {
    let grace: NodeJS.Timeout | undefined;
    const finished = await Promise.race([
      conversion.then(
        () => true,
        () => true,
      ),
      new Promise<false>((resolve) => {
        grace = setTimeout(() => resolve(false), ABORT_GRACE_MS);
      }),
    ]);
    clearTimeout(grace);

    if (!finished) {
      taskLogger.warn(`Aborted conversion still running after ${ABORT_GRACE_MS} ms`);
    }
  }

  async function runTask(task: BuildTask): Promise<ConversionResult> {
    const started = Date.now();
    const taskLogger = logger.child(task.id);

    let converter: Converter;
    try {
      converter = registry.resolve(task.format, task);
    } catch (error) {
      if (!(error instanceof UnknownFormatError)) throw error;
      taskLogger.error(error.message);
      return failure(task, error, 1, started);
    }

    if (!(await dependenciesAvailable(converter))) {
      const error = new ConversionError(task, `Missing dependencies for ${task.format}`, {
        code: ErrorCodes.MISSING_DEPENDENCIES,
        retryable: false,
      });
      taskLogger.error(error.message);
      return failure(task, error, 1, started);
    }

    for (let attempts = 1; ; attempts++) {
      try {
        taskLogger.debug(`Attempt ${attempts} of ${maxAttempts}`);
        const artifact = await attempt(task, converter, taskLogger);
        return { status: "success", task, artifact, attempts, duration: Date.now() - started };
      } catch (caught) {
        const error = toConversionError(task, caught);

        if (!error.retryable || attempts >= maxAttempts) {
          const diagnostics = error.diagnostics ? `\n${error.diagnostics}` : "";
          taskLogger.error(
            `${task.format} failed for ${task.language}/${task.flavor}: ${error.message}${diagnostics}`,
            error,
          );
          return failure(task, error, attempts, started);
        }

        taskLogger.warn(`Attempt ${attempts} failed, retrying: ${error.message}`);
      }
    }
  }

  // ============================================================================
  // Worker Pool
  // ============================================================================

  logger.info(`Executing ${tasks.length} task(s) on ${Math.min(concurrency, tasks.length)} worker(s)`);

  const settled = await runPool(
    tasks,
    concurrency,
    async (task) => {
      const result = await runTask(task);
      if (result.status === "failure" && haltOnFailure && !halted) {
        halted = true;
        logger.warn("Stopping after the first failure; remaining tasks are skipped");
      }
      tracker.record(result);
      return result;
    },
    () => halted,
  );

  ctx.results = settled.map((result, index): ConversionResult => {
    if (result) return result;

    const skipped: ConversionResult = { status: "skipped", task: tasks[index], reason: "fail-fast" };
    tracker.record(skipped);
    return skipped;
  });
}
