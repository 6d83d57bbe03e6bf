/**
 * Builder - Pipeline orchestrator
 * Drives the build state machine and delegates each phase to a module
 */

import { resolve } from "node:path";
import { createDefaultRegistry } from "./converters";
import type { ConverterRegistry } from "./converters";
import { Validator } from "./validator";
import { BuildTracker, IdGenerator, Logger, TaskFailuresError } from "./utils";
import type { BuildConfig, BuildContext, BuildReport, BuildState } from "./types";
import * as modules from "./modules";

export type StateListener = (state: BuildState, previous: BuildState) => void;

export interface BuilderOptions {
  logger?: Logger;
  registry?: ConverterRegistry;
  validator?: Validator;
  verbose?: boolean;
}

export class Builder {
  private state: BuildState = "idle";
  private listeners: StateListener[] = [];
  readonly context: BuildContext;

  constructor(config: BuildConfig, options: BuilderOptions = {}) {
    const logger = options.logger ?? new Logger(config.logging.level);

    this.context = {
      config,
      logger,
      registry: options.registry ?? createDefaultRegistry(),
      validator: options.validator ?? new Validator(logger),
      idGenerator: new IdGenerator(),
      tracker: new BuildTracker(),
      verbose: options.verbose,
    };
  }

  get currentState(): BuildState {
    return this.state;
  }

  /**
   * Observe state transitions. Returns a function that removes the listener.
   */
  onStateChange(listener: StateListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private transition(next: BuildState): void {
    const previous = this.state;
    this.state = next;
    this.context.logger.debug(`Build state: ${previous} → ${next}`);
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }

  /**
   * Run the build once.
   * Resolves with a report whenever execution ran, whatever the task
   * outcomes; rejects when cleaning or validation aborted the build.
   */
  async run(): Promise<BuildReport> {
    if (this.state !== "idle") {
      throw new Error(`Builder has already run (state: ${this.state})`);
    }

    const ctx = this.context;
    const { config, logger, tracker } = ctx;
    const started = Date.now();

    try {
      if (config.build.cleanBefore) {
        this.transition("cleaning");
        await modules.clean(ctx);
      }

      if (config.build.validate) {
        this.transition("validating");
        await modules.validate(ctx);
      } else {
        logger.warn("Skipping pre-flight validation");
      }

      this.transition("scheduling");
      modules.schedule(ctx);

      this.transition("executing");
      await modules.execute(ctx);

      this.transition("aggregating");
      const results = ctx.results ?? [];
      const failures = results.flatMap((result) => (result.status === "failure" ? [result.error] : []));
      const summary = tracker.getSummary();
      const summaryPath = await tracker.exportSummary(resolve(config.build.outputDir));

      logger.info(modules.summaryLine(summary));

      this.transition("done");
      return {
        state: "done",
        results,
        summary,
        error: failures.length > 0 ? new TaskFailuresError(failures) : undefined,
        summaryPath,
        duration: Date.now() - started,
      };
    } catch (error) {
      this.transition("failed");
      throw error;
    }
  }
}
