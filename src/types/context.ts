/**
 * Build context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { BuildConfig } from "./config";
import type { BuildTask, ConversionResult } from "./pipeline";
import type { BuildTracker } from "../utils/tracker";
import type { IdGenerator } from "../utils/id-generator";
import type { Logger } from "../utils/logger";
import type { ConverterRegistry } from "../converters/registry";
import type { Validator } from "../validator";

export interface BuildContext {
  // Input - provided at initialization
  config: BuildConfig;
  logger: Logger;
  registry: ConverterRegistry;
  validator: Validator;
  idGenerator: IdGenerator;

  // Unified tracking for task outcomes and issues
  tracker: BuildTracker;

  verbose?: boolean;

  tasks?: BuildTask[]; // Build matrix, set by the scheduler
  results?: ConversionResult[]; // One per task, in matrix order, set by the executor
}
