/**
 * Build pipeline data types
 */

import type { ConversionError, TaskFailuresError } from "../utils/errors";

// ============================================================================
// Scheduler
// ============================================================================

/**
 * Unit of work: one (language, flavor, format) combination.
 * Created frozen by the scheduler and never mutated.
 */
export interface BuildTask {
  readonly id: string; // "{language}/{flavor}/{format}"
  readonly index: number; // Position in the build matrix
  readonly language: string;
  readonly flavor: string;
  readonly format: string;
  readonly options: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Executor
// ============================================================================

export interface SuccessResult {
  status: "success";
  task: BuildTask;
  artifact: string;
  attempts: number;
  duration: number;
}

export interface FailureResult {
  status: "failure";
  task: BuildTask;
  error: ConversionError;
  attempts: number;
  duration: number;
}

export interface SkippedResult {
  status: "skipped";
  task: BuildTask;
  reason: "fail-fast";
}

export type ConversionResult = SuccessResult | FailureResult | SkippedResult;
export type ResultStatus = ConversionResult["status"];

// ============================================================================
// Orchestrator
// ============================================================================

export type BuildState =
  | "idle"
  | "cleaning"
  | "validating"
  | "scheduling"
  | "executing"
  | "aggregating"
  | "done"
  | "failed";

export interface BuildSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface BuildReport {
  state: "done";
  results: ConversionResult[];
  summary: BuildSummary;
  error?: TaskFailuresError; // Present when at least one task failed
  summaryPath: string; // build-summary.json
  duration: number;
}
