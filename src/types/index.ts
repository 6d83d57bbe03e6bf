/**
 * Central type exports
 */

// Configuration
export type {
  BuildConfig,
  PartialBuildConfig,
  TemplateConfig,
  FormatSpec,
  BuildSettings,
  AdvancedSettings,
  ValidationSettings,
  AssemblySettings,
  LoggingConfig,
  LogLevel,
  Priority,
} from "./config";
export { BuildConfigSchema, PartialBuildConfigSchema } from "./config";

// Converters
export type { Converter, ConversionContext, FormatName } from "./converter";
export { FORMAT_NAMES, isFormatName } from "./converter";

// Pipeline
export type {
  BuildTask,
  ConversionResult,
  SuccessResult,
  FailureResult,
  SkippedResult,
  ResultStatus,
  BuildState,
  BuildSummary,
  BuildReport,
} from "./pipeline";

// Context
export type { BuildContext } from "./context";
