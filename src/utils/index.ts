/**
 * Utility exports
 */

// Errors
export {
  DocMatrixError,
  ConfigurationError,
  ValidationError,
  ConversionError,
  UnknownFormatError,
  ArtifactValidationError,
  CommandError,
  TaskFailuresError,
  ErrorCodes,
  toError,
} from "./errors";
export type { TaskIdentity } from "./errors";

// Filesystem utilities
export { fileExists, isFile, isDirectory } from "./fs";
export { copyDirectory } from "./copy-directory";

// Subprocesses
export { runCommand, formatCommand } from "./run-command";
export type { CommandRunner, CommandOptions, CommandOutput } from "./run-command";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  readConfigFile,
  mergeConfig,
  applyEnvOverrides,
  finalizeConfig,
} from "./load-config";
export type { LoadConfigOptions, LoadConfigResult } from "./load-config";
export { loadVersionProps, parseVersionProps } from "./load-version-props";
export { languageLayout } from "./template-layout";
export type { LanguageLayout } from "./template-layout";

// Text utilities
export { slugify } from "./slugify";

// Concurrency
export { runPool } from "./run-pool";

// Classes
export { Logger } from "./logger";
export { IdGenerator } from "./id-generator";
export { BuildTracker } from "./tracker";
export type { TaskIssue, TaskIssueReason, BuildStats } from "./tracker";
