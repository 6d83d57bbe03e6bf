/**
 * Configuration Loader
 * Loads, merges and validates the build configuration
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import { BuildConfigSchema, PartialBuildConfigSchema } from "../types/config";
import type { BuildConfig, LogLevel, PartialBuildConfig } from "../types/config";
import { ConfigurationError } from "./errors";
import { fileExists } from "./fs";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("docmatrix", { suffix: "" });

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/docmatrix/config.yaml or ~/.config/docmatrix/config.yaml
 * - macOS: ~/Library/Preferences/docmatrix/config.yaml
 * - Windows: %APPDATA%\docmatrix\config.yaml
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.yaml");
}

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "root";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<BuildConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return BuildConfigSchema.parse(JSON.parse(content));
}

/**
 * Read a YAML (or JSON) config file and validate it as a partial config
 */
export async function readConfigFile(path: string): Promise<PartialBuildConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Configuration file not found: ${path}`, [], {
      path,
      error,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid YAML syntax in ${path}: ${reason}`, [], { path });
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(`Configuration must be a YAML object: ${path}`, [], { path });
  }

  const result = PartialBuildConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigurationError(
      `Configuration validation failed for ${path}:\n  - ${issues.join("\n  - ")}`,
      issues,
      { path },
    );
  }

  return result.data;
}

/**
 * Deep merge a partial config over a full one.
 * Lists and the formats table replace the base value as a whole.
 */
export function mergeConfig(base: BuildConfig, override: PartialBuildConfig): BuildConfig {
  return {
    ...base,
    ...override,
    template: { ...base.template, ...override.template },
    flavorAttributes: { ...base.flavorAttributes, ...override.flavorAttributes },
    formats: override.formats ?? base.formats,
    build: { ...base.build, ...override.build },
    advanced: { ...base.advanced, ...override.advanced },
    validation: { ...base.validation, ...override.validation },
    assembly: { ...base.assembly, ...override.assembly },
    logging: { ...base.logging, ...override.logging },
  };
}

function parseBooleanEnv(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new ConfigurationError(`${name} must be "true" or "false", got "${value}"`);
}

function parseIntegerEnv(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseLogLevelEnv(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((l) => l === normalized || (l === "warn" && normalized === "warning"));
  if (!level) {
    throw new ConfigurationError(`DOCMATRIX_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  }
  return level;
}

/**
 * Apply DOCMATRIX_* environment variable overrides
 */
export function applyEnvOverrides(
  config: BuildConfig,
  env: NodeJS.ProcessEnv = process.env,
): BuildConfig {
  const build = { ...config.build };
  const template = { ...config.template };
  const logging = { ...config.logging };

  if (env.DOCMATRIX_BUILD_PARALLEL) {
    build.parallel = parseBooleanEnv("DOCMATRIX_BUILD_PARALLEL", env.DOCMATRIX_BUILD_PARALLEL);
  }
  if (env.DOCMATRIX_BUILD_MAX_WORKERS) {
    build.maxWorkers = parseIntegerEnv("DOCMATRIX_BUILD_MAX_WORKERS", env.DOCMATRIX_BUILD_MAX_WORKERS);
  }
  if (env.DOCMATRIX_BUILD_VALIDATE) {
    build.validate = parseBooleanEnv("DOCMATRIX_BUILD_VALIDATE", env.DOCMATRIX_BUILD_VALIDATE);
  }
  if (env.DOCMATRIX_LOG_LEVEL) {
    logging.level = parseLogLevelEnv(env.DOCMATRIX_LOG_LEVEL);
  }
  if (env.DOCMATRIX_TEMPLATE_PATH) {
    template.path = env.DOCMATRIX_TEMPLATE_PATH;
  }

  return { ...config, build, template, logging };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate a merged config and freeze it.
 * Throws ConfigurationError listing every violated invariant.
 */
export function finalizeConfig(config: unknown): BuildConfig {
  const result = BuildConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigurationError(
      `Configuration validation failed:\n  - ${issues.join("\n  - ")}`,
      issues,
    );
  }

  const enabled = Object.values(result.data.formats).filter((f) => f.enabled);
  if (enabled.length === 0) {
    const issues = ["formats: At least one output format must be enabled"];
    throw new ConfigurationError(
      `Configuration validation failed:\n  - ${issues[0]}`,
      issues,
    );
  }

  return deepFreeze(result.data);
}

export interface LoadConfigOptions {
  custom?: string; // Path given with --config
  userConfigPath?: string | null; // null skips the user config
  env?: NodeJS.ProcessEnv;
}

export interface LoadConfigResult {
  config: BuildConfig;
  sources: string[]; // Files merged over the defaults, in order
}

/**
 * Load and merge configuration
 * Priority: environment > custom path > user config > default config
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const sources: string[] = [];

  const userConfigPath =
    options.userConfigPath === undefined ? getUserConfigPath() : options.userConfigPath;

  if (userConfigPath && (await fileExists(userConfigPath))) {
    config = mergeConfig(config, await readConfigFile(userConfigPath));
    sources.push(userConfigPath);
  }

  if (options.custom) {
    config = mergeConfig(config, await readConfigFile(options.custom));
    sources.push(options.custom);
  }

  config = applyEnvOverrides(config, options.env ?? process.env);

  return { config: finalizeConfig(config), sources };
}
