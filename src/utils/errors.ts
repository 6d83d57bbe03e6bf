/**
 * Error types for docmatrix.
 * Every error the build raises on purpose extends DocMatrixError.
 */

export class DocMatrixError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DocMatrixError";
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Malformed or semantically invalid configuration. Always fatal.
 */
export class ConfigurationError extends DocMatrixError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    details?: Record<string, unknown>,
  ) {
    super(ErrorCodes.CONFIGURATION, message, details);
    this.name = "ConfigurationError";
  }
}

/**
 * Pre-flight check failure (missing paths, broken references, missing fonts).
 */
export class ValidationError extends DocMatrixError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.VALIDATION, message, details);
    this.name = "ValidationError";
  }
}

export interface TaskIdentity {
  format: string;
  language: string;
  flavor: string;
}

/**
 * A single task failed. Carries the tool diagnostic output when there is one.
 */
export class ConversionError extends DocMatrixError {
  public readonly format: string;
  public readonly language: string;
  public readonly flavor: string;
  public readonly diagnostics?: string;
  public readonly retryable: boolean;

  constructor(
    task: TaskIdentity,
    message: string,
    options: { diagnostics?: string; cause?: unknown; retryable?: boolean; code?: string } = {},
  ) {
    super(options.code ?? ErrorCodes.CONVERSION, message, {
      format: task.format,
      language: task.language,
      flavor: task.flavor,
    });
    this.name = "ConversionError";
    this.format = task.format;
    this.language = task.language;
    this.flavor = task.flavor;
    this.diagnostics = options.diagnostics;
    this.retryable = options.retryable ?? true;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Requested format has no registered converter.
 * Aggregated like any other conversion failure, never retried.
 */
export class UnknownFormatError extends ConversionError {
  constructor(task: TaskIdentity) {
    super(task, `No converter registered for format: ${task.format}`, {
      retryable: false,
      code: ErrorCodes.UNKNOWN_FORMAT,
    });
    this.name = "UnknownFormatError";
  }
}

/**
 * Aggregate raised after a full artifact scan, listing every offending file.
 */
export class ArtifactValidationError extends DocMatrixError {
  constructor(
    public readonly artifactType: string,
    public readonly problems: string[],
  ) {
    super(
      ErrorCodes.ARTIFACT_VALIDATION,
      `${artifactType} validation failed for ${problems.length} issue(s):\n${problems.join("\n")}`,
      { artifactType, problems },
    );
    this.name = "ArtifactValidationError";
  }
}

/**
 * A subprocess could not be started, exited non-zero or was aborted.
 */
export class CommandError extends DocMatrixError {
  constructor(
    public readonly command: string,
    public readonly args: string[],
    public readonly result: {
      exitCode: number | null;
      stdout: string;
      stderr: string;
      notFound: boolean;
      aborted: boolean;
    },
  ) {
    const reason = result.notFound
      ? "command not found"
      : result.aborted
        ? "aborted"
        : `exit code ${result.exitCode}`;
    super(ErrorCodes.COMMAND, `${command} failed (${reason})`, {
      command,
      args,
      exitCode: result.exitCode,
    });
    this.name = "CommandError";
  }

  get diagnostics(): string {
    return [this.result.stderr, this.result.stdout]
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
      .join("\n");
  }
}

/**
 * Attached to a finished build report when one or more tasks failed.
 */
export class TaskFailuresError extends DocMatrixError {
  constructor(public readonly failures: ConversionError[]) {
    const lines = failures.map(
      (f) => `  - ${f.format} (${f.language}/${f.flavor}): ${f.message}`,
    );
    super(
      ErrorCodes.TASK_FAILURES,
      `${failures.length} build task(s) failed:\n${lines.join("\n")}`,
      { count: failures.length },
    );
    this.name = "TaskFailuresError";
  }
}

export const ErrorCodes = {
  CONFIGURATION: "E_CONFIG",
  VALIDATION: "E_VALIDATION",
  CONVERSION: "E_CONVERSION",
  UNKNOWN_FORMAT: "E_UNKNOWN_FORMAT",
  MISSING_DEPENDENCIES: "E_MISSING_DEPENDENCIES",
  TIMEOUT: "E_TIMEOUT",
  ARTIFACT_VALIDATION: "E_ARTIFACT_VALIDATION",
  COMMAND: "E_COMMAND",
  TASK_FAILURES: "E_TASK_FAILURES",
} as const;

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
