/**
 * Error types for the run-aborting tier.
 *
 * Per-file problems never throw past the aggregator; they become skip records.
 * Anything thrown as one of these classes ends the run with a non-zero exit.
 */

export type ErrorCode = "FatalError" | "ConfigError" | "UsageError";

export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = options.cause;
  }

  /** Exit code for the process; user-correctable errors use 2 */
  get exitCode(): number {
    return this.code === "FatalError" ? 1 : 2;
  }
}

/**
 * The run cannot continue: unresolvable working directory, unusable traversal
 * root, a path outside the root, or a tokenizer that failed to load.
 */
export class FatalError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("FatalError", message, options);
  }
}

/**
 * A limit or flag value failed validation.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

/**
 * The command line could not be parsed.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("UsageError", message, options);
  }
}

/**
 * Render an unknown thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
