/**
 * Error codes used throughout packbench.
 * User-correctable errors use exit code 2.
 * Runtime and setup errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'LoadError'
  | 'InvocationError'
  | 'TimeoutError'
  | 'ParseError'
  | 'LedgerError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all packbench errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('LoadError', 'Case file is malformed', {
 *   cause: originalError,
 *   details: { path: 'cases/c01.txt', line: 3 }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a case file or baseline entry cannot be loaded.
 * Fatal for that case only, unless the root case path itself is missing.
 */
export class LoadError extends AppError {
  /** File the error refers to, when there is one */
  public readonly path?: string;
  /** 1-based line number inside `path` */
  public readonly line?: number;

  constructor(message: string, options: AppErrorOptions & { path?: string; line?: number } = {}) {
    super('LoadError', message, options);
    this.path = options.path;
    this.line = options.line;
  }
}

/**
 * Error thrown when the solver artifact cannot be invoked at all.
 * Aborts the batch before any case runs.
 */
export class InvocationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvocationError', message, options);
  }
}

/**
 * Error describing a solver run that exceeded its wall-clock bound.
 */
export class TimeoutError extends AppError {
  /** The bound that was exceeded */
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, options: AppErrorOptions = {}) {
    super('TimeoutError', `Solver timed out after ${timeoutMs}ms`, options);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when solver output carries no recognisable result.
 */
export class ParseError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ParseError', message, options);
  }
}

/**
 * Error thrown when the output ledger cannot be opened or appended to.
 * Always fatal: a batch without a durable record has no value.
 */
export class LedgerError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('LedgerError', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
