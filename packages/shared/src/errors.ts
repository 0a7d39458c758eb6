/**
 * Error codes used throughout ctxgrep.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Per-file errors, reported and skipped
  | 'FileAccessError'
  | 'IntervalError'
  | 'TimeoutError'
  // Runtime errors (exit code 1)
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
 * Base error class for all ctxgrep errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('FileAccessError', 'Cannot read notes.txt', {
 *   cause: originalError,
 *   details: { path: 'notes.txt', code: 'ENOENT' }
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
 * Covers patterns that fail to compile and invalid option values.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error raised when a single input file cannot be opened or read.
 * Scoped to that file; the rest of the batch carries on.
 */
export class FileAccessError extends AppError {
  /** Path of the file as supplied by the caller */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('FileAccessError', message, options);
    this.path = path;
  }
}

export type IntervalErrorReason =
  /** start is greater than end */
  | 'StartEndRangeInvalid'
  /** two intervals to be merged share no point */
  | 'NonOverlappingInterval'
  /** intervals handed to the coalescer are not sorted by start */
  | 'UnorderedInput';

const INTERVAL_MESSAGES: Record<IntervalErrorReason, string> = {
  StartEndRangeInvalid: 'Interval start must be less than or equal to end',
  NonOverlappingInterval: 'Cannot merge intervals that do not overlap',
  UnorderedInput: 'Intervals must be supplied in non-decreasing start order',
};

/**
 * Error thrown by interval construction and merging.
 */
export class IntervalError extends AppError {
  public readonly reason: IntervalErrorReason;

  constructor(reason: IntervalErrorReason, options: AppErrorOptions = {}) {
    super('IntervalError', INTERVAL_MESSAGES[reason], options);
    this.reason = reason;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  /** The limit that was exceeded, in milliseconds */
  public readonly timeoutMs: number;

  constructor(message: string, options: AppErrorOptions & { timeoutMs: number }) {
    super('TimeoutError', message, options);
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Wraps anything thrown into an AppError, keeping AppErrors as they are.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AppError('UnknownError', message, { cause: error });
}

/**
 * Exit code for a fatal error: 2 for user-correctable problems, 1 otherwise.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}
