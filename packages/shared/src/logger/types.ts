export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Interface for diagnostic logging throughout ctxgrep.
 *
 * Search results never go through a Logger; they are rendered separately so
 * that stdout carries only matched content.
 *
 * @example
 * ```typescript
 * logger.info('Searching 3 files');
 * logger.error(new Error('Failed'), 'Operation failed');
 *
 * // Create a child logger with additional context
 * const fileLogger = logger.child({ file: 'notes.txt' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, hidden unless --verbose) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   */
  child(bindings: Record<string, unknown>): Logger;
}
