/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout dirdigest.
 *
 * @example
 * ```typescript
 * logger.info('Directory tree saved');
 * logger.error(new Error('Failed'), 'Summary request failed');
 *
 * // Create a child logger with additional context
 * const fileLogger = logger.child({ file: 'src/index.ts' });
 * ```
 */
export interface Logger {
  /** Log a debug message (suppressed unless verbose output is enabled) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
