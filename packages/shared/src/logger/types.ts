/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout checkwalk.
 *
 * @example
 * ```typescript
 * logger.info('Scan completed');
 * logger.error(new Error('Failed'), 'Profile could not be loaded');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ basePath: '/data' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, typically disabled in production) */
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
