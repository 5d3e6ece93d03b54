import type { TermwiseEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Interface for logging throughout termwise.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'ProviderRequestStarted', ... });
 * logger.debug('Using API key ending in ...abcd');
 * const childLogger = logger.child({ provider: 'gemini' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   * @param event - The event to log
   */
  log(event: TermwiseEvent): MaybePromise<void>;

  /** Log a debug message (only shown with --debug) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
