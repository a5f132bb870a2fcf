import type { WardenEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout repowarden.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventMeta(runId), type: 'TickStarted', payload: { tickNumber: 1, repositoryCount: 4 } });
 *
 * // Standard logging
 * logger.info('Scan completed');
 * logger.error(new Error('Failed'), 'Push failed');
 *
 * // Create a child logger with additional context
 * const repoLogger = logger.child({ repo: '/srv/code/api' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   * @param event - The event to log
   */
  log(event: WardenEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   * @param event - The event being traced
   * @param message - Human-readable description
   */
  trace(event: WardenEvent, message: string): MaybePromise<void>;

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
