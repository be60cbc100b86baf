import type { BenchEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout packbench.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'BatchStarted', ... });
 *
 * // Standard logging
 * logger.info('Loaded 12 cases');
 * logger.error(new Error('Failed'), 'Ledger append failed');
 *
 * // Create a child logger with additional context
 * const caseLogger = logger.child({ caseId: 'c01' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured harness event.
   */
  log(event: BenchEvent): MaybePromise<void>;

  /** Log a debug message (only shown in verbose mode) */
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
   */
  child(bindings: Record<string, unknown>): Logger;
}
