import type { CacheEvent } from '../types/events';

/**
 * Interface for logging throughout the cache.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'CacheHit', ... });
 *
 * // Log with trace context
 * logger.trace(event, 'redis GET failed, reporting a miss');
 *
 * // Standard logging
 * logger.info('Cache ready');
 * logger.error(new Error('Failed'), 'Operation failed');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ store: 'redis' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured cache event.
   */
  log(event: CacheEvent): void;

  /**
   * High-signal trace event with a human-readable message.
   * Combines structured event data with a human-readable summary.
   */
  trace(event: CacheEvent, message: string): void;

  /** Log a debug message (lowest priority, typically disabled in production) */
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
