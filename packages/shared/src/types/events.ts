/**
 * Base interface for all cache events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Kind of store that served the operation ('memory', 'redis', ...) */
  store: string;
  /** Where the store keeps its data, credentials redacted */
  location: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when an operation failed and was degraded to a miss or a skipped write */
export interface CacheBackendError extends BaseEvent {
  type: 'CacheBackendError';
  payload: {
    operation: 'lookup' | 'update' | 'close';
    key?: string;
    /** AppError code, or 'UnknownError' for anything else */
    code: string;
    message: string;
  };
}

export type CacheEvent = CacheBackendError;

export const CACHE_EVENT_SCHEMA_VERSION = 1;
