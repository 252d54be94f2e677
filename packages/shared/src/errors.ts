/**
 * Error codes used throughout the embeddings cache.
 * Configuration errors surface at construction time.
 * Backend and decode errors are recovered inside the cache.
 */
export type ErrorCode =
  // Construction-time errors
  | 'ConfigError'
  // Recoverable cache errors
  | 'BackendUnavailable'
  | 'Timeout'
  | 'DecodeError'
  // Caller errors
  | 'InvalidVector'
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
 * Base error class for all cache errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('BackendUnavailable', 'GET failed', {
 *   cause: originalError,
 *   details: { store: 'redis', operation: 'get' }
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
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when a cache backend cannot be reached or rejects a command.
 */
export class BackendUnavailableError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('BackendUnavailable', message, options);
  }
}

/**
 * Error thrown when a backend operation exceeds its allotted wait.
 */
export class TimeoutError extends AppError {
  /** The wait that was exceeded, in milliseconds */
  public readonly timeoutMs?: number;

  constructor(message: string, options: AppErrorOptions & { timeoutMs?: number } = {}) {
    super('Timeout', message, options);
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Error thrown when a stored blob cannot be parsed into an embedding vector.
 */
export class DecodeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('DecodeError', message, options);
  }
}

/**
 * Error thrown when a value handed to the codec is not an embedding vector.
 */
export class InvalidVectorError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvalidVector', message, options);
  }
}

const RECOVERABLE_CODES: ReadonlySet<ErrorCode> = new Set(['BackendUnavailable', 'Timeout', 'DecodeError']);

/**
 * True for the errors a cache reports as a miss or a skipped write.
 */
export function isRecoverableCacheError(error: unknown): error is AppError {
  return error instanceof AppError && RECOVERABLE_CODES.has(error.code);
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(String(error));
}
