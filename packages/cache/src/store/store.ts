import type { CacheKey } from '../key';

/**
 * Common interface for all cache storage backends.
 * Keys and values are opaque bytes; the store never interprets either.
 */
export interface CacheStore {
  /** Backend name used in logs and events ('memory', 'redis', ...) */
  readonly kind: string;

  /**
   * Returns the stored blob, or undefined when the key was never written.
   * Remote stores reject with BackendUnavailableError or TimeoutError.
   */
  get(key: CacheKey): Promise<Buffer | undefined>;

  /**
   * Stores the blob, replacing any previous value (last writer wins).
   * Remote stores reject with BackendUnavailableError or TimeoutError.
   */
  set(key: CacheKey, value: Buffer): Promise<void>;

  /** Releases connections held by the store. */
  close(): Promise<void>;

  /** Where the data lives, with credentials redacted. */
  describe(): string;
}
