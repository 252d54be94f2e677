import {
  AppError,
  CACHE_EVENT_SCHEMA_VERSION,
  SilentLogger,
  isRecoverableCacheError,
  redactString,
  toError,
} from '@embedcache/shared';
import type { CacheBackendError, EmbeddingsCacheConfig, Logger } from '@embedcache/shared';
import { decodeVector, encodeVector, type EmbeddingVector } from './codec';
import { deriveKey, keyToHex } from './key';
import type { CacheStore } from './store/store';
import { createCacheStore, type CacheStoreFactoryOptions } from './store/factory';

export interface EmbeddingsCacheOptions {
  logger?: Logger;
  /** The single embedding model this cache serves. Logged, never part of the key. */
  modelId?: string;
}

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  /** Failures degraded to a miss or a skipped write */
  errors: number;
}

type CacheOperation = CacheBackendError['payload']['operation'];

/**
 * Best-effort cache in front of an embedding model.
 *
 * Keys are SHA-256 digests of the text alone, so an instance must be scoped
 * to one model: vectors from different models for the same text would share
 * an entry.
 *
 * No method rejects. Store failures, timeouts and undecodable entries turn
 * into a miss (`lookup`) or a skipped write (`update`) and are reported
 * through the logger and `stats()`.
 */
export class EmbeddingsCache {
  readonly modelId?: string;
  private readonly logger: Logger;
  private readonly counters: CacheStats = { hits: 0, misses: 0, writes: 0, errors: 0 };

  constructor(
    readonly store: CacheStore,
    options: EmbeddingsCacheOptions = {},
  ) {
    this.modelId = options.modelId;
    const bindings: Record<string, unknown> = { component: 'embeddings-cache', store: store.kind };
    if (options.modelId) {
      bindings.model = options.modelId;
    }
    this.logger = (options.logger ?? new SilentLogger()).child(bindings);
  }

  /** Returns the cached vector for `text`, or undefined when the caller must compute it. */
  async lookup(text: string): Promise<EmbeddingVector | undefined> {
    const key = deriveKey(text);
    const hex = keyToHex(key);

    return this.recover('lookup', hex, async () => {
      const bytes = await this.store.get(key);
      if (bytes === undefined) {
        this.counters.misses += 1;
        this.logger.debug(`miss ${hex}`);
        return undefined;
      }

      const vector = decodeVector(bytes);
      this.counters.hits += 1;
      this.logger.debug(`hit ${hex} (${vector.length} dims)`);
      return vector;
    });
  }

  /** Stores `vector` as the embedding of `text`, replacing any earlier entry. */
  async update(text: string, vector: readonly number[]): Promise<void> {
    const key = deriveKey(text);
    const hex = keyToHex(key);

    await this.recover('update', hex, async () => {
      const bytes = encodeVector(vector);
      await this.store.set(key, bytes);
      this.counters.writes += 1;
      this.logger.debug(`stored ${hex} (${vector.length} dims, ${bytes.length} bytes)`);
    });
  }

  stats(): CacheStats {
    return { ...this.counters };
  }

  /** Closes the underlying store; a failure to close is logged like any other. */
  async close(): Promise<void> {
    await this.recover('close', undefined, () => this.store.close());
  }

  /**
   * The one place cache failures are absorbed. A failed lookup also counts
   * as a miss, since the caller goes on to compute the vector.
   */
  private async recover<T>(
    operation: CacheOperation,
    key: string | undefined,
    action: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await action();
    } catch (error) {
      this.counters.errors += 1;
      if (operation === 'lookup') {
        this.counters.misses += 1;
      }
      this.report(operation, key, error);
      return undefined;
    }
  }

  private report(operation: CacheOperation, key: string | undefined, error: unknown): void {
    const err = toError(error);
    const message = redactString(err.message).redacted;
    const event: CacheBackendError = {
      schemaVersion: CACHE_EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      store: this.store.kind,
      location: this.store.describe(),
      type: 'CacheBackendError',
      payload: {
        operation,
        key,
        code: err instanceof AppError ? err.code : 'UnknownError',
        message,
      },
    };

    if (isRecoverableCacheError(err)) {
      this.logger.trace(event, `${operation} degraded: ${message}`);
    } else {
      this.logger.log(event);
      this.logger.error(err, `unexpected ${operation} failure`);
    }
  }
}

export type CreateEmbeddingsCacheOptions = CacheStoreFactoryOptions;

/** Builds the configured store and wraps it in an EmbeddingsCache. */
export function createEmbeddingsCache(
  config: EmbeddingsCacheConfig,
  options: CreateEmbeddingsCacheOptions = {},
): EmbeddingsCache {
  const store = createCacheStore(config, options);
  return new EmbeddingsCache(store, { logger: options.logger, modelId: config.modelId });
}
