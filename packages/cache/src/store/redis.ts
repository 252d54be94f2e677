import Redis, { type RedisOptions } from 'ioredis';
import {
  AppError,
  BackendUnavailableError,
  TimeoutError,
  SilentLogger,
  redactConnectionUrl,
  redactString,
} from '@embedcache/shared';
import type { Logger, RemoteCacheConfig } from '@embedcache/shared';
import type { CacheKey } from '../key';
import type { CacheStore } from './store';
import { withTimeout } from './timeout';

/** Connection parameters after `passwordEnv` has been resolved. */
export type RedisStoreOptions = Omit<RemoteCacheConfig, 'passwordEnv'>;

type RedisOperation = 'GET' | 'SET';

/**
 * Remote store on a Redis server. GET and SET map one-to-one onto the cache
 * operations; key and value bytes are sent unchanged (plus `keyPrefix`).
 *
 * ioredis owns the connection: it connects lazily on the first command and
 * reconnects in the background. Every command is bounded by `timeoutMs`.
 */
export class RedisStore implements CacheStore {
  readonly kind = 'redis';
  private readonly client: Redis;
  private readonly timeoutMs: number;
  private readonly location: string;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: RedisStoreOptions, logger: Logger = new SilentLogger()) {
    this.timeoutMs = options.timeoutMs;
    this.location = options.url
      ? redactConnectionUrl(options.url)
      : `redis://${options.host}:${options.port}/${options.db}`;
    this.logger = logger.child({ store: 'redis' });

    const redisOptions: RedisOptions = {
      host: options.host,
      port: options.port,
      db: options.db,
      username: options.username,
      password: options.password,
      keyPrefix: options.keyPrefix,
      connectTimeout: options.connectTimeoutMs,
      commandTimeout: options.timeoutMs,
      maxRetriesPerRequest: options.maxRetriesPerRequest,
      lazyConnect: true,
    };

    // A URL is parsed first, so its host/port/db/credentials win over the options.
    this.client = options.url ? new Redis(options.url, redisOptions) : new Redis(redisOptions);

    this.client.on('error', (error: Error) => {
      this.logger.debug(`client error on ${this.location}: ${redactString(error.message).redacted}`);
    });
  }

  async get(key: CacheKey): Promise<Buffer | undefined> {
    const value = await this.run('GET', () => this.client.getBuffer(key));
    return value ?? undefined;
  }

  async set(key: CacheKey, value: Buffer): Promise<void> {
    await this.run('SET', () => this.client.set(key, value));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.client.status === 'wait') {
      // Never connected; quitting would open a connection just to close it.
      this.client.disconnect();
      return;
    }

    try {
      await withTimeout(this.client.quit(), this.timeoutMs, 'redis QUIT');
    } catch (error) {
      this.logger.debug(`QUIT failed, disconnecting: ${describeError(error)}`);
      this.client.disconnect();
    }
  }

  describe(): string {
    return this.location;
  }

  private async run<T>(operation: RedisOperation, command: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new BackendUnavailableError(`redis ${operation} on closed store ${this.location}`, {
        details: { store: this.kind, operation },
      });
    }

    try {
      return await withTimeout(command(), this.timeoutMs, `redis ${operation}`);
    } catch (error) {
      throw this.mapError(operation, error);
    }
  }

  private mapError(operation: RedisOperation, error: unknown): AppError {
    if (error instanceof AppError) return error;

    const message = describeError(error);
    const details = { store: this.kind, operation, location: this.location };

    // ioredis rejects with "Command timed out" when commandTimeout fires first.
    if (/timed out/i.test(message)) {
      return new TimeoutError(`redis ${operation} timed out: ${message}`, {
        cause: error,
        details,
        timeoutMs: this.timeoutMs,
      });
    }
    return new BackendUnavailableError(`redis ${operation} failed: ${message}`, {
      cause: error,
      details,
    });
  }
}

function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return redactString(message).redacted;
}
