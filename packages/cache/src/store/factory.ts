import { ConfigError, SilentLogger } from '@embedcache/shared';
import type { EmbeddingsCacheConfig, Logger, RemoteCacheConfig } from '@embedcache/shared';
import type { CacheStore } from './store';
import { InMemoryStore } from './memory';
import { RedisStore, type RedisStoreOptions } from './redis';

export interface CacheStoreFactoryOptions {
  logger?: Logger;
  /** Environment consulted for `passwordEnv` (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

/** Resolves `passwordEnv` into a password, preferring an explicit `password`. */
export function resolveRemoteOptions(
  remote: RemoteCacheConfig,
  env: NodeJS.ProcessEnv = process.env,
): RedisStoreOptions {
  const { passwordEnv, ...options } = remote;
  if (options.password || !passwordEnv) {
    return options;
  }

  const password = env[passwordEnv];
  if (!password) {
    throw new ConfigError(`Missing password for remote cache: env var ${passwordEnv} is not set`);
  }
  return { ...options, password };
}

/** Builds the store selected by `config.backend`. */
export function createCacheStore(
  config: EmbeddingsCacheConfig,
  options: CacheStoreFactoryOptions = {},
): CacheStore {
  const logger = options.logger ?? new SilentLogger();

  switch (config.backend) {
    case 'memory':
      return new InMemoryStore();

    case 'redis': {
      if (!config.remote) {
        throw new ConfigError("remote connection parameters are required when backend is 'redis'");
      }
      return new RedisStore(resolveRemoteOptions(config.remote, options.env), logger);
    }

    default: {
      const unsupported: never = config.backend;
      throw new ConfigError(`Unsupported cache backend: ${String(unsupported)}`);
    }
  }
}
