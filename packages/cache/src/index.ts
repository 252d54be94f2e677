export const name = '@embedcache/cache';

export * from './key';
export * from './codec';
export type { CacheStore } from './store/store';
export { InMemoryStore } from './store/memory';
export { RedisStore, type RedisStoreOptions } from './store/redis';
export { createCacheStore, resolveRemoteOptions, type CacheStoreFactoryOptions } from './store/factory';
export { withTimeout } from './store/timeout';
export * from './config/loader';
export * from './embeddings-cache';
