import { z } from 'zod';

/** Longest delay a Node timer honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const RemoteCacheConfigSchema = z.object({
  /** Connection URL (redis://[user:password@]host[:port][/db]); wins over host/port/db */
  url: z.string().min(1).optional(),
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(6379),
  db: z.number().int().min(0).default(0),
  username: z.string().optional(),
  password: z.string().optional(),
  /** Name of an environment variable holding the password */
  passwordEnv: z.string().min(1).optional(),
  /** Prepended to every key; empty keeps keys byte-identical to the digest */
  keyPrefix: z.string().default(''),
  /** Bounded wait for a single GET/SET, including connection setup */
  timeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(1000),
  connectTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(2000),
  maxRetriesPerRequest: z.number().int().min(0).default(1),
});

export type RemoteCacheConfig = z.infer<typeof RemoteCacheConfigSchema>;

export const DEFAULT_REMOTE_CACHE_CONFIG: RemoteCacheConfig = {
  host: '127.0.0.1',
  port: 6379,
  db: 0,
  keyPrefix: '',
  timeoutMs: 1000,
  connectTimeoutMs: 2000,
  maxRetriesPerRequest: 1,
};

export const CacheBackendSchema = z.enum(['memory', 'redis']);
export type CacheBackend = z.infer<typeof CacheBackendSchema>;

export const EmbeddingsCacheConfigSchema = z
  .object({
    backend: CacheBackendSchema.default('memory'),
    /** The single embedding model this cache is scoped to. Never part of the key. */
    modelId: z.string().min(1).optional(),
    remote: RemoteCacheConfigSchema.optional(),
  })
  .refine((data) => data.backend !== 'redis' || data.remote !== undefined, {
    message: "remote connection parameters are required when backend is 'redis'",
    path: ['remote'],
  });

export type EmbeddingsCacheConfig = z.infer<typeof EmbeddingsCacheConfigSchema>;
export type EmbeddingsCacheConfigInput = z.input<typeof EmbeddingsCacheConfigSchema>;
