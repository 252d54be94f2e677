import { describe, it, expect } from 'vitest';
import {
  name,
  EmbeddingsCacheConfigSchema,
  DEFAULT_REMOTE_CACHE_CONFIG,
  MAX_TIMER_DELAY_MS,
} from './index';
import * as shared from './index';

describe('shared package', () => {
  it('exports name', () => {
    expect(name).toBe('@embedcache/shared');
  });

  it('exposes logger classes but no shared logger instance', () => {
    expect(shared).toHaveProperty('ConsoleLogger');
    expect(shared).toHaveProperty('SilentLogger');
    expect(shared).not.toHaveProperty('logger');
  });
});

describe('EmbeddingsCacheConfigSchema', () => {
  it('defaults to the in-memory backend', () => {
    expect(EmbeddingsCacheConfigSchema.parse({})).toEqual({ backend: 'memory' });
  });

  it('fills remote defaults from an empty section', () => {
    const config = EmbeddingsCacheConfigSchema.parse({ backend: 'redis', remote: {} });
    expect(config.remote).toEqual(DEFAULT_REMOTE_CACHE_CONFIG);
  });

  it('requires a remote section for the redis backend', () => {
    const result = EmbeddingsCacheConfigSchema.safeParse({ backend: 'redis' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['remote']);
    }
  });

  it('rejects unknown backends and non-positive timeouts', () => {
    expect(EmbeddingsCacheConfigSchema.safeParse({ backend: 'memcached' }).success).toBe(false);
    expect(
      EmbeddingsCacheConfigSchema.safeParse({ backend: 'redis', remote: { timeoutMs: 0 } }).success,
    ).toBe(false);
  });

  it('caps timeouts at the longest delay a timer can wait', () => {
    const accepts = (remote: Record<string, number>) =>
      EmbeddingsCacheConfigSchema.safeParse({ backend: 'redis', remote }).success;

    expect(accepts({ timeoutMs: MAX_TIMER_DELAY_MS })).toBe(true);
    expect(accepts({ timeoutMs: 2_147_483_648 })).toBe(false);
    expect(accepts({ connectTimeoutMs: 2_147_483_648 })).toBe(false);
  });
});
