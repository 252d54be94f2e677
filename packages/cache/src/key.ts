import { createHash } from 'crypto';

/** SHA-256 digest of a text's UTF-8 bytes. Always 32 bytes long. */
export type CacheKey = Buffer;

export const CACHE_KEY_BYTES = 32;

/**
 * Derives the cache key for a text.
 *
 * The key depends on the text alone, not on the model that will embed it,
 * so one cache instance must serve a single embedding model.
 */
export function deriveKey(text: string): CacheKey {
  return createHash('sha256').update(text, 'utf8').digest();
}

export function keyToHex(key: CacheKey): string {
  return key.toString('hex');
}
