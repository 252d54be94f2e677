import type { CacheKey } from '../key';
import { keyToHex } from '../key';
import type { CacheStore } from './store';

/**
 * Process-local store backed by a Map. Entries live until the process exits;
 * there is no eviction and no capacity bound.
 *
 * Each method reads or writes the map without awaiting in between, so the
 * event loop serializes every operation: a get racing a set on the same key
 * sees either the previous or the new value. Values are copied in and out so
 * callers never share a buffer with the map.
 */
export class InMemoryStore implements CacheStore {
  readonly kind = 'memory';
  private entries: Map<string, Buffer> = new Map();

  async get(key: CacheKey): Promise<Buffer | undefined> {
    const value = this.entries.get(keyToHex(key));
    return value === undefined ? undefined : Buffer.from(value);
  }

  async set(key: CacheKey, value: Buffer): Promise<void> {
    this.entries.set(keyToHex(key), Buffer.from(value));
  }

  async delete(key: CacheKey): Promise<boolean> {
    return this.entries.delete(keyToHex(key));
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {
    // Nothing to release; entries stay readable until the process exits.
  }

  describe(): string {
    return 'memory';
  }
}
