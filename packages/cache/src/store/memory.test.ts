import { describe, it, expect } from 'vitest';
import { InMemoryStore } from './memory';
import { deriveKey } from '../key';

describe('InMemoryStore', () => {
  it('returns undefined for keys never written', async () => {
    const store = new InMemoryStore();
    await expect(store.get(deriveKey('missing'))).resolves.toBeUndefined();
  });

  it('gets, overwrites, deletes, clears, and tracks size', async () => {
    const store = new InMemoryStore();
    const key = deriveKey('a');

    expect(store.size).toBe(0);

    await store.set(key, Buffer.from([1, 2, 3]));
    expect(store.size).toBe(1);
    expect(await store.get(key)).toEqual(Buffer.from([1, 2, 3]));

    await store.set(key, Buffer.from([9]));
    expect(store.size).toBe(1);
    expect(await store.get(key)).toEqual(Buffer.from([9]));

    expect(await store.delete(key)).toBe(true);
    expect(await store.delete(key)).toBe(false);
    expect(await store.get(key)).toBeUndefined();

    await store.set(deriveKey('b'), Buffer.from([1]));
    await store.set(deriveKey('c'), Buffer.from([2]));
    store.clear();
    expect(store.size).toBe(0);
  });

  it('treats keys with equal bytes as the same entry', async () => {
    const store = new InMemoryStore();
    await store.set(deriveKey('same'), Buffer.from([1]));
    expect(await store.get(Buffer.from(deriveKey('same')))).toEqual(Buffer.from([1]));
  });

  it('isolates stored bytes from caller mutation', async () => {
    const store = new InMemoryStore();
    const key = deriveKey('isolated');
    const written = Buffer.from([1, 2, 3]);

    await store.set(key, written);
    written[0] = 42;

    const read = await store.get(key);
    expect(read).toEqual(Buffer.from([1, 2, 3]));

    read?.fill(0);
    expect(await store.get(key)).toEqual(Buffer.from([1, 2, 3]));
  });

  it('keeps entries readable after close', async () => {
    const store = new InMemoryStore();
    const key = deriveKey('after-close');
    await store.set(key, Buffer.from([7]));
    await store.close();
    expect(await store.get(key)).toEqual(Buffer.from([7]));
    expect(store.describe()).toBe('memory');
  });

  it('survives interleaved concurrent writers and readers', async () => {
    const store = new InMemoryStore();
    const key = deriveKey('contended');
    const values = Array.from({ length: 50 }, (_, i) => Buffer.from([i]));

    const results = await Promise.all(
      values.flatMap((value) => [store.set(key, value), store.get(key)]),
    );

    for (const result of results) {
      if (Buffer.isBuffer(result)) {
        expect(result).toHaveLength(1);
        expect(result[0]).toBeLessThan(50);
      }
    }
    expect((await store.get(key))?.[0]).toBe(49);
  });
});
