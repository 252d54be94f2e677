import type { EmbeddingsCache } from '@embedcache/cache';
import type { Embedder } from './embedder';

/**
 * Puts an EmbeddingsCache in front of another embedder. The cache must be
 * dedicated to the wrapped embedder's model, since keys carry no model id.
 */
export class CachingEmbedder implements Embedder {
  constructor(
    private readonly underlyingEmbedder: Embedder,
    private readonly cache: EmbeddingsCache,
  ) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const cached = await Promise.all(texts.map((text) => this.cache.lookup(text)));

    const pending: string[] = [];
    const seen = new Set<string>();
    texts.forEach((text, i) => {
      if (cached[i] === undefined && !seen.has(text)) {
        seen.add(text);
        pending.push(text);
      }
    });

    const computed = new Map<string, number[]>();
    if (pending.length > 0) {
      const embeddings = await this.underlyingEmbedder.embedTexts(pending);
      if (embeddings.length !== pending.length) {
        throw new Error(
          `${this.underlyingEmbedder.id()} returned ${embeddings.length} embeddings for ${pending.length} texts`,
        );
      }
      pending.forEach((text, i) => computed.set(text, embeddings[i]));
      await Promise.all(pending.map((text, i) => this.cache.update(text, embeddings[i])));
    }

    return texts.map((text, i) => {
      const vector = cached[i] ?? computed.get(text);
      if (vector === undefined) {
        throw new Error(`No embedding produced for input ${i}`);
      }
      return [...vector];
    });
  }

  async embedQuery(text: string): Promise<number[]> {
    const hit = await this.cache.lookup(text);
    if (hit !== undefined) {
      return hit;
    }
    const [vector] = await this.underlyingEmbedder.embedTexts([text]);
    if (vector === undefined) {
      throw new Error(`${this.underlyingEmbedder.id()} returned no embedding for the query`);
    }
    await this.cache.update(text, vector);
    return vector;
  }

  dims(): number {
    return this.underlyingEmbedder.dims();
  }

  id(): string {
    return `cached(${this.underlyingEmbedder.id()})`;
  }
}
