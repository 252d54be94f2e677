import { createHash } from 'crypto';
import type { Embedder } from './embedder';

/** Deterministic stand-in for a real model: vectors are spread from a SHA-256 digest. */
export class LocalHashEmbedder implements Embedder {
  constructor(private readonly dimensions: number = 384) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => {
      // newlines fold to spaces, as before a real model call
      const normalizedText = text.replace(/\n/g, ' ').trim().toLowerCase();
      const hash = createHash('sha256').update(normalizedText).digest();

      const floatArray = new Array<number>(this.dimensions).fill(0);
      for (let i = 0; i < this.dimensions; i++) {
        floatArray[i] = hash.readUInt8(i % hash.length) / 255.0;
      }

      return this.l2Normalize(floatArray);
    });
  }

  dims(): number {
    return this.dimensions;
  }

  id(): string {
    return `local-hash:${this.dimensions}`;
  }

  private l2Normalize(arr: number[]): number[] {
    const norm = Math.sqrt(arr.reduce((sum, val) => sum + val * val, 0));
    if (norm === 0) {
      return arr;
    }
    return arr.map((val) => val / norm);
  }
}
