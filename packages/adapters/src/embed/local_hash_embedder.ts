import { createHash } from 'crypto';
import type { Embedder } from './embedder';

const TOKEN = /[a-z0-9_]+/g;

/**
 * Offline embedder: a signed feature-hashing bag of words. Texts sharing
 * identifiers land close together, which is enough for tests and for
 * running without a provider.
 */
export class LocalHashEmbedder implements Embedder {
  constructor(private readonly dimensions: number = 384) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new RangeError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  dims(): number {
    return this.dimensions;
  }

  id(): string {
    return `local-hash:${this.dimensions}`;
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(TOKEN) ?? []) {
      const digest = createHash('sha256').update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      vector[bucket] += (digest[4] & 1) === 0 ? 1 : -1;
    }
    return l2Normalize(vector);
  }
}

function l2Normalize(arr: number[]): number[] {
  const norm = Math.sqrt(arr.reduce((sum, val) => sum + val * val, 0));
  if (norm === 0) {
    return arr;
  }
  return arr.map((val) => val / norm);
}
