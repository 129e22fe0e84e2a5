import { LRUCache, ProviderError } from '@repoindex/shared';
import { hash } from 'ohash';
import type { EmbedOptions, Embedder } from './embedder';

/** Cached vectors, one entry per distinct text */
const EMBEDDING_CACHE_MAX_SIZE = 2000;

/**
 * Per-text cache in front of another embedder; only misses reach the
 * underlying provider, deduplicated.
 */
export class CachingEmbedder implements Embedder {
  private cache: LRUCache<string, number[]>;

  constructor(
    private readonly underlyingEmbedder: Embedder,
    maxEntries: number = EMBEDDING_CACHE_MAX_SIZE,
  ) {
    this.cache = new LRUCache(maxEntries);
  }

  async embedTexts(texts: string[], opts?: EmbedOptions): Promise<number[][]> {
    const keys = texts.map((text) => hash(text));
    const found = new Map<string, number[]>();
    const misses = new Map<string, string>();

    keys.forEach((key, i) => {
      const cached = this.cache.get(key);
      if (cached) {
        found.set(key, cached);
      } else {
        misses.set(key, texts[i]);
      }
    });

    if (misses.size > 0) {
      const missKeys = [...misses.keys()];
      const vectors = await this.underlyingEmbedder.embedTexts([...misses.values()], opts);
      if (vectors.length !== missKeys.length) {
        throw new ProviderError(
          `${this.underlyingEmbedder.id()} returned ${vectors.length} embeddings for ${missKeys.length} inputs`,
        );
      }
      missKeys.forEach((key, i) => {
        this.cache.set(key, vectors[i]);
        found.set(key, vectors[i]);
      });
    }

    return keys.map((key) => {
      const vector = found.get(key);
      if (!vector) {
        throw new ProviderError(`Missing embedding for cache key ${key}`);
      }
      return vector;
    });
  }

  dims(): number {
    return this.underlyingEmbedder.dims();
  }

  id(): string {
    return `cached(${this.underlyingEmbedder.id()})`;
  }
}
