import { describe, it, expect } from 'vitest';
import { LocalHashEmbedder } from './local_hash_embedder';

function cosine(a: number[], b: number[]): number {
  return a.reduce((sum, v, i) => sum + v * b[i], 0);
}

describe('LocalHashEmbedder', () => {
  it('hashes tokens into signed buckets', async () => {
    const embedder = new LocalHashEmbedder(8);
    const [vector] = await embedder.embedTexts(['foo foo bar']);

    const expected = [0, 0, 0, 2 / Math.sqrt(5), 0, 0, -1 / Math.sqrt(5), 0];
    expected.forEach((value, i) => expect(vector[i]).toBeCloseTo(value, 10));
  });

  it('is case-insensitive and deterministic', async () => {
    const embedder = new LocalHashEmbedder(8);
    const [upper] = await embedder.embedTexts(['Foo']);
    const [lower] = await embedder.embedTexts(['foo']);
    expect(upper).toEqual(lower);
    expect(upper).toEqual([0, 0, 0, 1, 0, 0, 0, 0]);
  });

  it('produces unit vectors of the configured width', async () => {
    const embedder = new LocalHashEmbedder(128);
    const [vector] = await embedder.embedTexts(['def load_user(user_id): return db.get(user_id)']);
    expect(vector).toHaveLength(128);
    expect(Math.sqrt(cosine(vector, vector))).toBeCloseTo(1, 10);
    expect(embedder.dims()).toBe(128);
    expect(embedder.id()).toBe('local-hash:128');
  });

  it('places texts with shared identifiers closer together', async () => {
    const embedder = new LocalHashEmbedder(256);
    const [query, related, unrelated] = await embedder.embedTexts([
      'parse config file',
      'def parse_config(path): read config file',
      'render html template with styles',
    ]);
    expect(cosine(query, related)).toBeGreaterThan(cosine(query, unrelated));
  });

  it('returns a zero vector for text without tokens', async () => {
    const embedder = new LocalHashEmbedder(4);
    await expect(embedder.embedTexts(['  ---  '])).resolves.toEqual([[0, 0, 0, 0]]);
  });

  it('rejects a non-positive width', () => {
    expect(() => new LocalHashEmbedder(0)).toThrow(RangeError);
  });
});
