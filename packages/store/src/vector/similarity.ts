import type { ChunkNode } from '@repoindex/shared';

/** Cosine similarity; 0 when either vector has no magnitude */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;
  return dotProduct / magnitude;
}

export function compareByScore(a: { score: number; id: string }, b: { score: number; id: string }): number {
  const scoreDiff = b.score - a.score;
  if (Math.abs(scoreDiff) > 1e-12) return scoreDiff;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function compareChunks(a: ChunkNode, b: ChunkNode): number {
  if (a.filePath !== b.filePath) return a.filePath < b.filePath ? -1 : 1;
  if (a.startLine !== b.startLine) return a.startLine - b.startLine;
  return (a.partIndex ?? 0) - (b.partIndex ?? 0);
}
