import { createHash } from 'node:crypto';
import type { ChunkNode } from '@repoindex/shared';

export type ChunkIdentity = Pick<
  ChunkNode,
  'filePath' | 'kind' | 'name' | 'startLine' | 'endLine' | 'partIndex' | 'fileHash'
>;

/**
 * Deterministic chunk id: the same unit of the same file content always
 * maps to the same id, so re-embedding it overwrites instead of duplicating.
 */
export function computeChunkId(chunk: ChunkIdentity): string {
  return createHash('sha256')
    .update(
      `${chunk.filePath}-${chunk.kind}-${chunk.name}-${chunk.startLine}-${chunk.endLine}-${chunk.partIndex ?? 0}-${chunk.fileHash}`,
    )
    .digest('hex');
}

/** `ceil(chars / 4)`, the estimate every size budget is measured in. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
