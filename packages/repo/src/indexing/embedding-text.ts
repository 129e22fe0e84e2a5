import type { ChunkNode } from '@repoindex/shared';
import { isDocumentChunk } from './documents';

/** Text sent to the embedding provider for one chunk. */
export function toEmbeddingText(
  chunk: Pick<ChunkNode, 'language' | 'kind' | 'name' | 'filePath' | 'docstring' | 'content'>,
): string {
  const parts = [
    `Language: ${chunk.language}`,
    `Type: ${chunk.kind}`,
    `Name: ${chunk.name}`,
    `File: ${chunk.filePath}`,
  ];
  if (chunk.docstring) {
    parts.push(`Documentation: ${chunk.docstring}`);
  }
  parts.push(`${isDocumentChunk(chunk) ? 'Content' : 'Code'}:\n${chunk.content}`);
  return parts.join('\n');
}
