import { StoreError, type ChunkNode } from '@repoindex/shared';
import type {
  VectorBackendInfo,
  VectorQueryFilter,
  VectorQueryResult,
  VectorStore,
  VectorUpsertItem,
} from './backend';
import { compareByScore, compareChunks, cosineSimilarity } from './similarity';

interface StoredItem {
  vector: Float32Array;
  chunk: ChunkNode;
}

/** In-process vector store for tests and throwaway runs */
export class MemoryVectorBackend implements VectorStore {
  private data = new Map<string, Map<string, StoredItem>>();
  private initialized = false;

  async init(): Promise<void> {
    this.initialized = true;
  }

  private repo(repoId: string): Map<string, StoredItem> {
    if (!this.initialized) {
      throw new StoreError('MemoryVectorBackend not initialized. Call init() first.');
    }
    let repoData = this.data.get(repoId);
    if (!repoData) {
      repoData = new Map();
      this.data.set(repoId, repoData);
    }
    return repoData;
  }

  async upsert(repoId: string, items: VectorUpsertItem[]): Promise<void> {
    const repoData = this.repo(repoId);
    for (const item of items) {
      repoData.set(item.chunk.id, { vector: Float32Array.from(item.vector), chunk: item.chunk });
    }
  }

  async query(
    repoId: string,
    queryVector: Float32Array,
    topK: number,
    filter?: VectorQueryFilter,
  ): Promise<VectorQueryResult[]> {
    const results: VectorQueryResult[] = [];
    for (const item of this.repo(repoId).values()) {
      if (filter?.filePrefix && !item.chunk.filePath.startsWith(filter.filePrefix)) continue;
      if (item.vector.length !== queryVector.length) continue;
      results.push({
        id: item.chunk.id,
        score: cosineSimilarity(queryVector, item.vector),
        chunk: item.chunk,
      });
    }
    return results.sort(compareByScore).slice(0, Math.max(0, topK));
  }

  async getChunks(repoId: string, ids: string[]): Promise<ChunkNode[]> {
    const repoData = this.repo(repoId);
    const chunks: ChunkNode[] = [];
    for (const id of ids) {
      const item = repoData.get(id);
      if (item) chunks.push(item.chunk);
    }
    return chunks;
  }

  async listChunks(repoId: string): Promise<ChunkNode[]> {
    return [...this.repo(repoId).values()].map((i) => i.chunk).sort(compareChunks);
  }

  async listIdsForFile(repoId: string, filePath: string): Promise<string[]> {
    return [...this.repo(repoId).values()]
      .filter((i) => i.chunk.filePath === filePath)
      .map((i) => i.chunk)
      .sort(compareChunks)
      .map((c) => c.id);
  }

  async missingIds(repoId: string, ids: string[]): Promise<string[]> {
    const repoData = this.repo(repoId);
    return ids.filter((id) => !repoData.has(id));
  }

  async deleteByIds(repoId: string, ids: string[]): Promise<number> {
    const repoData = this.repo(repoId);
    let removed = 0;
    for (const id of ids) {
      if (repoData.delete(id)) removed++;
    }
    return removed;
  }

  async deleteByFiles(repoId: string, filePaths: string[]): Promise<number> {
    const paths = new Set(filePaths);
    const repoData = this.repo(repoId);
    let removed = 0;
    for (const [id, item] of repoData) {
      if (paths.has(item.chunk.filePath)) {
        repoData.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async wipeRepo(repoId: string): Promise<void> {
    this.data.delete(repoId);
  }

  async info(): Promise<VectorBackendInfo> {
    let count = 0;
    for (const repoData of this.data.values()) count += repoData.size;
    return { backend: 'memory', location: 'memory', count };
  }

  async close(): Promise<void> {
    this.initialized = false;
  }
}
