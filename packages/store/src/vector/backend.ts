import type { ChunkNode } from '@repoindex/shared';

/**
 * A chunk and its embedding. The chunk itself (content included) is the
 * stored metadata, so checkpoints can be rederived from the store alone.
 */
export interface VectorUpsertItem {
  vector: Float32Array;
  chunk: ChunkNode;
  embedderId: string;
}

export interface VectorQueryResult {
  id: string;
  score: number;
  chunk: ChunkNode;
}

export interface VectorQueryFilter {
  /** Only chunks whose path starts with this prefix */
  filePrefix?: string;
}

export interface VectorBackendInfo {
  backend: string;
  location: string;
  /** Stored chunks across all repositories */
  count: number;
}

/**
 * Common interface for vector storage backends. Ids are chunk ids and are
 * scoped by repository.
 */
export interface VectorStore {
  /** Opens the store and applies migrations; safe to call twice */
  init(): Promise<void>;

  upsert(repoId: string, items: VectorUpsertItem[]): Promise<void>;

  /** Top `topK` chunks by cosine similarity, ties broken by id */
  query(
    repoId: string,
    queryVector: Float32Array,
    topK: number,
    filter?: VectorQueryFilter,
  ): Promise<VectorQueryResult[]>;

  /** Chunks in the requested order; unknown ids are omitted */
  getChunks(repoId: string, ids: string[]): Promise<ChunkNode[]>;

  /** Every chunk of the repository ordered by path, line and part */
  listChunks(repoId: string): Promise<ChunkNode[]>;

  /** Chunk ids stored for one file */
  listIdsForFile(repoId: string, filePath: string): Promise<string[]>;

  /** The subset of `ids` the store does not hold */
  missingIds(repoId: string, ids: string[]): Promise<string[]>;

  /** Returns the number of entries removed */
  deleteByIds(repoId: string, ids: string[]): Promise<number>;

  /** Removes every chunk of the given files; returns the number removed */
  deleteByFiles(repoId: string, filePaths: string[]): Promise<number>;

  wipeRepo(repoId: string): Promise<void>;

  info(): Promise<VectorBackendInfo>;

  close(): Promise<void>;
}
