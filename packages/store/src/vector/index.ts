export type {
  VectorBackendInfo,
  VectorQueryFilter,
  VectorQueryResult,
  VectorStore,
  VectorUpsertItem,
} from './backend';
export { MemoryVectorBackend } from './memory-backend';
export { SQLiteVectorBackend } from './sqlite/sqlite-backend';
export { createVectorStore } from './factory';
export type { VectorStoreConfig } from './factory';
export { cosineSimilarity } from './similarity';
