import { ConfigError, type StorageConfig } from '@repoindex/shared';
import type { VectorStore } from './backend';
import { MemoryVectorBackend } from './memory-backend';
import { SQLiteVectorBackend } from './sqlite/sqlite-backend';

export type VectorStoreConfig = StorageConfig['vectors'];

/** Creates the configured vector store; call init() before use. */
export function createVectorStore(config: VectorStoreConfig): VectorStore {
  switch (config.backend) {
    case 'memory':
      return new MemoryVectorBackend();
    case 'sqlite':
      return new SQLiteVectorBackend(config.path);
    default:
      throw new ConfigError(`Vector backend "${String(config.backend)}" is not implemented.`);
  }
}
