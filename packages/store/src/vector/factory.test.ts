import { describe, it, expect } from 'vitest';
import { StorageConfigSchema } from '@repoindex/shared';
import { createVectorStore } from './factory';
import { MemoryVectorBackend } from './memory-backend';
import { SQLiteVectorBackend } from './sqlite/sqlite-backend';

describe('createVectorStore', () => {
  it('creates the configured backend', () => {
    const defaults = StorageConfigSchema.parse({}).vectors;
    expect(createVectorStore(defaults)).toBeInstanceOf(SQLiteVectorBackend);
    expect(createVectorStore({ ...defaults, backend: 'memory' })).toBeInstanceOf(MemoryVectorBackend);
  });

  it('rejects unknown backends', () => {
    const defaults = StorageConfigSchema.parse({}).vectors;
    expect(() => createVectorStore({ ...defaults, backend: 'qdrant' as never })).toThrow(
      'Vector backend "qdrant" is not implemented.',
    );
  });
});
