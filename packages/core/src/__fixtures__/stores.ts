import path from 'path';
import type { ChunkNode } from '@repoindex/shared';
import { computeChunkId } from '@repoindex/repo';
import { IndexStateStore, MemoryVectorBackend, type NewRepository } from '@repoindex/store';

export const LOCAL_REPO: NewRepository = {
  url: '/work/widgets',
  name: 'widgets',
  platform: 'local',
  defaultBranch: 'main',
  localPath: '/work/widgets',
};

export async function openStores(root: string) {
  const state = new IndexStateStore(path.join(root, 'state.sqlite'));
  state.init();
  const vectors = new MemoryVectorBackend();
  await vectors.init();
  return { state, vectors };
}

export function makeChunk(
  filePath: string,
  name: string,
  startLine: number,
  fileHash: string,
  overrides: Partial<ChunkNode> = {},
): ChunkNode {
  const base = {
    filePath,
    kind: 'function' as const,
    name,
    language: 'python',
    startLine,
    endLine: startLine + 1,
    content: `def ${name}():\n    pass`,
    calls: [],
    decorators: [],
    parentName: null,
    docstring: null,
    isOrmModel: false,
    ormFields: [],
    partIndex: null,
    partCount: null,
    fileHash,
    ...overrides,
  };
  return { ...base, id: computeChunkId(base) };
}

export function unitVector(dims: number): Float32Array {
  const vector = new Float32Array(dims);
  vector[0] = 1;
  return vector;
}
