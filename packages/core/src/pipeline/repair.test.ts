import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import { MemoryLogger, TaskConflictError, type ChunkNode } from '@repoindex/shared';
import type { IndexStateStore, MemoryVectorBackend } from '@repoindex/store';
import { makeTempDir } from '../__fixtures__/test-config';
import { LOCAL_REPO, makeChunk, openStores, unitVector } from '../__fixtures__/stores';
import { RepairService } from './repair';

describe('RepairService', () => {
  let root: string;
  let state: IndexStateStore;
  let vectors: MemoryVectorBackend;
  let logger: MemoryLogger;
  let repoId: string;
  let service: RepairService;

  const foo = makeChunk('a.py', 'foo', 1, 'h1');
  const bar = makeChunk('a.py', 'bar', 5, 'h1');
  const baz = makeChunk('b.py', 'baz', 1, 'h2');

  async function store(chunks: ChunkNode[]) {
    await vectors.upsert(
      repoId,
      chunks.map((chunk) => ({ vector: unitVector(4), chunk, embedderId: 'test' })),
    );
  }

  beforeEach(async () => {
    root = await makeTempDir('repair-');
    ({ state, vectors } = await openStores(root));
    logger = new MemoryLogger();
    repoId = state.createRepository(LOCAL_REPO).id;
    service = new RepairService(state, vectors, logger);
  });

  afterEach(async () => {
    state.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('refuses to run while a task is active', async () => {
    const task = state.createTask(repoId, 'incremental-sync');

    const error = await service.repair(repoId, 'verify', 'repair-1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TaskConflictError);
    expect(error).toMatchObject({ existingTaskId: task.id });
  });

  describe('verify', () => {
    it('drops damaged checkpoints and removes unreferenced vectors', async () => {
      const orphan = makeChunk('c.py', 'orphan', 1, 'h3');
      await store([foo, baz, orphan]);
      state.commitCheckpoints(
        repoId,
        [
          { filePath: 'a.py', fileHash: 'h1', revision: null, chunkIds: [foo.id, bar.id] },
          { filePath: 'b.py', fileHash: 'h2', revision: null, chunkIds: [baz.id] },
        ],
        [],
      );

      const report = await service.repair(repoId, 'verify', 'repair-1');

      expect(report).toEqual({
        repoId,
        mode: 'verify',
        checkedFiles: 2,
        inconsistentFiles: ['a.py'],
        orphanedChunksRemoved: 2,
        checkpointsRederived: 0,
        resyncTaskId: null,
      });
      expect(state.getCheckpoints(repoId).map((c) => c.filePath)).toEqual(['b.py']);
      expect((await vectors.listChunks(repoId)).map((c) => c.id)).toEqual([baz.id]);
      expect(logger.eventsOfType('ConsistencyErrorDetected')[0].payload).toEqual({
        path: 'a.py',
        missingChunkIds: 1,
      });
      expect(logger.eventsOfType('RepairFinished')[0].payload).toEqual({
        repoId,
        mode: 'verify',
        checkedFiles: 2,
        inconsistentFiles: 1,
        orphanedChunksRemoved: 2,
        checkpointsRederived: 0,
      });
    });

    it('changes nothing when checkpoints and vectors agree', async () => {
      await store([foo, bar]);
      state.commitCheckpoints(
        repoId,
        [{ filePath: 'a.py', fileHash: 'h1', revision: null, chunkIds: [foo.id, bar.id] }],
        [],
      );

      const report = await service.repair(repoId, 'verify', 'repair-2');

      expect(report.inconsistentFiles).toEqual([]);
      expect(report.orphanedChunksRemoved).toBe(0);
      expect(state.getCheckpoint(repoId, 'a.py')?.chunkIds).toEqual([foo.id, bar.id]);
    });
  });

  describe('rederive', () => {
    it('rebuilds checkpoints from the stored chunks', async () => {
      const stale = makeChunk('a.py', 'old', 9, 'h0');
      await store([foo, bar, stale, baz]);
      state.commitCheckpoints(
        repoId,
        [
          { filePath: 'a.py', fileHash: 'h1', revision: 'rev1', chunkIds: [foo.id] },
          { filePath: 'c.py', fileHash: 'h3', revision: null, chunkIds: ['missing'] },
        ],
        [],
      );

      const report = await service.repair(repoId, 'rederive', 'repair-3');

      expect(report).toEqual({
        repoId,
        mode: 'rederive',
        checkedFiles: 3,
        inconsistentFiles: ['a.py', 'b.py', 'c.py'],
        orphanedChunksRemoved: 1,
        checkpointsRederived: 2,
        resyncTaskId: null,
      });
      expect(state.getCheckpoint(repoId, 'a.py')).toMatchObject({
        fileHash: 'h1',
        revision: 'rev1',
        chunkIds: [foo.id, bar.id],
      });
      expect(state.getCheckpoint(repoId, 'b.py')).toMatchObject({
        fileHash: 'h2',
        revision: null,
        chunkIds: [baz.id],
      });
      expect(state.getCheckpoint(repoId, 'c.py')).toBeNull();
      expect(await vectors.missingIds(repoId, [stale.id])).toEqual([stale.id]);
    });

    it('reports no inconsistencies for matching checkpoints', async () => {
      await store([foo, bar]);
      state.commitCheckpoints(
        repoId,
        [{ filePath: 'a.py', fileHash: 'h1', revision: null, chunkIds: [foo.id, bar.id] }],
        [],
      );

      const report = await service.repair(repoId, 'rederive', 'repair-4');

      expect(report.inconsistentFiles).toEqual([]);
      expect(report.checkpointsRederived).toBe(1);
    });
  });
});
