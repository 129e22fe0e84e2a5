import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { StoreError, TaskConflictError } from '@repoindex/shared';
import { IndexStateStore, type NewRepository } from './store';

const repoInput: NewRepository = {
  url: 'https://github.com/acme/widgets',
  name: 'acme/widgets',
  platform: 'github',
  defaultBranch: 'main',
  localPath: null,
};

describe('IndexStateStore', () => {
  let tempDir: string;
  let dbPath: string;
  let store: IndexStateStore;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'state-test-'));
    dbPath = join(tempDir, 'nested', 'state.sqlite');
    store = new IndexStateStore(dbPath);
    store.init();
  });

  afterEach(() => {
    store.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('throws before init', () => {
    const fresh = new IndexStateStore(join(tempDir, 'other.sqlite'));
    expect(() => fresh.listRepositories()).toThrow(StoreError);
  });

  describe('repositories', () => {
    it('creates, finds and updates repositories', () => {
      const repo = store.createRepository(repoInput);
      expect(repo).toMatchObject({ ...repoInput, status: 'pending', lastSyncedAt: null });

      expect(store.getRepository(repo.id)).toEqual(repo);
      expect(store.findRepositoryByUrl(repoInput.url)?.id).toBe(repo.id);
      expect(store.findRepositoryByUrl('https://github.com/acme/other')).toBeNull();

      const updated = store.updateRepository(repo.id, { status: 'ready', localPath: '/tmp/w' });
      expect(updated.status).toBe('ready');
      expect(updated.localPath).toBe('/tmp/w');
      expect(updated.name).toBe('acme/widgets');
    });

    it('rejects a duplicate url', () => {
      store.createRepository(repoInput);
      expect(() => store.createRepository(repoInput)).toThrow();
    });

    it('fails to update a missing repository', () => {
      expect(() => store.updateRepository('nope', { status: 'ready' })).toThrow(
        'Repository nope does not exist',
      );
    });

    it('cascades deletion to tasks, checkpoints and structural index', () => {
      const repo = store.createRepository(repoInput);
      const task = store.createTask(repo.id, 'full-reindex');
      store.commitCheckpoints(repo.id, [{ filePath: 'a.py', fileHash: 'h', revision: null, chunkIds: ['c1'] }], []);
      store.saveStructuralIndex(repo.id, {});

      expect(store.deleteRepository(repo.id)).toBe(true);
      expect(store.getTask(task.id)).toBeNull();
      expect(store.getCheckpoints(repo.id)).toEqual([]);
      expect(store.getStructuralIndex(repo.id)).toBeNull();
      expect(store.deleteRepository(repo.id)).toBe(false);
    });
  });

  describe('tasks', () => {
    it('creates a pending task', () => {
      const repo = store.createRepository(repoInput);
      const task = store.createTask(repo.id, 'incremental-sync');
      expect(task).toMatchObject({
        repoId: repo.id,
        type: 'incremental-sync',
        status: 'pending',
        progressPct: 0,
        attempt: 0,
        finishedAt: null,
      });
      expect(store.getTask(task.id)).toEqual(task);
      expect(store.findActiveTask(repo.id)?.id).toBe(task.id);
    });

    it('allows one active task per repository', () => {
      const repo = store.createRepository(repoInput);
      const first = store.createTask(repo.id, 'full-reindex');

      let conflict: unknown;
      try {
        store.createTask(repo.id, 'incremental-sync');
      } catch (error) {
        conflict = error;
      }
      expect(conflict).toBeInstanceOf(TaskConflictError);
      expect(conflict).toMatchObject({ existingTaskId: first.id });

      store.transitionTask(first.id, 'pending', 'cancelled');
      expect(store.createTask(repo.id, 'incremental-sync').status).toBe('pending');
      expect(store.listTasks(repo.id)).toHaveLength(2);
    });

    it('backs the guard with a partial unique index', () => {
      const repo = store.createRepository(repoInput);
      store.createTask(repo.id, 'full-reindex');
      store.close();

      const raw = new Database(dbPath);
      try {
        expect(() =>
          raw
            .prepare(
              `INSERT INTO tasks (id, repoId, type, status, createdAt, updatedAt)
               VALUES ('x', ?, 'full-reindex', 'parsing', 'now', 'now')`,
            )
            .run(repo.id),
        ).toThrow(/UNIQUE/);
        raw
          .prepare(
            `INSERT INTO tasks (id, repoId, type, status, createdAt, updatedAt)
             VALUES ('y', ?, 'full-reindex', 'failed', 'now', 'now')`,
          )
          .run(repo.id);
      } finally {
        raw.close();
      }
      store.init();
    });

    it('transitions with compare-and-set', () => {
      const repo = store.createRepository(repoInput);
      const task = store.createTask(repo.id, 'full-reindex');

      const acquiring = store.transitionTask(task.id, 'pending', 'acquiring', {
        progressPct: 5,
        currentStage: 'Acquiring repository',
      });
      expect(acquiring).toMatchObject({ status: 'acquiring', progressPct: 5, finishedAt: null });

      expect(store.transitionTask(task.id, 'pending', 'parsing')).toBeNull();
      expect(store.getTask(task.id)?.status).toBe('acquiring');

      const failed = store.transitionTask(task.id, 'acquiring', 'failed', {
        failedAtStage: 'acquiring',
        errorMessage: 'clone failed',
      });
      expect(failed?.status).toBe('failed');
      expect(failed?.failedAtStage).toBe('acquiring');
      expect(failed?.finishedAt).not.toBeNull();
      expect(store.findActiveTask(repo.id)).toBeNull();
    });

    it('updates progress only while the task is live', () => {
      const repo = store.createRepository(repoInput);
      const task = store.createTask(repo.id, 'full-reindex');

      expect(store.updateTaskProgress(task.id, { filesTotal: 10, filesProcessed: 3 })).toMatchObject({
        filesTotal: 10,
        filesProcessed: 3,
        status: 'pending',
      });

      store.transitionTask(task.id, 'pending', 'cancelled');
      expect(store.updateTaskProgress(task.id, { filesProcessed: 4 })).toBeNull();
      expect(store.getTask(task.id)?.filesProcessed).toBe(3);
    });

    it('marks leftover tasks interrupted', () => {
      const a = store.createRepository(repoInput);
      const b = store.createRepository({ ...repoInput, url: 'https://gitlab.com/acme/b', name: 'acme/b' });
      const live = store.createTask(a.id, 'full-reindex');
      store.transitionTask(live.id, 'pending', 'acquiring');
      const done = store.createTask(b.id, 'full-reindex');
      store.transitionTask(done.id, 'pending', 'completed');

      const interrupted = store.markInterrupted();

      expect(interrupted.map((t) => [t.id, t.status])).toEqual([[live.id, 'acquiring']]);
      expect(store.getTask(live.id)).toMatchObject({
        status: 'interrupted',
        errorMessage: 'Interrupted by engine restart',
      });
      expect(store.getTask(done.id)?.status).toBe('completed');
    });
  });

  describe('checkpoints', () => {
    it('upserts and deletes in one commit', () => {
      const repo = store.createRepository(repoInput);
      store.commitCheckpoints(
        repo.id,
        [
          { filePath: 'b.py', fileHash: 'hb', revision: 'abc', chunkIds: ['b1', 'b2'] },
          { filePath: 'a.py', fileHash: 'ha', revision: 'abc', chunkIds: ['a1'] },
        ],
        [],
      );
      store.commitCheckpoints(
        repo.id,
        [{ filePath: 'a.py', fileHash: 'ha2', revision: 'def', chunkIds: [] }],
        ['b.py'],
      );

      const checkpoints = store.getCheckpoints(repo.id);
      expect(checkpoints.map((c) => [c.filePath, c.fileHash, c.revision, c.chunkIds, c.chunkCount])).toEqual([
        ['a.py', 'ha2', 'def', [], 0],
      ]);
      expect(store.getCheckpoint(repo.id, 'b.py')).toBeNull();
    });

    it('keeps chunk id order', () => {
      const repo = store.createRepository(repoInput);
      store.commitCheckpoints(repo.id, [{ filePath: 'a.py', fileHash: 'h', revision: null, chunkIds: ['z', 'a', 'm'] }], []);
      expect(store.getCheckpoint(repo.id, 'a.py')?.chunkIds).toEqual(['z', 'a', 'm']);
    });

    it('rolls back the whole commit on failure', () => {
      const repo = store.createRepository(repoInput);
      store.commitCheckpoints(repo.id, [{ filePath: 'a.py', fileHash: 'h1', revision: null, chunkIds: ['a1'] }], []);

      expect(() =>
        store.commitCheckpoints(
          'missing-repo',
          [{ filePath: 'x.py', fileHash: 'h', revision: null, chunkIds: [] }],
          [],
        ),
      ).toThrow(/FOREIGN KEY/);
      expect(store.getCheckpoints(repo.id)).toHaveLength(1);
    });

    it('replaces every checkpoint', () => {
      const repo = store.createRepository(repoInput);
      store.commitCheckpoints(repo.id, [{ filePath: 'old.py', fileHash: 'h', revision: null, chunkIds: ['o'] }], []);
      store.replaceCheckpoints(repo.id, [{ filePath: 'new.py', fileHash: 'n', revision: null, chunkIds: ['n1'] }]);
      expect(store.getCheckpoints(repo.id).map((c) => c.filePath)).toEqual(['new.py']);
    });
  });

  it('stores the structural index', () => {
    const repo = store.createRepository(repoInput);
    const index = { 'a.py': { language: 'python', functions: ['foo'], classes: [], constants: ['MAX'] } };
    store.saveStructuralIndex(repo.id, index);
    store.saveStructuralIndex(repo.id, index);
    expect(store.getStructuralIndex(repo.id)).toEqual(index);
  });

  it('persists across reopen', () => {
    const repo = store.createRepository(repoInput);
    store.close();
    const reopened = new IndexStateStore(dbPath);
    reopened.init();
    expect(reopened.getRepository(repo.id)?.url).toBe(repoInput.url);
    reopened.close();
  });
});
