import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';
import {
  StoreError,
  TaskConflictError,
  type FileCheckpoint,
  type IndexingTask,
  type PipelineStage,
  type RepositoryPlatform,
  type RepositorySnapshot,
  type RepositoryStatus,
  type StructuralIndex,
  type TaskStatus,
  type TaskType,
} from '@repoindex/shared';
import { CREATE_TABLES_SQL, SCHEMA_VERSION, TERMINAL_STATUSES } from './schema';
import { ChunkIdListSchema, StructuralIndexSchema, decodeJson } from '../codec';

type DB = Database.Database;

export interface NewRepository {
  url: string;
  name: string;
  platform: RepositoryPlatform;
  defaultBranch: string;
  localPath: string | null;
}

export type RepositoryPatch = Partial<
  Pick<RepositorySnapshot, 'name' | 'defaultBranch' | 'localPath' | 'status' | 'lastSyncedAt'>
>;

/** Fields a transition or progress update may set alongside the status. */
export type TaskPatch = Partial<
  Pick<
    IndexingTask,
    | 'progressPct'
    | 'currentStage'
    | 'filesTotal'
    | 'filesProcessed'
    | 'failedAtStage'
    | 'errorMessage'
    | 'attempt'
  >
>;

export interface CheckpointInput {
  filePath: string;
  fileHash: string;
  revision: string | null;
  chunkIds: string[];
}

interface RepositoryRow {
  id: string;
  url: string;
  name: string;
  platform: RepositoryPlatform;
  defaultBranch: string;
  localPath: string | null;
  status: RepositoryStatus;
  lastSyncedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

interface TaskRow {
  id: string;
  repoId: string;
  type: TaskType;
  status: TaskStatus;
  progressPct: number;
  currentStage: string | null;
  filesTotal: number;
  filesProcessed: number;
  failedAtStage: PipelineStage | null;
  errorMessage: string | null;
  attempt: number;
  createdAt: string;
  updatedAt: string;
  finishedAt: string | null;
}

interface CheckpointRow {
  repoId: string;
  filePath: string;
  fileHash: string;
  revision: string | null;
  chunkIdsJson: string;
  chunkCount: number;
  updatedAt: string;
}

const TERMINAL = new Set<TaskStatus>(TERMINAL_STATUSES);
const TERMINAL_LIST = TERMINAL_STATUSES.map((s) => `'${s}'`).join(', ');

const TASK_PATCH_COLUMNS = [
  'progressPct',
  'currentStage',
  'filesTotal',
  'filesProcessed',
  'failedAtStage',
  'errorMessage',
  'attempt',
] as const satisfies readonly (keyof TaskPatch)[];

const REPOSITORY_PATCH_COLUMNS = [
  'name',
  'defaultBranch',
  'localPath',
  'status',
  'lastSyncedAt',
] as const satisfies readonly (keyof RepositoryPatch)[];

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

function toCheckpoint(row: CheckpointRow): FileCheckpoint {
  return {
    repoId: row.repoId,
    filePath: row.filePath,
    fileHash: row.fileHash,
    revision: row.revision,
    chunkIds: decodeJson(ChunkIdListSchema, row.chunkIdsJson, 'checkpoints.chunkIdsJson'),
    chunkCount: row.chunkCount,
    updatedAt: row.updatedAt,
  };
}

/**
 * Relational state: repositories, tasks, file checkpoints and structural
 * indexes. Every mutation that spans rows runs in one transaction.
 */
export class IndexStateStore {
  private db: DB | null = null;

  constructor(private readonly dbPath: string) {}

  init(): void {
    if (this.db) return;
    if (this.dbPath !== ':memory:') {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');

    const version = db.pragma('user_version', { simple: true });
    if (typeof version === 'number' && version > SCHEMA_VERSION) {
      db.close();
      throw new StoreError(
        `State database ${this.dbPath} has schema version ${version}; this build supports ${SCHEMA_VERSION}`,
      );
    }
    db.exec(CREATE_TABLES_SQL);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
    this.db = db;
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private getDb(): DB {
    if (!this.db) {
      throw new StoreError('State store not initialized. Call init() first.');
    }
    return this.db;
  }

  // Repositories

  createRepository(input: NewRepository): RepositorySnapshot {
    const now = new Date().toISOString();
    const repository: RepositorySnapshot = {
      id: randomUUID(),
      ...input,
      status: 'pending',
      lastSyncedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.getDb()
      .prepare<RepositoryRow>(
        `INSERT INTO repositories
         (id, url, name, platform, defaultBranch, localPath, status, lastSyncedAt, createdAt, updatedAt)
         VALUES (@id, @url, @name, @platform, @defaultBranch, @localPath, @status, @lastSyncedAt, @createdAt, @updatedAt)`,
      )
      .run(repository);
    return repository;
  }

  getRepository(id: string): RepositorySnapshot | null {
    return (
      this.getDb()
        .prepare<[string], RepositoryRow>('SELECT * FROM repositories WHERE id = ?')
        .get(id) ?? null
    );
  }

  findRepositoryByUrl(url: string): RepositorySnapshot | null {
    return (
      this.getDb()
        .prepare<[string], RepositoryRow>('SELECT * FROM repositories WHERE url = ?')
        .get(url) ?? null
    );
  }

  listRepositories(): RepositorySnapshot[] {
    return this.getDb()
      .prepare<[], RepositoryRow>('SELECT * FROM repositories ORDER BY createdAt, id')
      .all();
  }

  updateRepository(id: string, patch: RepositoryPatch): RepositorySnapshot {
    const db = this.getDb();
    const sets: string[] = ['updatedAt = @updatedAt'];
    const params: Record<string, string | null> = { id, updatedAt: new Date().toISOString() };
    for (const column of REPOSITORY_PATCH_COLUMNS) {
      const value = patch[column];
      if (value !== undefined) {
        sets.push(`${column} = @${column}`);
        params[column] = value;
      }
    }
    db.prepare(`UPDATE repositories SET ${sets.join(', ')} WHERE id = @id`).run(params);

    const updated = this.getRepository(id);
    if (!updated) {
      throw new StoreError(`Repository ${id} does not exist`);
    }
    return updated;
  }

  /** Deletes the repository with its tasks, checkpoints and structural index. */
  deleteRepository(id: string): boolean {
    return this.getDb().prepare('DELETE FROM repositories WHERE id = ?').run(id).changes > 0;
  }

  // Tasks

  /**
   * Creates a pending task. At most one non-terminal task may exist per
   * repository; a second one raises TaskConflictError naming the first.
   */
  createTask(repoId: string, type: TaskType): IndexingTask {
    const db = this.getDb();
    const now = new Date().toISOString();
    const task: IndexingTask = {
      id: randomUUID(),
      repoId,
      type,
      status: 'pending',
      progressPct: 0,
      currentStage: null,
      filesTotal: 0,
      filesProcessed: 0,
      failedAtStage: null,
      errorMessage: null,
      attempt: 0,
      createdAt: now,
      updatedAt: now,
      finishedAt: null,
    };

    const insert = db.transaction(() => {
      const active = this.findActiveTask(repoId);
      if (active) {
        throw new TaskConflictError(repoId, active.id);
      }
      db.prepare<TaskRow>(
        `INSERT INTO tasks
         (id, repoId, type, status, progressPct, currentStage, filesTotal, filesProcessed,
          failedAtStage, errorMessage, attempt, createdAt, updatedAt, finishedAt)
         VALUES (@id, @repoId, @type, @status, @progressPct, @currentStage, @filesTotal, @filesProcessed,
          @failedAtStage, @errorMessage, @attempt, @createdAt, @updatedAt, @finishedAt)`,
      ).run(task);
    });

    try {
      insert();
    } catch (error) {
      if (isUniqueViolation(error)) {
        const active = this.findActiveTask(repoId);
        throw new TaskConflictError(repoId, active?.id ?? 'unknown', { cause: error });
      }
      throw error;
    }
    return task;
  }

  getTask(id: string): IndexingTask | null {
    return (
      this.getDb().prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id) ?? null
    );
  }

  findActiveTask(repoId: string): IndexingTask | null {
    return (
      this.getDb()
        .prepare<[string], TaskRow>(
          `SELECT * FROM tasks WHERE repoId = ? AND status NOT IN (${TERMINAL_LIST})`,
        )
        .get(repoId) ?? null
    );
  }

  listTasks(repoId: string): IndexingTask[] {
    return this.getDb()
      .prepare<[string], TaskRow>('SELECT * FROM tasks WHERE repoId = ? ORDER BY createdAt, id')
      .all(repoId);
  }

  /**
   * Compare-and-set on the status column. Returns the updated task, or null
   * when the task was no longer in `from`.
   */
  transitionTask(
    id: string,
    from: TaskStatus,
    to: TaskStatus,
    patch: TaskPatch = {},
  ): IndexingTask | null {
    const now = new Date().toISOString();
    const sets = ['status = @to', 'updatedAt = @now'];
    const params: Record<string, string | number | null> = { id, from, to, now };
    if (TERMINAL.has(to)) {
      sets.push('finishedAt = @now');
    }
    this.collectPatch(patch, sets, params);

    const result = this.getDb()
      .prepare(`UPDATE tasks SET ${sets.join(', ')} WHERE id = @id AND status = @from`)
      .run(params);
    return result.changes === 1 ? this.getTask(id) : null;
  }

  /** Progress fields only; ignored once the task is terminal. */
  updateTaskProgress(id: string, patch: TaskPatch): IndexingTask | null {
    const sets = ['updatedAt = @now'];
    const params: Record<string, string | number | null> = { id, now: new Date().toISOString() };
    this.collectPatch(patch, sets, params);

    const result = this.getDb()
      .prepare(
        `UPDATE tasks SET ${sets.join(', ')} WHERE id = @id AND status NOT IN (${TERMINAL_LIST})`,
      )
      .run(params);
    return result.changes === 1 ? this.getTask(id) : null;
  }

  /**
   * Marks every non-terminal task interrupted, e.g. after a crash. Returns
   * the affected tasks as they were before.
   */
  markInterrupted(message = 'Interrupted by engine restart'): IndexingTask[] {
    const db = this.getDb();
    const run = db.transaction(() => {
      const active = db
        .prepare<[], TaskRow>(
          `SELECT * FROM tasks WHERE status NOT IN (${TERMINAL_LIST}) ORDER BY createdAt, id`,
        )
        .all();
      const now = new Date().toISOString();
      db.prepare<[string, string, string]>(
        `UPDATE tasks SET status = 'interrupted', errorMessage = ?, updatedAt = ?, finishedAt = ?
         WHERE status NOT IN (${TERMINAL_LIST})`,
      ).run(message, now, now);
      return active;
    });
    return run();
  }

  private collectPatch(
    patch: TaskPatch,
    sets: string[],
    params: Record<string, string | number | null>,
  ): void {
    for (const column of TASK_PATCH_COLUMNS) {
      const value = patch[column];
      if (value !== undefined) {
        sets.push(`${column} = @${column}`);
        params[column] = value;
      }
    }
  }

  // Checkpoints

  getCheckpoints(repoId: string): FileCheckpoint[] {
    return this.getDb()
      .prepare<[string], CheckpointRow>(
        'SELECT * FROM checkpoints WHERE repoId = ? ORDER BY filePath',
      )
      .all(repoId)
      .map(toCheckpoint);
  }

  getCheckpoint(repoId: string, filePath: string): FileCheckpoint | null {
    const row = this.getDb()
      .prepare<[string, string], CheckpointRow>(
        'SELECT * FROM checkpoints WHERE repoId = ? AND filePath = ?',
      )
      .get(repoId, filePath);
    return row ? toCheckpoint(row) : null;
  }

  /**
   * Upserts the checkpoints of changed files and deletes those of removed
   * files, atomically.
   */
  commitCheckpoints(repoId: string, upserts: CheckpointInput[], deletes: string[]): void {
    const db = this.getDb();
    const upsert = db.prepare<CheckpointRow>(
      `INSERT INTO checkpoints (repoId, filePath, fileHash, revision, chunkIdsJson, chunkCount, updatedAt)
       VALUES (@repoId, @filePath, @fileHash, @revision, @chunkIdsJson, @chunkCount, @updatedAt)
       ON CONFLICT(repoId, filePath) DO UPDATE SET
         fileHash = excluded.fileHash,
         revision = excluded.revision,
         chunkIdsJson = excluded.chunkIdsJson,
         chunkCount = excluded.chunkCount,
         updatedAt = excluded.updatedAt`,
    );
    const remove = db.prepare<[string, string]>(
      'DELETE FROM checkpoints WHERE repoId = ? AND filePath = ?',
    );

    const commit = db.transaction(() => {
      const now = new Date().toISOString();
      for (const checkpoint of upserts) {
        upsert.run({
          repoId,
          filePath: checkpoint.filePath,
          fileHash: checkpoint.fileHash,
          revision: checkpoint.revision,
          chunkIdsJson: JSON.stringify(checkpoint.chunkIds),
          chunkCount: checkpoint.chunkIds.length,
          updatedAt: now,
        });
      }
      for (const filePath of deletes) {
        remove.run(repoId, filePath);
      }
    });
    commit();
  }

  /** Replaces every checkpoint of the repository in one transaction. */
  replaceCheckpoints(repoId: string, checkpoints: CheckpointInput[]): void {
    const db = this.getDb();
    const replace = db.transaction(() => {
      db.prepare<[string]>('DELETE FROM checkpoints WHERE repoId = ?').run(repoId);
      this.commitCheckpoints(repoId, checkpoints, []);
    });
    replace();
  }

  // Structural index

  getStructuralIndex(repoId: string): StructuralIndex | null {
    const row = this.getDb()
      .prepare<[string], { indexJson: string }>(
        'SELECT indexJson FROM structural_indexes WHERE repoId = ?',
      )
      .get(repoId);
    return row
      ? decodeJson(StructuralIndexSchema, row.indexJson, 'structural_indexes.indexJson')
      : null;
  }

  saveStructuralIndex(repoId: string, index: StructuralIndex): void {
    this.getDb()
      .prepare<[string, string, string]>(
        `INSERT INTO structural_indexes (repoId, indexJson, updatedAt) VALUES (?, ?, ?)
         ON CONFLICT(repoId) DO UPDATE SET indexJson = excluded.indexJson, updatedAt = excluded.updatedAt`,
      )
      .run(repoId, JSON.stringify(index), new Date().toISOString());
  }
}
