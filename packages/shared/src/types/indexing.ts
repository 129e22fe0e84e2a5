/**
 * Domain records shared by the parser, the stores and the pipeline.
 */

export type RepositoryPlatform = 'github' | 'gitlab' | 'bitbucket' | 'custom' | 'local';

export type RepositoryStatus = 'pending' | 'cloning' | 'ready' | 'syncing' | 'error';

export interface RepositorySnapshot {
  id: string;
  /** Canonical URL, or an absolute path for local repositories */
  url: string;
  name: string;
  platform: RepositoryPlatform;
  defaultBranch: string;
  /** Where the working copy lives on disk, once acquired */
  localPath: string | null;
  status: RepositoryStatus;
  lastSyncedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type TaskType = 'full-reindex' | 'incremental-sync' | 'artifacts-only';

export type PipelineStage = 'acquiring' | 'parsing' | 'embedding' | 'generating-artifacts';

export type TerminalTaskStatus = 'completed' | 'failed' | 'cancelled' | 'interrupted';

export type TaskStatus = 'pending' | PipelineStage | TerminalTaskStatus;

export interface IndexingTask {
  id: string;
  repoId: string;
  type: TaskType;
  status: TaskStatus;
  progressPct: number;
  /** Human-readable label of what the task is doing */
  currentStage: string | null;
  filesTotal: number;
  filesProcessed: number;
  failedAtStage: PipelineStage | null;
  /** Credential-scrubbed failure message */
  errorMessage: string | null;
  /** Number of retries already taken */
  attempt: number;
  createdAt: string;
  updatedAt: string;
  finishedAt: string | null;
}

/**
 * Durable record of "this file, at this hash, is represented by exactly these chunks".
 */
export interface FileCheckpoint {
  repoId: string;
  filePath: string;
  fileHash: string;
  /** VCS revision at capture time, kept for auditing only */
  revision: string | null;
  chunkIds: string[];
  chunkCount: number;
  updatedAt: string;
}

export type ChunkKind =
  | 'function'
  | 'method'
  | 'class'
  | 'interface'
  | 'struct'
  | 'enum'
  | 'trait'
  | 'impl'
  | 'type'
  | 'constant'
  | 'module'
  /** A heading section or paragraph of a documentation file */
  | 'section'
  /** A known project configuration file */
  | 'config';

export interface OrmField {
  name: string;
  columnType: string;
  primaryKey: boolean;
  nullable: boolean;
  /** `table.column` target of a foreign key, if declared */
  foreignKey: string | null;
}

export interface ChunkNode {
  id: string;
  filePath: string;
  kind: ChunkKind;
  name: string;
  language: string;
  /** 1-based, inclusive */
  startLine: number;
  /** 1-based, inclusive */
  endLine: number;
  content: string;
  /** Sorted, unique names of invoked symbols */
  calls: string[];
  decorators: string[];
  parentName: string | null;
  docstring: string | null;
  isOrmModel: boolean;
  ormFields: OrmField[];
  /** Set only on fragments of a split unit */
  partIndex: number | null;
  partCount: number | null;
  fileHash: string;
}

export interface StructuralIndexEntry {
  language: string;
  functions: string[];
  classes: string[];
  constants: string[];
}

export type StructuralIndex = Record<string, StructuralIndexEntry>;
