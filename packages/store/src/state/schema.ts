export const SCHEMA_VERSION = 1;

export const TERMINAL_STATUSES = ['completed', 'failed', 'cancelled', 'interrupted'] as const;

const TERMINAL_LIST = TERMINAL_STATUSES.map((s) => `'${s}'`).join(', ');

export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS repositories (
  id TEXT PRIMARY KEY NOT NULL,
  url TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL,
  platform TEXT NOT NULL,
  defaultBranch TEXT NOT NULL,
  localPath TEXT,
  status TEXT NOT NULL,
  lastSyncedAt TEXT,
  createdAt TEXT NOT NULL,
  updatedAt TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks (
  id TEXT PRIMARY KEY NOT NULL,
  repoId TEXT NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
  type TEXT NOT NULL,
  status TEXT NOT NULL,
  progressPct INTEGER NOT NULL DEFAULT 0,
  currentStage TEXT,
  filesTotal INTEGER NOT NULL DEFAULT 0,
  filesProcessed INTEGER NOT NULL DEFAULT 0,
  failedAtStage TEXT,
  errorMessage TEXT,
  attempt INTEGER NOT NULL DEFAULT 0,
  createdAt TEXT NOT NULL,
  updatedAt TEXT NOT NULL,
  finishedAt TEXT
);

CREATE INDEX IF NOT EXISTS idx_tasks_repo ON tasks (repoId, createdAt);

CREATE UNIQUE INDEX IF NOT EXISTS idx_tasks_one_active_per_repo
  ON tasks (repoId) WHERE status NOT IN (${TERMINAL_LIST});

CREATE TABLE IF NOT EXISTS checkpoints (
  repoId TEXT NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
  filePath TEXT NOT NULL,
  fileHash TEXT NOT NULL,
  revision TEXT,
  chunkIdsJson TEXT NOT NULL,
  chunkCount INTEGER NOT NULL,
  updatedAt TEXT NOT NULL,
  PRIMARY KEY (repoId, filePath)
);

CREATE TABLE IF NOT EXISTS structural_indexes (
  repoId TEXT PRIMARY KEY NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
  indexJson TEXT NOT NULL,
  updatedAt TEXT NOT NULL
);
`;
