import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { StoreError, type ChunkNode } from '@repoindex/shared';
import type {
  VectorBackendInfo,
  VectorQueryFilter,
  VectorQueryResult,
  VectorStore,
  VectorUpsertItem,
} from '../backend';
import { compareByScore, cosineSimilarity } from '../similarity';
import { ChunkNodeSchema, decodeJson } from '../../codec';

/** Deletes are chunked to stay under SQLite's bound-parameter limit */
const DELETE_BATCH = 500;

interface ScoredRow {
  id: string;
  score: number;
  chunkJson: string;
}

interface VectorRow {
  chunkId: string;
  dims: number;
  chunkJson: string;
  vectorBlob: Buffer;
}

/** Float32Array to BLOB bytes */
function float32ToBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

/** BLOB bytes back to Float32Array, copied for alignment */
function blobToFloat32(blob: Buffer): Float32Array {
  const buffer = new ArrayBuffer(blob.length);
  new Uint8Array(buffer).set(blob);
  return new Float32Array(buffer);
}

function batches<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/** SQLite-backed vector store with brute-force cosine similarity search */
export class SQLiteVectorBackend implements VectorStore {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  private runMigrations(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS chunk_vectors (
        repoId TEXT NOT NULL,
        chunkId TEXT NOT NULL,
        filePath TEXT NOT NULL,
        startLine INTEGER NOT NULL,
        partIndex INTEGER NOT NULL DEFAULT 0,
        embedderId TEXT NOT NULL,
        dims INTEGER NOT NULL,
        updatedAt INTEGER NOT NULL,
        chunkJson TEXT NOT NULL,
        vectorBlob BLOB NOT NULL,
        PRIMARY KEY (repoId, chunkId)
      );

      CREATE INDEX IF NOT EXISTS idx_chunk_vectors_repo_file
      ON chunk_vectors (repoId, filePath, startLine, partIndex);
    `);
  }

  async init(): Promise<void> {
    if (this.db) return;

    if (this.dbPath !== ':memory:') {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    this.runMigrations(db);
    this.db = db;
  }

  private getDb(): Database.Database {
    if (!this.db) {
      throw new StoreError('SQLiteVectorBackend not initialized. Call init() first.');
    }
    return this.db;
  }

  private decode(row: Pick<VectorRow, 'chunkJson'>): ChunkNode {
    return decodeJson(ChunkNodeSchema, row.chunkJson, 'chunk_vectors.chunkJson');
  }

  async upsert(repoId: string, items: VectorUpsertItem[]): Promise<void> {
    const db = this.getDb();
    const stmt = db.prepare(`
      INSERT OR REPLACE INTO chunk_vectors
      (repoId, chunkId, filePath, startLine, partIndex, embedderId, dims, updatedAt, chunkJson, vectorBlob)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const write = db.transaction((rows: VectorUpsertItem[]) => {
      const now = Date.now();
      for (const item of rows) {
        stmt.run(
          repoId,
          item.chunk.id,
          item.chunk.filePath,
          item.chunk.startLine,
          item.chunk.partIndex ?? 0,
          item.embedderId,
          item.vector.length,
          now,
          JSON.stringify(item.chunk),
          float32ToBlob(item.vector),
        );
      }
    });
    write(items);
  }

  /**
   * Brute-force scan. Rows are streamed and only the best `topK` are kept,
   * so memory stays bounded by `topK` rather than by the repository size.
   */
  async query(
    repoId: string,
    queryVector: Float32Array,
    topK: number,
    filter?: VectorQueryFilter,
  ): Promise<VectorQueryResult[]> {
    if (topK < 1) return [];

    let sql = 'SELECT chunkId, dims, chunkJson, vectorBlob FROM chunk_vectors WHERE repoId = ? AND dims = ?';
    const params: (string | number)[] = [repoId, queryVector.length];

    if (filter?.filePrefix) {
      sql += ' AND substr(filePath, 1, ?) = ?';
      params.push(filter.filePrefix.length, filter.filePrefix);
    }

    // ascending by compareByScore: best first, worst last
    const best: ScoredRow[] = [];
    const rows = this.getDb().prepare<(string | number)[], VectorRow>(sql).iterate(...params);
    for (const row of rows) {
      const candidate: ScoredRow = {
        id: row.chunkId,
        score: cosineSimilarity(queryVector, blobToFloat32(row.vectorBlob)),
        chunkJson: row.chunkJson,
      };
      if (best.length === topK && compareByScore(candidate, best[best.length - 1]) >= 0) continue;

      let at = best.length;
      while (at > 0 && compareByScore(candidate, best[at - 1]) < 0) at--;
      best.splice(at, 0, candidate);
      if (best.length > topK) best.pop();
    }

    return best.map(({ id, score, chunkJson }) => ({
      id,
      score,
      chunk: this.decode({ chunkJson }),
    }));
  }

  async getChunks(repoId: string, ids: string[]): Promise<ChunkNode[]> {
    const stmt = this.getDb().prepare<[string, string], Pick<VectorRow, 'chunkJson'>>(
      'SELECT chunkJson FROM chunk_vectors WHERE repoId = ? AND chunkId = ?',
    );
    const chunks: ChunkNode[] = [];
    for (const id of ids) {
      const row = stmt.get(repoId, id);
      if (row) chunks.push(this.decode(row));
    }
    return chunks;
  }

  async listChunks(repoId: string): Promise<ChunkNode[]> {
    return this.getDb()
      .prepare<[string], Pick<VectorRow, 'chunkJson'>>(
        'SELECT chunkJson FROM chunk_vectors WHERE repoId = ? ORDER BY filePath, startLine, partIndex',
      )
      .all(repoId)
      .map((row) => this.decode(row));
  }

  async listIdsForFile(repoId: string, filePath: string): Promise<string[]> {
    return this.getDb()
      .prepare<[string, string], Pick<VectorRow, 'chunkId'>>(
        'SELECT chunkId FROM chunk_vectors WHERE repoId = ? AND filePath = ? ORDER BY startLine, partIndex',
      )
      .all(repoId, filePath)
      .map((row) => row.chunkId);
  }

  async missingIds(repoId: string, ids: string[]): Promise<string[]> {
    const stmt = this.getDb().prepare<[string, string], { found: number }>(
      'SELECT 1 AS found FROM chunk_vectors WHERE repoId = ? AND chunkId = ?',
    );
    return ids.filter((id) => stmt.get(repoId, id) === undefined);
  }

  async deleteByIds(repoId: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const db = this.getDb();
    const run = db.transaction(() => {
      let removed = 0;
      for (const batch of batches(ids, DELETE_BATCH)) {
        const placeholders = batch.map(() => '?').join(', ');
        removed += db
          .prepare<string[]>(
            `DELETE FROM chunk_vectors WHERE repoId = ? AND chunkId IN (${placeholders})`,
          )
          .run(repoId, ...batch).changes;
      }
      return removed;
    });
    return run();
  }

  async deleteByFiles(repoId: string, filePaths: string[]): Promise<number> {
    if (filePaths.length === 0) return 0;
    const db = this.getDb();
    const run = db.transaction(() => {
      let removed = 0;
      for (const batch of batches(filePaths, DELETE_BATCH)) {
        const placeholders = batch.map(() => '?').join(', ');
        removed += db
          .prepare<string[]>(
            `DELETE FROM chunk_vectors WHERE repoId = ? AND filePath IN (${placeholders})`,
          )
          .run(repoId, ...batch).changes;
      }
      return removed;
    });
    return run();
  }

  async wipeRepo(repoId: string): Promise<void> {
    this.getDb().prepare<[string]>('DELETE FROM chunk_vectors WHERE repoId = ?').run(repoId);
  }

  async info(): Promise<VectorBackendInfo> {
    const row = this.getDb()
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM chunk_vectors')
      .get();
    return { backend: 'sqlite', location: this.dbPath, count: row?.count ?? 0 };
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
