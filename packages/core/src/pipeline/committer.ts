import {
  eventEnvelope,
  type ChunkNode,
  type EmbeddingsConfig,
  type Logger,
} from '@repoindex/shared';
import { toEmbeddingText } from '@repoindex/repo';
import { ConcurrencyGate, executeProviderRequest, type Embedder } from '@repoindex/adapters';
import type { IndexStateStore, VectorStore } from '@repoindex/store';
import type { ParsedFile } from './parse-stage';

export interface CommitInput {
  repoId: string;
  runId: string;
  /** VCS revision recorded on the new checkpoints */
  revision: string | null;
  files: ParsedFile[];
  deleted: string[];
  /** Stops before the next batch is dispatched; the reason is thrown */
  signal?: AbortSignal;
  onBatch?: (batchesDone: number, batchCount: number) => void;
}

export interface CommitResult {
  chunksEmbedded: number;
  batchCount: number;
  updatedFiles: number;
  deletedFiles: number;
  staleChunksRemoved: number;
}

export interface CommitterDeps {
  embedder: Embedder;
  vectors: VectorStore;
  state: IndexStateStore;
  gate: ConcurrencyGate;
  embeddings: EmbeddingsConfig;
  logger: Logger;
}

function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Writes one run's chunks: vectors first, then checkpoints in a single
 * transaction, then the sweep of stale and deleted vectors. A crash between
 * the first two steps leaves vectors without a checkpoint, which the next
 * run overwrites or sweeps.
 */
export class EmbeddingCommitter {
  constructor(private readonly deps: CommitterDeps) {}

  async commit(input: CommitInput): Promise<CommitResult> {
    const { state, vectors, logger } = this.deps;
    const chunks = input.files.flatMap((f) => f.chunks);
    const batches = toBatches(chunks, this.deps.embeddings.batchSize);

    await this.embedBatches(input, batches);
    input.signal?.throwIfAborted();

    state.commitCheckpoints(
      input.repoId,
      input.files.map((f) => ({
        filePath: f.filePath,
        fileHash: f.fileHash,
        revision: input.revision,
        chunkIds: f.chunks.map((c) => c.id),
      })),
      input.deleted,
    );

    let staleChunksRemoved = 0;
    for (const file of input.files) {
      const keep = new Set(file.chunks.map((c) => c.id));
      const stored = await vectors.listIdsForFile(input.repoId, file.filePath);
      const stale = stored.filter((id) => !keep.has(id));
      if (stale.length > 0) {
        staleChunksRemoved += await vectors.deleteByIds(input.repoId, stale);
      }
    }
    if (input.deleted.length > 0) {
      staleChunksRemoved += await vectors.deleteByFiles(input.repoId, input.deleted);
    }

    await logger.log({
      type: 'CheckpointsCommitted',
      ...eventEnvelope(input.runId),
      payload: {
        updatedFiles: input.files.length,
        deletedFiles: input.deleted.length,
        staleChunksRemoved,
      },
    });

    return {
      chunksEmbedded: chunks.length,
      batchCount: batches.length,
      updatedFiles: input.files.length,
      deletedFiles: input.deleted.length,
      staleChunksRemoved,
    };
  }

  private async embedBatches(input: CommitInput, batches: ChunkNode[][]): Promise<void> {
    const { gate, logger } = this.deps;
    // a failed sibling stops batches that have not started yet
    const halt = new AbortController();
    let done = 0;

    const results = await Promise.allSettled(
      batches.map((batch, batchIndex) =>
        gate.run(async () => {
          halt.signal.throwIfAborted();
          input.signal?.throwIfAborted();
          try {
            await this.embedBatch(input, batch);
          } catch (error) {
            halt.abort(error);
            throw error;
          }
          done++;
          await logger.log({
            type: 'EmbeddingBatchCommitted',
            ...eventEnvelope(input.runId),
            payload: { batchIndex, batchCount: batches.length, chunks: batch.length },
          });
          input.onBatch?.(done, batches.length);
        }),
      ),
    );

    // the first real failure, not the aborts it caused
    const failures: unknown[] = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    if (failures.length === 0) return;
    if (halt.signal.aborted) throw halt.signal.reason;
    throw failures[0];
  }

  private async embedBatch(input: CommitInput, batch: ChunkNode[]): Promise<void> {
    const { embedder, embeddings, vectors, logger } = this.deps;
    const texts = batch.map((chunk) => toEmbeddingText(chunk));
    const embedded = await executeProviderRequest(
      {
        runId: input.runId,
        logger,
        timeoutMs: embeddings.timeoutMs,
        retryOptions: embeddings.retry,
      },
      embeddings.provider,
      embedder.id(),
      (signal) => embedder.embedTexts(texts, { signal }),
    );

    const embedderId = embedder.id();
    await vectors.upsert(
      input.repoId,
      batch.map((chunk, i) => ({
        vector: Float32Array.from(embedded[i] ?? []),
        chunk,
        embedderId,
      })),
    );
  }
}
