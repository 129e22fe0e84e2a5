import {
  TaskConflictError,
  eventEnvelope,
  type ChunkNode,
  type FileCheckpoint,
  type Logger,
} from '@repoindex/shared';
import type { CheckpointInput, IndexStateStore, VectorStore } from '@repoindex/store';

export type RepairMode = 'verify' | 'rederive';

export interface RepairReport {
  repoId: string;
  mode: RepairMode;
  checkedFiles: number;
  /** Files whose checkpoint disagreed with the vector store */
  inconsistentFiles: string[];
  orphanedChunksRemoved: number;
  checkpointsRederived: number;
  /** Incremental sync submitted to re-embed dropped files */
  resyncTaskId: string | null;
}

function sameIds(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

/**
 * Reconciles checkpoints with the vector store after a crash between the
 * vector write and the checkpoint commit, or after vectors were lost.
 */
export class RepairService {
  constructor(
    private readonly state: IndexStateStore,
    private readonly vectors: VectorStore,
    private readonly logger: Logger,
  ) {}

  async repair(repoId: string, mode: RepairMode, runId: string): Promise<RepairReport> {
    // a running task's vectors are not checkpointed yet and would look orphaned
    const active = this.state.findActiveTask(repoId);
    if (active) {
      throw new TaskConflictError(repoId, active.id);
    }

    const report = mode === 'rederive' ? await this.rederive(repoId) : await this.verify(repoId, runId);

    await this.logger.log({
      type: 'RepairFinished',
      ...eventEnvelope(runId),
      payload: {
        repoId,
        mode,
        checkedFiles: report.checkedFiles,
        inconsistentFiles: report.inconsistentFiles.length,
        orphanedChunksRemoved: report.orphanedChunksRemoved,
        checkpointsRederived: report.checkpointsRederived,
      },
    });
    return report;
  }

  /**
   * Drops checkpoints that reference missing vectors, so the next sync
   * re-embeds those files, and deletes vectors no checkpoint references.
   */
  private async verify(repoId: string, runId: string): Promise<RepairReport> {
    const checkpoints = this.state.getCheckpoints(repoId);
    const missing = new Set(
      await this.vectors.missingIds(
        repoId,
        checkpoints.flatMap((c) => c.chunkIds),
      ),
    );

    const inconsistent: string[] = [];
    const referenced = new Set<string>();
    for (const checkpoint of checkpoints) {
      const missingChunkIds = checkpoint.chunkIds.filter((id) => missing.has(id));
      if (missingChunkIds.length > 0) {
        inconsistent.push(checkpoint.filePath);
        await this.logger.log({
          type: 'ConsistencyErrorDetected',
          ...eventEnvelope(runId),
          payload: { path: checkpoint.filePath, missingChunkIds: missingChunkIds.length },
        });
      } else {
        for (const id of checkpoint.chunkIds) referenced.add(id);
      }
    }

    if (inconsistent.length > 0) {
      this.state.commitCheckpoints(repoId, [], inconsistent);
    }

    const orphans = (await this.vectors.listChunks(repoId))
      .map((c) => c.id)
      .filter((id) => !referenced.has(id));
    const orphanedChunksRemoved =
      orphans.length > 0 ? await this.vectors.deleteByIds(repoId, orphans) : 0;

    return {
      repoId,
      mode: 'verify',
      checkedFiles: checkpoints.length,
      inconsistentFiles: inconsistent,
      orphanedChunksRemoved,
      checkpointsRederived: 0,
      resyncTaskId: null,
    };
  }

  /**
   * Rebuilds every checkpoint from the chunks in the vector store. When a
   * file's chunks carry more than one file hash, the one matching the old
   * checkpoint wins, else the first; the rest are removed.
   */
  private async rederive(repoId: string): Promise<RepairReport> {
    const previous = new Map<string, FileCheckpoint>(
      this.state.getCheckpoints(repoId).map((c): [string, FileCheckpoint] => [c.filePath, c]),
    );

    const groups = new Map<string, ChunkNode[]>();
    for (const chunk of await this.vectors.listChunks(repoId)) {
      const group = groups.get(chunk.filePath);
      if (group) {
        group.push(chunk);
      } else {
        groups.set(chunk.filePath, [chunk]);
      }
    }

    const rebuilt: CheckpointInput[] = [];
    const discarded: string[] = [];
    const inconsistent = new Set<string>();

    for (const [filePath, chunks] of groups) {
      const prior = previous.get(filePath);
      const priorHash = prior?.fileHash;
      const fileHash =
        priorHash !== undefined && chunks.some((c) => c.fileHash === priorHash)
          ? priorHash
          : chunks[0].fileHash;
      const kept = chunks.filter((c) => c.fileHash === fileHash);
      discarded.push(...chunks.filter((c) => c.fileHash !== fileHash).map((c) => c.id));

      const chunkIds = kept.map((c) => c.id);
      rebuilt.push({ filePath, fileHash, revision: prior?.revision ?? null, chunkIds });
      if (!prior || prior.fileHash !== fileHash || !sameIds(prior.chunkIds, chunkIds)) {
        inconsistent.add(filePath);
      }
    }
    for (const filePath of previous.keys()) {
      if (!groups.has(filePath)) inconsistent.add(filePath);
    }

    this.state.replaceCheckpoints(repoId, rebuilt);
    const orphanedChunksRemoved =
      discarded.length > 0 ? await this.vectors.deleteByIds(repoId, discarded) : 0;

    return {
      repoId,
      mode: 'rederive',
      checkedFiles: new Set([...previous.keys(), ...groups.keys()]).size,
      inconsistentFiles: [...inconsistent].sort(),
      orphanedChunksRemoved,
      checkpointsRederived: rebuilt.length,
      resyncTaskId: null,
    };
  }
}
