import {
  eventEnvelope,
  type Logger,
  type StructuralIndex,
} from '@repoindex/shared';
import { buildStructuralIndex, patchStructuralIndex } from '@repoindex/repo';
import type { IndexStateStore, VectorStore } from '@repoindex/store';

export type ArtifactMode = 'rebuild' | 'patch';

export interface ArtifactInput {
  repoId: string;
  runId: string;
  mode: ArtifactMode;
  /** Ignored when rebuilding */
  changedFiles?: readonly string[];
  deletedFiles?: readonly string[];
}

/**
 * Derived artifacts of the live chunk set. Today that is the structural
 * index; the dependency graph is computed on demand instead.
 */
export class ArtifactGenerator {
  constructor(
    private readonly state: IndexStateStore,
    private readonly vectors: VectorStore,
    private readonly logger: Logger,
  ) {}

  async generate(input: ArtifactInput): Promise<StructuralIndex> {
    const existing = this.state.getStructuralIndex(input.repoId);
    let index: StructuralIndex;
    let mode = input.mode;
    let files: number;

    if (mode === 'patch' && existing) {
      const changed = input.changedFiles ?? [];
      const deleted = input.deletedFiles ?? [];
      const ids = changed.flatMap(
        (filePath) => this.state.getCheckpoint(input.repoId, filePath)?.chunkIds ?? [],
      );
      const chunks = ids.length > 0 ? await this.vectors.getChunks(input.repoId, ids) : [];
      index = patchStructuralIndex(existing, changed, deleted, chunks);
      files = changed.length + deleted.length;
    } else {
      mode = 'rebuild';
      index = buildStructuralIndex(await this.vectors.listChunks(input.repoId));
      files = Object.keys(index).length;
    }

    this.state.saveStructuralIndex(input.repoId, index);
    await this.logger.log({
      type: 'StructuralIndexUpdated',
      ...eventEnvelope(input.runId),
      payload: { mode, files },
    });
    return index;
  }
}
