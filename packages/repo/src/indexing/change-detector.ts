import type { FileCheckpoint } from '@repoindex/shared';

export interface CurrentFile {
  path: string;
  fileHash: string;
}

/** Four disjoint, path-sorted sets. */
export interface ChangeSet {
  added: string[];
  modified: string[];
  unchanged: string[];
  deleted: string[];
}

export interface DetectOptions {
  /** Treat every file that has a checkpoint as modified */
  forceFull?: boolean;
}

type CheckpointHash = Pick<FileCheckpoint, 'filePath' | 'fileHash'>;

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Classifies files by comparing their content hash against the last
 * checkpoint. Revisions play no part; the hash decides.
 */
export class ChangeDetector {
  detect(
    checkpoints: Iterable<CheckpointHash>,
    current: Iterable<CurrentFile>,
    options: DetectOptions = {},
  ): ChangeSet {
    const previous = new Map<string, string>();
    for (const checkpoint of checkpoints) {
      previous.set(checkpoint.filePath, checkpoint.fileHash);
    }

    const changes: ChangeSet = { added: [], modified: [], unchanged: [], deleted: [] };
    const seen = new Set<string>();

    for (const file of current) {
      if (seen.has(file.path)) continue;
      seen.add(file.path);

      const priorHash = previous.get(file.path);
      if (priorHash === undefined) {
        changes.added.push(file.path);
      } else if (options.forceFull || priorHash !== file.fileHash) {
        changes.modified.push(file.path);
      } else {
        changes.unchanged.push(file.path);
      }
    }

    for (const filePath of previous.keys()) {
      if (!seen.has(filePath)) {
        changes.deleted.push(filePath);
      }
    }

    changes.added.sort(byCodeUnit);
    changes.modified.sort(byCodeUnit);
    changes.unchanged.sort(byCodeUnit);
    changes.deleted.sort(byCodeUnit);
    return changes;
  }

  /**
   * Moves `paths` from unchanged to modified, e.g. after their checkpoint
   * turned out to reference chunks the vector store no longer has.
   */
  reclassify(changes: ChangeSet, paths: Iterable<string>): ChangeSet {
    const moving = new Set(paths);
    const moved = changes.unchanged.filter((p) => moving.has(p));
    if (moved.length === 0) {
      return changes;
    }
    return {
      added: changes.added,
      modified: [...changes.modified, ...moved].sort(byCodeUnit),
      unchanged: changes.unchanged.filter((p) => !moving.has(p)),
      deleted: changes.deleted,
    };
  }
}

export function hasChanges(changes: ChangeSet): boolean {
  return changes.added.length + changes.modified.length + changes.deleted.length > 0;
}
