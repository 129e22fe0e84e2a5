import type { ChunkKind, ChunkNode, StructuralIndex, StructuralIndexEntry } from '@repoindex/shared';
import { isDocumentChunk } from './documents';

type StructuralChunk = Pick<ChunkNode, 'filePath' | 'kind' | 'name' | 'language'>;

const BUCKETS: Partial<Record<ChunkKind, keyof Omit<StructuralIndexEntry, 'language'>>> = {
  function: 'functions',
  method: 'functions',
  class: 'classes',
  interface: 'classes',
  struct: 'classes',
  impl: 'classes',
  enum: 'classes',
  trait: 'classes',
  constant: 'constants',
};

function entryFor(chunks: readonly StructuralChunk[]): StructuralIndexEntry {
  const entry: StructuralIndexEntry = {
    language: chunks[0]?.language ?? 'unknown',
    functions: [],
    classes: [],
    constants: [],
  };
  for (const chunk of chunks) {
    const bucket = BUCKETS[chunk.kind];
    if (bucket === undefined || chunk.name === '<anonymous>') continue;
    if (!entry[bucket].includes(chunk.name)) {
      entry[bucket].push(chunk.name);
    }
  }
  return entry;
}

/** Groups code chunks by file; documentation and config files have no entry. */
function groupByFile(chunks: readonly StructuralChunk[]): Map<string, StructuralChunk[]> {
  const groups = new Map<string, StructuralChunk[]>();
  for (const chunk of chunks) {
    if (isDocumentChunk(chunk)) continue;
    const group = groups.get(chunk.filePath);
    if (group) {
      group.push(chunk);
    } else {
      groups.set(chunk.filePath, [chunk]);
    }
  }
  return groups;
}

/** Builds the whole index from a repository's live chunks. */
export function buildStructuralIndex(chunks: readonly StructuralChunk[]): StructuralIndex {
  const index: StructuralIndex = {};
  const groups = groupByFile(chunks);
  for (const filePath of [...groups.keys()].sort()) {
    index[filePath] = entryFor(groups.get(filePath) ?? []);
  }
  return index;
}

/**
 * Returns a copy of `index` with the entries of `changedFiles` rebuilt from
 * `chunks` and those of `deletedFiles` removed. Files whose new chunk set
 * is empty drop out as well.
 */
export function patchStructuralIndex(
  index: StructuralIndex,
  changedFiles: readonly string[],
  deletedFiles: readonly string[],
  chunks: readonly StructuralChunk[],
): StructuralIndex {
  const next: StructuralIndex = { ...index };
  for (const filePath of [...changedFiles, ...deletedFiles]) {
    delete next[filePath];
  }

  const groups = groupByFile(chunks);
  for (const filePath of changedFiles) {
    const group = groups.get(filePath);
    if (group && group.length > 0) {
      next[filePath] = entryFor(group);
    }
  }

  const sorted: StructuralIndex = {};
  for (const filePath of Object.keys(next).sort()) {
    sorted[filePath] = next[filePath];
  }
  return sorted;
}

/**
 * Compact text rendering, one block per file:
 *
 *     src/app.py (python)
 *       classes: App
 *       functions: main, run
 */
export function formatStructuralIndex(index: StructuralIndex): string {
  const blocks: string[] = [];
  for (const [filePath, entry] of Object.entries(index)) {
    const lines = [`${filePath} (${entry.language})`];
    if (entry.classes.length > 0) lines.push(`  classes: ${entry.classes.join(', ')}`);
    if (entry.functions.length > 0) lines.push(`  functions: ${entry.functions.join(', ')}`);
    if (entry.constants.length > 0) lines.push(`  constants: ${entry.constants.join(', ')}`);
    blocks.push(lines.join('\n'));
  }
  return blocks.join('\n');
}
