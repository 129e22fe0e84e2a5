import type { ChunkNode } from '@repoindex/shared';
import { computeChunkId, estimateTokens } from './chunk-id';

export interface SplitterOptions {
  maxChunkTokens: number;
  overlapLines: number;
}

interface LineWindow {
  /** Index of the first line, relative to the chunk */
  start: number;
  /** Index of the last line, inclusive */
  end: number;
  text: string;
}

/**
 * Breaks chunks over the token budget into overlapping line windows. Each
 * fragment is a chunk in its own right, carrying `partIndex`/`partCount`.
 */
export class ChunkSplitter {
  private readonly maxChars: number;

  constructor(private readonly options: SplitterOptions) {
    if (options.maxChunkTokens <= 0) {
      throw new RangeError('maxChunkTokens must be positive');
    }
    if (options.overlapLines < 0) {
      throw new RangeError('overlapLines must not be negative');
    }
    this.maxChars = options.maxChunkTokens * 4;
  }

  split(chunk: ChunkNode): ChunkNode[] {
    if (estimateTokens(chunk.content) <= this.options.maxChunkTokens) {
      return [chunk];
    }

    const windows = this.windows(chunk.content.split('\n'));
    return windows.map((window, partIndex) => {
      const identity = {
        filePath: chunk.filePath,
        kind: chunk.kind,
        name: chunk.name,
        startLine: chunk.startLine + window.start,
        endLine: chunk.startLine + window.end,
        partIndex,
        fileHash: chunk.fileHash,
      };
      return {
        ...chunk,
        ...identity,
        id: computeChunkId(identity),
        content: window.text,
        calls: partIndex === 0 ? chunk.calls : [],
        decorators: partIndex === 0 ? chunk.decorators : [],
        docstring: partIndex === 0 ? chunk.docstring : null,
        ormFields: partIndex === 0 ? chunk.ormFields : [],
        partCount: windows.length,
      };
    });
  }

  splitAll(chunks: Iterable<ChunkNode>): { chunks: ChunkNode[]; splitUnits: number } {
    const out: ChunkNode[] = [];
    let splitUnits = 0;
    for (const chunk of chunks) {
      const parts = this.split(chunk);
      if (parts.length > 1) splitUnits++;
      out.push(...parts);
    }
    return { chunks: out, splitUnits };
  }

  /**
   * Greedy windows: grow while the text fits, then start the next window
   * `overlapLines` lines before the end of this one. A line that alone
   * exceeds the budget is cut into character slices.
   */
  private windows(lines: string[]): LineWindow[] {
    const windows: LineWindow[] = [];
    let start = 0;

    while (start < lines.length) {
      if (lines[start].length > this.maxChars) {
        for (const slice of this.sliceLine(lines[start])) {
          windows.push({ start, end: start, text: slice });
        }
        start++;
        continue;
      }

      let end = start;
      let size = lines[start].length;
      while (end + 1 < lines.length && size + 1 + lines[end + 1].length <= this.maxChars) {
        end++;
        size += 1 + lines[end].length;
      }

      windows.push({ start, end, text: lines.slice(start, end + 1).join('\n') });
      if (end === lines.length - 1) break;

      // Overlap must never stall the walk.
      start = Math.max(end - this.options.overlapLines + 1, start + 1);
    }

    return windows;
  }

  private sliceLine(line: string): string[] {
    const slices: string[] = [];
    for (let offset = 0; offset < line.length; offset += this.maxChars) {
      slices.push(line.slice(offset, offset + this.maxChars));
    }
    return slices;
  }
}
