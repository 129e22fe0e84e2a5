import path from 'node:path';
import { z } from 'zod';
import type { ChunkKind, ChunkNode } from '@repoindex/shared';
import { computeChunkId } from './chunk-id';

export type DocumentFormat = 'markdown' | 'restructuredtext' | 'text' | 'config';

export const DOCUMENT_EXTENSIONS: Readonly<Record<string, DocumentFormat>> = {
  '.md': 'markdown',
  '.rst': 'restructuredtext',
  '.txt': 'text',
};

/** Matched by exact file name, in any directory. */
export const CONFIG_FILENAMES: ReadonlySet<string> = new Set([
  'package.json',
  'pyproject.toml',
  'docker-compose.yml',
  'docker-compose.yaml',
  '.env.example',
]);

export const DOCUMENT_KINDS: ReadonlySet<ChunkKind> = new Set(['section', 'config']);

const MAX_SECTION_CHARS = 8000;
const MAX_CONFIG_CHARS = 5000;
const MAX_PACKAGE_JSON_CHARS = 3000;
const MIN_SECTION_CHARS = 50;
const MIN_PARAGRAPH_CHARS = 100;
const PARAGRAPH_OVERLAP_CHARS = 200;
const MAX_SCRIPTS = 20;
const MAX_DEPENDENCIES = 30;

const HEADING = /^(#{1,3})\s+(.+)$/gm;

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
  scripts: z.record(z.string()).optional(),
  dependencies: z.record(z.string()).optional(),
});

export interface DocumentFile {
  /** Repository-relative, forward slashes */
  filePath: string;
  content: string;
  fileHash: string;
  format: DocumentFormat;
}

export interface DocumentChunkerOptions {
  /** Upper bound on any chunk's content; the per-format limits apply below it */
  maxChunkChars?: number;
}

interface DocumentPart {
  kind: ChunkKind;
  name: string;
  language: string;
  startLine: number;
  endLine: number;
  content: string;
  partIndex?: number;
  partCount?: number;
}

export function getDocumentFormat(filePath: string): DocumentFormat | null {
  const baseName = path.posix.basename(filePath);
  if (CONFIG_FILENAMES.has(baseName)) return 'config';
  return DOCUMENT_EXTENSIONS[path.posix.extname(baseName).toLowerCase()] ?? null;
}

export function isDocumentChunk(chunk: Pick<ChunkNode, 'kind'>): boolean {
  return DOCUMENT_KINDS.has(chunk.kind);
}

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}

/** 1-based line of the character at `offset`. */
function lineAt(source: string, offset: number): number {
  return countNewlines(source.slice(0, offset)) + 1;
}

function lastLine(source: string): number {
  return lineAt(source, source.trimEnd().length);
}

/**
 * Chunks documentation and configuration files without a grammar:
 * Markdown by H1 to H3 heading, reStructuredText as one chunk, plain text
 * by paragraph. `package.json` is summarized; other config files are kept
 * whole up to a size limit.
 */
export class DocumentChunker {
  private readonly maxChunkChars: number;

  constructor(options: DocumentChunkerOptions = {}) {
    this.maxChunkChars = options.maxChunkChars ?? MAX_SECTION_CHARS;
    if (this.maxChunkChars <= 0) {
      throw new RangeError('maxChunkChars must be positive');
    }
  }

  chunk(file: DocumentFile): ChunkNode[] {
    if (file.content.trim() === '') return [];
    return this.parts(file).map((part) => this.toChunk(file, part));
  }

  private parts(file: DocumentFile): DocumentPart[] {
    switch (file.format) {
      case 'markdown':
        return this.markdown(file.filePath, file.content);
      case 'restructuredtext':
        return [this.whole(file.filePath, file.content, 'section', 'restructuredtext', MAX_SECTION_CHARS)];
      case 'text':
        return this.paragraphs(file.content);
      case 'config':
        return [this.config(file.filePath, file.content)];
    }
  }

  private limit(max: number): number {
    return Math.min(max, this.maxChunkChars);
  }

  private markdown(filePath: string, source: string): DocumentPart[] {
    const headings = [...source.matchAll(HEADING)];
    if (headings.length === 0) {
      return [
        {
          kind: 'section',
          name: path.posix.basename(filePath, path.posix.extname(filePath)),
          language: 'markdown',
          startLine: 1,
          endLine: lastLine(source),
          content: source.trim().slice(0, this.limit(MAX_SECTION_CHARS)),
        },
      ];
    }

    const parts: DocumentPart[] = [];
    headings.forEach((heading, i) => {
      const start = heading.index ?? 0;
      const end = headings[i + 1]?.index ?? source.length;
      const section = source.slice(start, end).trimEnd();
      if (section.length < MIN_SECTION_CHARS) return;

      const title = heading[2].trim().slice(0, 100);
      const startLine = lineAt(source, start);
      const endLine = lineAt(source, start + section.length - 1);
      const pieces = packParagraphs(section, this.limit(MAX_SECTION_CHARS));
      pieces.forEach((content, partIndex) => {
        const split = pieces.length > 1;
        parts.push({
          kind: 'section',
          name: split ? `${title.slice(0, 80)} (part ${partIndex + 1})` : title,
          language: 'markdown',
          startLine,
          endLine,
          content,
          ...(split ? { partIndex, partCount: pieces.length } : {}),
        });
      });
    });
    return parts;
  }

  /** Paragraphs are separated by blank lines; short ones are dropped. */
  private paragraphs(source: string): DocumentPart[] {
    const parts: DocumentPart[] = [];
    let line = 1;
    source.split(/(\n{2,})/).forEach((piece, i) => {
      if (i % 2 === 0) {
        const trimmed = piece.trim();
        if (trimmed.length >= MIN_PARAGRAPH_CHARS) {
          const leading = piece.length - piece.trimStart().length;
          const startLine = line + countNewlines(piece.slice(0, leading));
          parts.push({
            kind: 'section',
            name: trimmed.slice(0, 60).replace(/\s+/g, ' '),
            language: 'text',
            startLine,
            endLine: startLine + countNewlines(trimmed),
            content: trimmed.slice(0, this.limit(MAX_SECTION_CHARS)),
          });
        }
      }
      line += countNewlines(piece);
    });
    return parts;
  }

  private config(filePath: string, source: string): DocumentPart {
    const baseName = path.posix.basename(filePath);
    if (baseName === 'package.json') {
      const max = this.limit(MAX_PACKAGE_JSON_CHARS);
      return {
        kind: 'config',
        name: baseName,
        language: 'json',
        startLine: 1,
        endLine: lastLine(source),
        content: (summarizePackageJson(source) ?? source).slice(0, max),
      };
    }
    const language = /\.ya?ml$/.test(baseName) ? 'yaml' : baseName.endsWith('.toml') ? 'toml' : 'text';
    return this.whole(filePath, source, 'config', language, MAX_CONFIG_CHARS);
  }

  private whole(
    filePath: string,
    source: string,
    kind: ChunkKind,
    language: string,
    max: number,
  ): DocumentPart {
    return {
      kind,
      name: path.posix.basename(filePath),
      language,
      startLine: 1,
      endLine: lastLine(source),
      content: source.slice(0, this.limit(max)),
    };
  }

  private toChunk(file: DocumentFile, part: DocumentPart): ChunkNode {
    const identity = {
      filePath: file.filePath,
      kind: part.kind,
      name: part.name,
      startLine: part.startLine,
      endLine: part.endLine,
      partIndex: part.partIndex ?? null,
      fileHash: file.fileHash,
    };
    return {
      id: computeChunkId(identity),
      ...identity,
      language: part.language,
      content: part.content,
      calls: [],
      decorators: [],
      parentName: null,
      docstring: null,
      isOrmModel: false,
      ormFields: [],
      partCount: part.partCount ?? null,
    };
  }
}

/**
 * Packs paragraphs into pieces of at most `maxChars`. Each new piece
 * repeats up to 200 characters from the tail of the previous one, as far
 * as the next paragraph leaves room.
 */
export function packParagraphs(text: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let current = '';
  for (const paragraph of text.split(/\n{2,}/)) {
    if (current.trim() !== '' && current.length + paragraph.length > maxChars) {
      pieces.push(current.trim());
      const keep = Math.min(PARAGRAPH_OVERLAP_CHARS, Math.max(0, maxChars - paragraph.length - 2));
      current = keep > 0 ? `${current.slice(-keep)}\n\n${paragraph}` : paragraph;
    } else {
      current = current ? `${current}\n\n${paragraph}` : paragraph;
    }
  }
  if (current.trim() !== '') pieces.push(current.trim());
  return pieces.map((piece) => piece.slice(0, maxChars));
}

/** Name, version, description, scripts and dependency names, one per line. */
export function summarizePackageJson(source: string): string | null {
  let data: unknown;
  try {
    data = JSON.parse(source);
  } catch {
    return null;
  }
  const parsed = PackageJsonSchema.safeParse(data);
  if (!parsed.success) return null;

  const pkg = parsed.data;
  const lines: string[] = [];
  if (pkg.name) lines.push(`Package: ${pkg.name}`);
  if (pkg.version) lines.push(`Version: ${pkg.version}`);
  if (pkg.description) lines.push(`Description: ${pkg.description}`);
  const scripts = Object.entries(pkg.scripts ?? {}).slice(0, MAX_SCRIPTS);
  if (scripts.length > 0) {
    lines.push(`Scripts: ${scripts.map(([name, command]) => `${name}: ${command}`).join(', ')}`);
  }
  const dependencies = Object.keys(pkg.dependencies ?? {}).slice(0, MAX_DEPENDENCIES);
  if (dependencies.length > 0) lines.push(`Dependencies: ${dependencies.join(', ')}`);
  return lines.length > 0 ? lines.join('\n') : null;
}
