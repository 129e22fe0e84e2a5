import fs from 'fs/promises';
import {
  ParseError,
  eventEnvelope,
  type ChunkNode,
  type ChunkingConfig,
  type FileCheckpoint,
  type Logger,
} from '@repoindex/shared';
import {
  ChangeDetector,
  ChunkSplitter,
  DocumentChunker,
  RepoScanner,
  SyntaxChunkExtractor,
  hashFile,
  type ChangeSet,
  type RepoFileMeta,
} from '@repoindex/repo';
import type { VectorStore } from '@repoindex/store';

export interface ParsedFile {
  filePath: string;
  fileHash: string;
  /** Empty for files the parser skipped */
  chunks: ChunkNode[];
}

export interface ParseStageInput {
  repoId: string;
  runId: string;
  root: string;
  forceFull: boolean;
  checkpoints: FileCheckpoint[];
  onProgress?: (filesProcessed: number, filesTotal: number) => void;
}

export interface ParseStageResult {
  changes: ChangeSet;
  files: ParsedFile[];
  /** Files present in the working copy after filtering */
  filesTotal: number;
  chunkCount: number;
  skipped: string[];
}

export interface ParseStageDeps {
  vectors: VectorStore;
  logger: Logger;
  chunking: ChunkingConfig;
  scanner?: RepoScanner;
  detector?: ChangeDetector;
  extractor?: SyntaxChunkExtractor;
}

/**
 * Scan, classify and chunk. Source files go through the grammar and the
 * splitter; documentation and config files through the document chunker.
 * Files the parser rejects are kept with no chunks so their checkpoint
 * still records the hash.
 */
export class ParseStage {
  private readonly scanner: RepoScanner;
  private readonly detector: ChangeDetector;
  private readonly extractor: SyntaxChunkExtractor;
  private readonly splitter: ChunkSplitter;
  private readonly documents: DocumentChunker;

  constructor(private readonly deps: ParseStageDeps) {
    this.scanner = deps.scanner ?? new RepoScanner();
    this.detector = deps.detector ?? new ChangeDetector();
    this.extractor =
      deps.extractor ??
      new SyntaxChunkExtractor({
        ormBaseClasses: deps.chunking.ormBaseClasses,
        parseTimeoutMs: deps.chunking.parseTimeoutMs,
      });
    this.splitter = new ChunkSplitter({
      maxChunkTokens: deps.chunking.maxChunkTokens,
      overlapLines: deps.chunking.overlapLines,
    });
    this.documents = new DocumentChunker({ maxChunkChars: deps.chunking.maxChunkTokens * 4 });
  }

  async run(input: ParseStageInput): Promise<ParseStageResult> {
    const { logger } = this.deps;
    const snapshot = await this.scanner.scan(input.root, {
      excludes: this.deps.chunking.exclude,
      maxFileSize: this.deps.chunking.maxFileSizeBytes,
      parseableOnly: true,
      documents: this.deps.chunking.documents,
      maxDocumentSize: this.deps.chunking.maxDocumentSizeBytes,
    });
    for (const warning of snapshot.warnings) {
      await logger.warn(warning);
    }

    const byPath = new Map<string, RepoFileMeta & { fileHash: string }>();
    for (const file of snapshot.files) {
      byPath.set(file.path, { ...file, fileHash: await hashFile(file.absPath) });
    }

    let changes = this.detector.detect(input.checkpoints, [...byPath.values()].map((f) => ({
      path: f.path,
      fileHash: f.fileHash,
    })), { forceFull: input.forceFull });

    if (!input.forceFull) {
      const damaged = await this.findDamagedCheckpoints(input, changes.unchanged);
      changes = this.detector.reclassify(changes, damaged);
    }

    await logger.log({
      type: 'ChangesDetected',
      ...eventEnvelope(input.runId),
      payload: {
        added: changes.added.length,
        modified: changes.modified.length,
        unchanged: changes.unchanged.length,
        deleted: changes.deleted.length,
      },
    });

    const pending = [...changes.added, ...changes.modified].sort();
    const files: ParsedFile[] = [];
    const skipped: string[] = [];
    let chunkCount = 0;
    let splitUnits = 0;

    for (const filePath of pending) {
      const meta = byPath.get(filePath);
      if (!meta || (!meta.language && !meta.document)) continue;

      let chunks: ChunkNode[] = [];
      try {
        const content = await fs.readFile(meta.absPath, 'utf8');
        if (meta.language) {
          const extracted = this.extractor.extract({
            filePath,
            content,
            fileHash: meta.fileHash,
            language: meta.language,
          });
          const split = this.splitter.splitAll(extracted.chunks);
          chunks = split.chunks;
          splitUnits += split.splitUnits;
        } else if (meta.document) {
          chunks = this.documents.chunk({
            filePath,
            content,
            fileHash: meta.fileHash,
            format: meta.document,
          });
        }
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        skipped.push(filePath);
        await logger.log({
          type: 'FileSkipped',
          ...eventEnvelope(input.runId),
          payload: { path: filePath, reason: error.message },
        });
      }

      chunkCount += chunks.length;
      files.push({ filePath, fileHash: meta.fileHash, chunks });
      input.onProgress?.(files.length, pending.length);
    }

    await logger.log({
      type: 'ChunksExtracted',
      ...eventEnvelope(input.runId),
      payload: { files: files.length, chunks: chunkCount, splitUnits },
    });

    return { changes, files, filesTotal: byPath.size, chunkCount, skipped };
  }

  /**
   * Unchanged files whose checkpoint names chunks the vector store lacks.
   */
  private async findDamagedCheckpoints(
    input: ParseStageInput,
    unchanged: readonly string[],
  ): Promise<string[]> {
    const unchangedSet = new Set(unchanged);
    const candidates = input.checkpoints.filter(
      (c) => unchangedSet.has(c.filePath) && c.chunkIds.length > 0,
    );
    if (candidates.length === 0) return [];

    const missing = new Set(
      await this.deps.vectors.missingIds(
        input.repoId,
        candidates.flatMap((c) => c.chunkIds),
      ),
    );
    if (missing.size === 0) return [];

    const damaged: string[] = [];
    for (const checkpoint of candidates) {
      const missingChunkIds = checkpoint.chunkIds.filter((id) => missing.has(id));
      if (missingChunkIds.length === 0) continue;
      damaged.push(checkpoint.filePath);
      await this.deps.logger.log({
        type: 'ConsistencyErrorDetected',
        ...eventEnvelope(input.runId),
        payload: { path: checkpoint.filePath, missingChunkIds: missingChunkIds.length },
      });
    }
    return damaged;
  }
}
