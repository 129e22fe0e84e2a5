import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import {
  ChunkingConfigSchema,
  MemoryLogger,
  ParseError,
  type FileCheckpoint,
} from '@repoindex/shared';
import { SyntaxChunkExtractor, type SourceFile } from '@repoindex/repo';
import { MemoryVectorBackend } from '@repoindex/store';
import { SAMPLE_FILES, makeTempDir, sha256, writeFiles } from '../__fixtures__/test-config';
import { ParseStage } from './parse-stage';

class RejectingExtractor extends SyntaxChunkExtractor {
  extract(file: SourceFile) {
    if (file.filePath === 'bad.py') {
      throw new ParseError(file.filePath, 'parse timed out');
    }
    return super.extract(file);
  }
}

function checkpoint(filePath: string, fileHash: string, chunkIds: string[]): FileCheckpoint {
  return {
    repoId: 'repo-1',
    filePath,
    fileHash,
    revision: null,
    chunkIds,
    chunkCount: chunkIds.length,
    updatedAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('ParseStage', () => {
  let root: string;
  let vectors: MemoryVectorBackend;
  let logger: MemoryLogger;
  let stage: ParseStage;

  beforeEach(async () => {
    root = await makeTempDir('parse-stage-');
    await writeFiles(root, { ...SAMPLE_FILES, 'README.md': '# widgets\n' });
    vectors = new MemoryVectorBackend();
    await vectors.init();
    logger = new MemoryLogger();
    stage = new ParseStage({
      vectors,
      logger,
      chunking: ChunkingConfigSchema.parse({ documents: false }),
      extractor: new RejectingExtractor(),
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('chunks every new parseable file', async () => {
    const progress: [number, number][] = [];
    const result = await stage.run({
      repoId: 'repo-1',
      runId: 'task-1',
      root,
      forceFull: false,
      checkpoints: [],
      onProgress: (done, total) => progress.push([done, total]),
    });

    expect(result.changes.added).toEqual(['a.py', 'b.py']);
    expect(result.filesTotal).toBe(2);
    expect(result.files.map((f) => [f.filePath, f.chunks.map((c) => c.name)])).toEqual([
      ['a.py', ['foo', 'bar']],
      ['b.py', ['User', 'save']],
    ]);
    expect(result.files[0].fileHash).toBe(sha256(SAMPLE_FILES['a.py']));
    expect(result.chunkCount).toBe(4);
    expect(result.skipped).toEqual([]);
    expect(progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
    expect(logger.eventsOfType('ChunksExtracted')[0].payload).toEqual({
      files: 2,
      chunks: 4,
      splitUnits: 0,
    });
  });

  it('keeps a file the parser rejects, with no chunks', async () => {
    await writeFiles(root, { 'bad.py': 'def broken(:\n' });

    const result = await stage.run({
      repoId: 'repo-1',
      runId: 'task-1',
      root,
      forceFull: false,
      checkpoints: [],
    });

    expect(result.skipped).toEqual(['bad.py']);
    expect(result.files.find((f) => f.filePath === 'bad.py')?.chunks).toEqual([]);
    expect(result.chunkCount).toBe(4);
    expect(logger.eventsOfType('FileSkipped')[0].payload).toEqual({
      path: 'bad.py',
      reason: 'bad.py: parse timed out',
    });
  });

  it('re-chunks unchanged files whose vectors are missing', async () => {
    const result = await stage.run({
      repoId: 'repo-1',
      runId: 'task-2',
      root,
      forceFull: false,
      checkpoints: [
        checkpoint('a.py', sha256(SAMPLE_FILES['a.py']), ['lost-chunk']),
        checkpoint('b.py', sha256(SAMPLE_FILES['b.py']), []),
        checkpoint('gone.py', 'old-hash', []),
      ],
    });

    expect(result.changes).toEqual({
      added: [],
      modified: ['a.py'],
      unchanged: ['b.py'],
      deleted: ['gone.py'],
    });
    expect(result.files.map((f) => f.filePath)).toEqual(['a.py']);
    expect(logger.eventsOfType('ConsistencyErrorDetected')[0].payload).toEqual({
      path: 'a.py',
      missingChunkIds: 1,
    });
    expect(logger.eventsOfType('ChangesDetected')[0].payload).toEqual({
      added: 0,
      modified: 1,
      unchanged: 1,
      deleted: 1,
    });
  });

  it('treats every file as modified on a forced run', async () => {
    const result = await stage.run({
      repoId: 'repo-1',
      runId: 'task-3',
      root,
      forceFull: true,
      checkpoints: [checkpoint('a.py', sha256(SAMPLE_FILES['a.py']), ['lost-chunk'])],
    });

    expect(result.changes.modified).toEqual(['a.py']);
    expect(result.changes.added).toEqual(['b.py']);
    expect(logger.eventsOfType('ConsistencyErrorDetected')).toHaveLength(0);
  });

  describe('documentation and config files', () => {
    const guide = ['# Guide', '', 'Install the widgets package and run the setup command once.', ''].join(
      '\n',
    );

    beforeEach(async () => {
      await writeFiles(root, {
        'README.md': guide,
        'package.json': JSON.stringify({
          name: 'widgets',
          version: '1.0.0',
          dependencies: { zod: '^3.0.0' },
        }),
        '.env.example': 'API_KEY=\n',
        '.env': 'API_KEY=test-secret\n',
      });
    });

    function documentStage(overrides: Record<string, unknown> = {}): ParseStage {
      return new ParseStage({ vectors, logger, chunking: ChunkingConfigSchema.parse(overrides) });
    }

    it('chunks them beside the source files', async () => {
      const result = await documentStage().run({
        repoId: 'repo-1',
        runId: 'task-4',
        root,
        forceFull: false,
        checkpoints: [],
      });

      expect(result.changes.added).toEqual([
        '.env.example',
        'README.md',
        'a.py',
        'b.py',
        'package.json',
      ]);
      expect(result.filesTotal).toBe(5);
      expect(result.chunkCount).toBe(7);

      const chunks = new Map(result.files.map((f) => [f.filePath, f.chunks]));
      expect(chunks.get('README.md')?.map((c) => [c.kind, c.name, c.startLine, c.endLine])).toEqual([
        ['section', 'Guide', 1, 3],
      ]);
      expect(chunks.get('package.json')?.map((c) => [c.kind, c.language, c.content])).toEqual([
        ['config', 'json', 'Package: widgets\nVersion: 1.0.0\nDependencies: zod'],
      ]);
      expect(chunks.get('.env.example')?.map((c) => [c.kind, c.name, c.content])).toEqual([
        ['config', '.env.example', 'API_KEY=\n'],
      ]);
      expect(chunks.get('README.md')?.[0].fileHash).toBe(sha256(guide));
    });

    it('skips documents over their own size limit', async () => {
      const result = await documentStage({ maxDocumentSizeBytes: 40 }).run({
        repoId: 'repo-1',
        runId: 'task-5',
        root,
        forceFull: false,
        checkpoints: [],
      });

      expect(result.changes.added).toEqual(['.env.example', 'a.py', 'b.py']);
      expect(logger.messages).toContainEqual({
        level: 'warn',
        message: `Skipping large file: README.md (${Buffer.byteLength(guide)} bytes)`,
      });
    });
  });
});
