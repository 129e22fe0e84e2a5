import { describe, it, expect } from 'vitest';
import {
  DocumentChunker,
  getDocumentFormat,
  packParagraphs,
  summarizePackageJson,
  type DocumentFile,
} from './documents';

function doc(filePath: string, content: string, format = getDocumentFormat(filePath)): DocumentFile {
  if (format === null) throw new Error(`not a document: ${filePath}`);
  return { filePath, content, fileHash: 'hash-doc', format };
}

describe('getDocumentFormat', () => {
  it('maps documentation extensions and known config names', () => {
    expect(getDocumentFormat('docs/Guide.MD')).toBe('markdown');
    expect(getDocumentFormat('docs/index.rst')).toBe('restructuredtext');
    expect(getDocumentFormat('notes.txt')).toBe('text');
    expect(getDocumentFormat('web/package.json')).toBe('config');
    expect(getDocumentFormat('docker-compose.yaml')).toBe('config');
    expect(getDocumentFormat('.env.example')).toBe('config');
  });

  it('returns null for everything else', () => {
    expect(getDocumentFormat('tsconfig.json')).toBeNull();
    expect(getDocumentFormat('app.py')).toBeNull();
    expect(getDocumentFormat('.env')).toBeNull();
  });
});

describe('DocumentChunker', () => {
  const chunker = new DocumentChunker();

  it('returns nothing for a blank file', () => {
    expect(chunker.chunk(doc('README.md', '  \n\n'))).toEqual([]);
  });

  describe('markdown', () => {
    it('splits on H1 to H3 headings and drops short sections', () => {
      const content = [
        'intro line',
        '# Alpha',
        'Alpha body text that is long enough to be kept as a section.',
        '## Short',
        'tiny',
        '### Gamma',
        'Gamma body text that is also comfortably longer than the minimum.',
        '',
      ].join('\n');

      const chunks = chunker.chunk(doc('docs/guide.md', content));

      expect(chunks.map((c) => [c.kind, c.name, c.startLine, c.endLine, c.partIndex])).toEqual([
        ['section', 'Alpha', 2, 3, null],
        ['section', 'Gamma', 6, 7, null],
      ]);
      expect(chunks[0].content).toBe(
        '# Alpha\nAlpha body text that is long enough to be kept as a section.',
      );
      expect(chunks[0]).toMatchObject({
        filePath: 'docs/guide.md',
        language: 'markdown',
        fileHash: 'hash-doc',
        calls: [],
        isOrmModel: false,
      });
      expect(new Set(chunks.map((c) => c.id)).size).toBe(2);
    });

    it('keeps a file without headings as one section named after it', () => {
      const chunks = chunker.chunk(doc('readme.md', 'Just some notes.\n'));

      expect(chunks.map((c) => [c.name, c.startLine, c.endLine, c.content])).toEqual([
        ['readme', 1, 1, 'Just some notes.'],
      ]);
    });

    it('breaks an oversized section into overlapping parts', () => {
      const [a, b, c] = ['a', 'b', 'c'].map((ch) => ch.repeat(120));
      const content = ['# Big', '', a, '', b, '', c, ''].join('\n');

      const chunks = new DocumentChunker({ maxChunkChars: 300 }).chunk(doc('big.md', content));

      expect(chunks.map((ch) => [ch.name, ch.startLine, ch.endLine, ch.partIndex, ch.partCount])).toEqual([
        ['Big (part 1)', 1, 7, 0, 2],
        ['Big (part 2)', 1, 7, 1, 2],
      ]);
      expect(chunks[0].content).toBe(`# Big\n\n${a}\n\n${b}`);
      expect(chunks[1].content).toBe(`${'a'.repeat(56)}\n\n${b}\n\n${c}`);
      expect(chunks[0].id).not.toBe(chunks[1].id);
    });
  });

  it('keeps reStructuredText whole', () => {
    const content = 'Title\n=====\n\nBody.\n';

    const chunks = chunker.chunk(doc('docs/index.rst', content));

    expect(chunks.map((c) => [c.kind, c.name, c.language, c.startLine, c.endLine, c.content])).toEqual([
      ['section', 'index.rst', 'restructuredtext', 1, 4, content],
    ]);
  });

  it('splits plain text by paragraph and skips short ones', () => {
    const first = `First paragraph ${'x'.repeat(100)}`;
    const content = [first, '', 'short one', '', '', 'Second paragraph starts here', 'y'.repeat(100)].join(
      '\n',
    );

    const chunks = chunker.chunk(doc('notes.txt', content));

    expect(chunks.map((c) => [c.name, c.startLine, c.endLine, c.language])).toEqual([
      [`First paragraph ${'x'.repeat(44)}`, 1, 1, 'text'],
      [`Second paragraph starts here ${'y'.repeat(31)}`, 6, 7, 'text'],
    ]);
    expect(chunks[1].content).toBe(`Second paragraph starts here\n${'y'.repeat(100)}`);
  });

  describe('config files', () => {
    it('summarizes package.json', () => {
      const content = JSON.stringify(
        { name: 'widgets', version: '1.0.0', scripts: { test: 'vitest run' }, dependencies: { zod: '^3.0.0' } },
        null,
        2,
      );

      const [chunk] = chunker.chunk(doc('package.json', content));

      expect(chunk).toMatchObject({ kind: 'config', name: 'package.json', language: 'json', startLine: 1 });
      expect(chunk.endLine).toBe(content.split('\n').length);
      expect(chunk.content).toBe(
        'Package: widgets\nVersion: 1.0.0\nScripts: test: vitest run\nDependencies: zod',
      );
    });

    it('keeps a package.json it cannot read as raw text', () => {
      const [chunk] = chunker.chunk(doc('package.json', '{ not json'));
      expect(chunk.content).toBe('{ not json');
    });

    it('keeps other config files whole with their own language', () => {
      const compose = 'services:\n  web:\n    image: app\n';

      expect(
        chunker.chunk(doc('deploy/docker-compose.yml', compose)).map((c) => [c.kind, c.name, c.language, c.endLine]),
      ).toEqual([['config', 'docker-compose.yml', 'yaml', 3]]);
      expect(chunker.chunk(doc('pyproject.toml', '[project]\n'))[0].language).toBe('toml');
      expect(chunker.chunk(doc('.env.example', 'API_KEY=\n'))[0].language).toBe('text');
    });

    it('caps config content at 5000 characters', () => {
      const [chunk] = chunker.chunk(doc('pyproject.toml', 'x'.repeat(6000)));
      expect(chunk.content).toHaveLength(5000);
    });
  });
});

describe('packParagraphs', () => {
  it('returns a short text as one piece', () => {
    expect(packParagraphs('one\n\ntwo', 100)).toEqual(['one\n\ntwo']);
  });

  it('never exceeds the limit, even for a single long paragraph', () => {
    const pieces = packParagraphs(`intro\n\n${'z'.repeat(50)}`, 20);
    expect(pieces).toEqual(['intro', 'z'.repeat(20)]);
  });
});

describe('summarizePackageJson', () => {
  it('returns null for input without any known field', () => {
    expect(summarizePackageJson('{}')).toBeNull();
    expect(summarizePackageJson('[]')).toBeNull();
    expect(summarizePackageJson('nope')).toBeNull();
  });
});
