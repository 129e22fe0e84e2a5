import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { RepoScanner } from './index';

describe('RepoScanner', () => {
  let tmpDir: string;
  let scanner: RepoScanner;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoindex-scanner-'));
    scanner = new RepoScanner();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string | Buffer>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  it('lists files sorted by path with their language', async () => {
    await createFiles({
      'src/b.py': 'x = 1',
      'README.md': '# Hello',
      'src/a.ts': 'export const a = 1;',
    });

    const snapshot = await scanner.scan(tmpDir);

    expect(snapshot.repoRoot).toBe(tmpDir);
    expect(snapshot.files.map((f) => [f.path, f.language])).toEqual([
      ['README.md', null],
      ['src/a.ts', 'typescript'],
      ['src/b.py', 'python'],
    ]);
    expect(snapshot.warnings).toEqual([]);
  });

  it('respects default ignores, .gitignore and .repoindexignore', async () => {
    await createFiles({
      'node_modules/foo/index.js': 'ignored',
      '__pycache__/a.cpython.pyc': 'ignored',
      '.env': 'TOKEN=test-secret',
      '.gitignore': 'generated/\n',
      '.repoindexignore': 'legacy.py\n',
      'generated/api.py': 'ignored',
      'legacy.py': 'ignored',
      'app.py': 'kept',
    });

    const snapshot = await scanner.scan(tmpDir, { parseableOnly: true });

    expect(snapshot.files.map((f) => f.path)).toEqual(['app.py']);
  });

  it('applies extra exclude patterns', async () => {
    await createFiles({ 'a.py': 'a', 'tests/test_a.py': 't' });

    const snapshot = await scanner.scan(tmpDir, { excludes: ['tests/'] });

    expect(snapshot.files.map((f) => f.path)).toEqual(['a.py']);
  });

  it('keeps only parseable text files when asked', async () => {
    await createFiles({
      'data.py': Buffer.from([0x00, 0x01, 0x02]),
      'notes.txt': 'plain',
      'main.go': 'package main',
    });

    const all = await scanner.scan(tmpDir);
    expect(all.files.find((f) => f.path === 'data.py')?.isText).toBe(false);

    const parseable = await scanner.scan(tmpDir, { parseableOnly: true });
    expect(parseable.files.map((f) => f.path)).toEqual(['main.go']);
  });

  it('adds documentation and config files when asked, under their own size limit', async () => {
    await createFiles({
      'main.go': 'package main',
      'README.md': '# Title',
      'docs/notes.txt': 'n'.repeat(50),
      'package.json': '{}',
      '.env.example': 'API_KEY=',
      '.env.local': 'API_KEY=test-secret',
      'yarn.lock': '',
      'Gemfile.lock': '',
      'tsconfig.json': '{}',
    });

    const snapshot = await scanner.scan(tmpDir, {
      parseableOnly: true,
      documents: true,
      maxDocumentSize: 20,
    });

    expect(snapshot.files.map((f) => [f.path, f.language, f.document])).toEqual([
      ['.env.example', null, 'config'],
      ['README.md', null, 'markdown'],
      ['main.go', 'go', null],
      ['package.json', null, 'config'],
    ]);
    expect(snapshot.warnings).toEqual(['Skipping large file: docs/notes.txt (50 bytes)']);
  });

  it('sees new files on every scan', async () => {
    await createFiles({ 'a.py': 'a' });
    expect((await scanner.scan(tmpDir)).files).toHaveLength(1);

    await createFiles({ 'b.py': 'b' });
    expect((await scanner.scan(tmpDir)).files.map((f) => f.path)).toEqual(['a.py', 'b.py']);
  });

  describe('guardrails', () => {
    it('enforces the maxFiles limit', async () => {
      await createFiles({ 'a.py': 'a', 'b.py': 'b', 'c.py': 'c' });

      const snapshot = await scanner.scan(tmpDir, { maxFiles: 2 });

      expect(snapshot.files.map((f) => f.path)).toEqual(['a.py', 'b.py']);
      expect(snapshot.warnings).toEqual(['Stopped scanning early, hit max files limit of 2.']);
    });

    it('skips files above maxFileSize', async () => {
      await createFiles({ 'small.py': 'x = 1', 'large.py': 'a'.repeat(200) });

      const snapshot = await scanner.scan(tmpDir, { maxFileSize: 100 });

      expect(snapshot.files.map((f) => f.path)).toEqual(['small.py']);
      expect(snapshot.warnings).toEqual(['Skipping large file: large.py (200 bytes)']);
    });
  });
});
