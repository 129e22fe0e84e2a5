import type { Dirent, Stats } from 'node:fs';
import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import { getDocumentFormat } from '../indexing/documents';
import { getLanguageForFile } from '../tree-sitter';
import type { RepoSnapshot, RepoFileMeta, ScanOptions } from './types';
import { isBinaryFile, DEFAULT_IGNORES, IGNORE_FILE_NAME } from './utils';

export * from './types';
export { DEFAULT_IGNORES, IGNORE_FILE_NAME, isBinaryFile } from './utils';

type Fs = typeof nodeFs;

/**
 * Walks a working copy and lists the files worth indexing, sorted by path.
 */
export class RepoScanner {
  constructor(private readonly fs: Fs = nodeFs) {}

  async scan(repoRoot: string, options: ScanOptions = {}): Promise<RepoSnapshot> {
    const ig = ignore();
    const warnings: string[] = [];

    ig.add(DEFAULT_IGNORES);
    for (const ignoreFile of ['.gitignore', IGNORE_FILE_NAME]) {
      const content = await this.readOptional(path.join(repoRoot, ignoreFile));
      if (content !== null) {
        ig.add(content);
      }
    }
    if (options.excludes && options.excludes.length > 0) {
      ig.add(options.excludes);
    }

    const files: RepoFileMeta[] = [];
    let stoppedEarly = false;

    const walk = async (dir: string, relativeDir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await this.fs.readdir(dir, { withFileTypes: true });
      } catch {
        warnings.push(`Could not read directory: ${relativeDir || '.'}`);
        return;
      }
      entries.sort((a, b) => compareStrings(a.name, b.name));

      for (const entry of entries) {
        if (stoppedEarly) return;
        const relPath = relativeDir ? path.posix.join(relativeDir, entry.name) : entry.name;

        if (entry.isDirectory()) {
          if (ig.ignores(relPath + '/')) continue;
          await walk(path.join(dir, entry.name), relPath);
          continue;
        }
        if (!entry.isFile() || ig.ignores(relPath)) continue;

        const language = getLanguageForFile(entry.name);
        const document = language ? null : getDocumentFormat(relPath);
        if (options.parseableOnly && !language && !(options.documents && document)) continue;

        if (options.maxFiles !== undefined && files.length >= options.maxFiles) {
          warnings.push(`Stopped scanning early, hit max files limit of ${options.maxFiles}.`);
          stoppedEarly = true;
          return;
        }

        const absPath = path.join(dir, entry.name);
        let stats: Stats;
        try {
          stats = await this.fs.stat(absPath);
        } catch {
          continue;
        }
        const sizeLimit = document
          ? (options.maxDocumentSize ?? options.maxFileSize)
          : options.maxFileSize;
        if (sizeLimit !== undefined && stats.size > sizeLimit) {
          warnings.push(`Skipping large file: ${relPath} (${stats.size} bytes)`);
          continue;
        }

        const isText = !(await isBinaryFile(absPath));
        if (options.parseableOnly && !isText) continue;

        files.push({
          path: relPath,
          absPath,
          sizeBytes: stats.size,
          mtimeMs: stats.mtimeMs,
          ext: path.extname(entry.name),
          isText,
          language,
          document,
        });
      }
    };

    await walk(repoRoot, '');
    files.sort((a, b) => compareStrings(a.path, b.path));

    return { repoRoot, files, warnings };
  }

  private async readOptional(filePath: string): Promise<string | null> {
    try {
      return await this.fs.readFile(filePath, 'utf-8');
    } catch {
      return null;
    }
  }
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
