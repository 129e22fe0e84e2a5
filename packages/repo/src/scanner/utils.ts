import fs, { type FileHandle } from 'node:fs/promises';
import isBinaryPath from 'is-binary-path';

const SNIFF_BYTES = 1024;

/**
 * Binary by extension, or by a NUL byte within the first KiB.
 * Unreadable files count as binary so that they are never parsed.
 */
export async function isBinaryFile(filePath: string): Promise<boolean> {
  if (isBinaryPath(filePath)) {
    return true;
  }

  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(filePath, 'r');
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } catch {
    return true;
  } finally {
    await handle?.close();
  }
}

export const DEFAULT_IGNORES = [
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  '__pycache__',
  '.venv',
  'venv',
  '.tox',
  '.mypy_cache',
  '.pytest_cache',
  'dist',
  'build',
  'out',
  'target',
  'vendor',
  '.next',
  '.turbo',
  'coverage',
  '.idea',
  '.vscode',
  '.repoindex',
  // lock files and secrets
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'poetry.lock',
  'Pipfile.lock',
  'Cargo.lock',
  'composer.lock',
  'Gemfile.lock',
  'go.sum',
  '.env',
  '.env.*',
  '!.env.example',
  '*.min.js',
];

export const IGNORE_FILE_NAME = '.repoindexignore';
