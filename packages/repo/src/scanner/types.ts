import type { DocumentFormat } from '../indexing/documents';
import type { SupportedLanguage } from '../tree-sitter';

export interface ScanOptions {
  /** Extra ignore patterns, gitignore syntax */
  excludes?: string[];
  maxFiles?: number;
  /** Files larger than this are skipped with a warning */
  maxFileSize?: number;
  /** Keep only text files a grammar can parse */
  parseableOnly?: boolean;
  /** With `parseableOnly`, also keep documentation and known config files */
  documents?: boolean;
  /** Size limit for documentation and config files; `maxFileSize` when unset */
  maxDocumentSize?: number;
}

export interface RepoFileMeta {
  /** Relative to the repository root, always with forward slashes */
  path: string;
  absPath: string;
  sizeBytes: number;
  mtimeMs: number;
  ext: string;
  isText: boolean;
  language: SupportedLanguage | null;
  /** Set for documentation and config files that have no grammar */
  document: DocumentFormat | null;
}

export interface RepoSnapshot {
  repoRoot: string;
  files: RepoFileMeta[];
  warnings: string[];
}
