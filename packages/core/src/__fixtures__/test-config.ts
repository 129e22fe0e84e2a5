import { createHash } from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigSchema, type Config } from '@repoindex/shared';
import { ConfigLoader, type ConfigFlags } from '../config/loader';

/**
 * Config for engine tests: state under `root`, in-memory vectors, a small
 * local-hash embedder and no waiting between task retries.
 */
export function testConfig(root: string, overrides: ConfigFlags = {}): Config {
  const base: ConfigFlags = {
    storage: {
      statePath: path.join(root, 'state.sqlite'),
      reposDir: path.join(root, 'repos'),
      vectors: { backend: 'memory' },
    },
    embeddings: {
      provider: 'local-hash',
      dims: 64,
      batchSize: 2,
      concurrency: 2,
      retry: { maxRetries: 0 },
    },
    pipeline: { retryDelayMs: 10, keepAliveMs: 1000 },
  };
  return ConfigSchema.parse(ConfigLoader.mergeConfigs(ConfigLoader.mergeConfigs({}, base), overrides));
}

/** Hex sha256 of a text file's content, as the scanner hashes it. */
export function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Writes `files` (path -> content) under `root`; null deletes. */
export async function writeFiles(root: string, files: Record<string, string | null>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const target = path.join(root, relPath);
    if (content === null) {
      await fs.rm(target, { force: true });
      continue;
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

export const SAMPLE_FILES = {
  'a.py': ['def foo():', '    return bar()', '', '', 'def bar():', '    return 1', ''].join('\n'),
  'b.py': [
    'class User:',
    '    """A user."""',
    '',
    '    def save(self):',
    '        return foo()',
    '',
  ].join('\n'),
};
