import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import { GitError, redactString } from '@repoindex/shared';

export { parseRepositoryRef, withAccessToken, type ParsedRepositoryRef } from './url';

export interface CloneOptions {
  branch?: string;
  depth?: number;
}

export class GitService {
  private async exec(args: string[], cwd?: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = spawn('git', args, {
        cwd,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });
      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(stdout.trim());
          return;
        }
        const command = redactString(`git ${args.join(' ')}`).redacted;
        reject(
          new GitError(`Git command failed: ${command}\n${redactString(stderr.trim()).redacted}`, {
            exitCode: code ?? undefined,
          }),
        );
      });

      child.on('error', (err) => {
        reject(new GitError(`Failed to start git process: ${err.message}`, { cause: err }));
      });
    });
  }

  /**
   * Shallow clone of one branch into `dest`, replacing whatever is there.
   */
  async clone(url: string, dest: string, options: CloneOptions = {}): Promise<void> {
    await fs.rm(dest, { recursive: true, force: true });
    await fs.mkdir(path.dirname(dest), { recursive: true });

    const args = ['clone', '--depth', String(options.depth ?? 1), '--single-branch'];
    if (options.branch) {
      args.push('--branch', options.branch);
    }
    args.push(url, dest);
    await this.exec(args);
  }

  /**
   * Fetches `branch` from `url` and moves the working copy to it.
   */
  async fetchAndReset(repoPath: string, url: string, branch: string): Promise<void> {
    await this.exec(['fetch', '--depth', '1', url, branch], repoPath);
    await this.exec(['reset', '--hard', 'FETCH_HEAD'], repoPath);
  }

  async revParse(repoPath: string, ref = 'HEAD'): Promise<string> {
    return this.exec(['rev-parse', ref], repoPath);
  }

  async currentBranch(repoPath: string): Promise<string> {
    return this.exec(['rev-parse', '--abbrev-ref', 'HEAD'], repoPath);
  }

  async isRepository(dir: string): Promise<boolean> {
    try {
      await fs.access(path.join(dir, '.git'));
      return true;
    } catch {
      return false;
    }
  }
}
