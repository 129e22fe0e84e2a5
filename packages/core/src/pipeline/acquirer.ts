import fs from 'fs/promises';
import path from 'path';
import { UsageError, type RepositorySnapshot } from '@repoindex/shared';
import { GitService, withAccessToken } from '@repoindex/repo';

export interface AcquireOptions {
  branch?: string;
  /** Clone-time credential; never stored */
  token?: string;
}

export interface AcquiredRepository {
  root: string;
  /** Commit at acquisition time, null for a local directory outside git */
  revision: string | null;
  branch: string;
}

/**
 * Makes a repository's files available on disk: local repositories are read
 * in place, remote ones are cloned under `reposDir/<repoId>` or fast-forwarded.
 */
export class RepositoryAcquirer {
  constructor(
    private readonly git: GitService,
    private readonly reposDir: string,
  ) {}

  workingCopyPath(repo: RepositorySnapshot): string {
    return repo.platform === 'local' ? repo.url : path.join(this.reposDir, repo.id);
  }

  async acquire(repo: RepositorySnapshot, options: AcquireOptions = {}): Promise<AcquiredRepository> {
    if (repo.platform === 'local') {
      return this.acquireLocal(repo.url, options.branch ?? repo.defaultBranch);
    }

    const dest = this.workingCopyPath(repo);
    const cloneUrl = withAccessToken(repo.url, options.token);
    const branch = options.branch ?? repo.defaultBranch;

    if (await this.git.isRepository(dest)) {
      await this.git.fetchAndReset(dest, cloneUrl, branch);
    } else {
      await this.git.clone(cloneUrl, dest, {
        branch: branch === 'HEAD' ? undefined : branch,
        depth: 1,
      });
    }

    return {
      root: dest,
      revision: await this.git.revParse(dest),
      branch: await this.git.currentBranch(dest),
    };
  }

  private async acquireLocal(root: string, fallbackBranch: string): Promise<AcquiredRepository> {
    const stat = await fs.stat(root).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new UsageError(`Local repository path is not a directory: ${root}`);
    }
    if (!(await this.git.isRepository(root))) {
      return { root, revision: null, branch: fallbackBranch };
    }
    return {
      root,
      revision: await this.git.revParse(root),
      branch: await this.git.currentBranch(root),
    };
  }

  /** Removes the clone of a remote repository; local directories are left alone. */
  async release(repo: RepositorySnapshot): Promise<void> {
    if (repo.platform === 'local') return;
    await fs.rm(this.workingCopyPath(repo), { recursive: true, force: true });
  }
}
