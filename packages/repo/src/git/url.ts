import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { UsageError, type RepositoryPlatform } from '@repoindex/shared';

export interface ParsedRepositoryRef {
  /** Canonical URL without credentials, or an absolute path for local repositories */
  url: string;
  platform: RepositoryPlatform;
  owner: string | null;
  /** `owner/repo` for hosted repositories, the directory name for local ones */
  name: string;
  isLocal: boolean;
}

const KNOWN_HOSTS: Record<string, RepositoryPlatform> = {
  'github.com': 'github',
  'gitlab.com': 'gitlab',
  'bitbucket.org': 'bitbucket',
};

const SSH_PATTERN = /^[\w.-]+@([\w.-]+):([\w./-]+?)(?:\.git)?\/?$/;

function platformForHost(host: string): RepositoryPlatform {
  return KNOWN_HOSTS[host.toLowerCase()] ?? 'custom';
}

function splitRepoPath(ref: string, repoPath: string): { owner: string; repo: string } {
  const segments = repoPath
    .replace(/\.git$/, '')
    .split('/')
    .filter((segment) => segment.length > 0);
  if (segments.length < 2) {
    throw new UsageError(`Repository reference must name an owner and a repository: ${ref}`);
  }
  const repo = segments[segments.length - 1];
  return { owner: segments.slice(0, -1).join('/'), repo };
}

function parseLocal(absPath: string): ParsedRepositoryRef {
  const resolved = path.resolve(absPath);
  return {
    url: resolved,
    platform: 'local',
    owner: null,
    name: path.basename(resolved),
    isLocal: true,
  };
}

/**
 * Parses a repository reference: an https URL, an scp-style SSH address,
 * an absolute path or a `file://` URL.
 */
export function parseRepositoryRef(input: string): ParsedRepositoryRef {
  const ref = input.trim();
  if (ref.length === 0) {
    throw new UsageError('Repository reference is empty');
  }

  if (ref.startsWith('file://')) {
    return parseLocal(fileURLToPath(ref));
  }
  if (path.isAbsolute(ref)) {
    return parseLocal(ref);
  }

  const ssh = SSH_PATTERN.exec(ref);
  if (ssh) {
    const [, host, repoPath] = ssh;
    const { owner, repo } = splitRepoPath(ref, repoPath);
    return {
      url: `git@${host}:${owner}/${repo}.git`,
      platform: platformForHost(host),
      owner,
      name: `${owner}/${repo}`,
      isLocal: false,
    };
  }

  let parsed: URL;
  try {
    parsed = new URL(ref);
  } catch {
    throw new UsageError(`Unrecognized repository reference: ${ref}`);
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new UsageError(`Unsupported repository URL scheme: ${parsed.protocol}`);
  }

  const { owner, repo } = splitRepoPath(ref, parsed.pathname);
  return {
    url: `${parsed.protocol}//${parsed.host}/${owner}/${repo}`,
    platform: platformForHost(parsed.hostname),
    owner,
    name: `${owner}/${repo}`,
    isLocal: false,
  };
}

/**
 * Clone URL carrying an access token. Only https URLs take one; the result
 * must never be persisted or logged.
 */
export function withAccessToken(url: string, token: string | undefined): string {
  if (!token || !url.startsWith('https://')) {
    return url;
  }
  return url.replace('https://', `https://oauth2:${encodeURIComponent(token)}@`);
}
