/**
 * Repository acquisition: URL validation, clone into a temp directory,
 * commit history, cleanup.
 */

import { execFileSync } from 'child_process';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { logger } from './logger.js';
import { redactCredentials } from './security.js';

export class RepositoryAccessError extends Error {
  constructor(message: string) {
    super(redactCredentials(message));
    this.name = 'RepositoryAccessError';
  }
}

export interface RepoUrl {
  url: string;
  host: string;
  /** owner/repo for GitHub URLs, otherwise null */
  github: { owner: string; repo: string } | null;
}

export interface UrlValidation {
  valid: boolean;
  error: string;
}

// ============================================================================
// URL HANDLING
// ============================================================================

/**
 * Parse a clone URL. Returns null for anything without a supported scheme,
 * a host and a path.
 */
export function parseRepoUrl(url: string): RepoUrl | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }

  if (!['http:', 'https:', 'git:', 'ssh:'].includes(parsed.protocol)) return null;
  if (!parsed.hostname || parsed.pathname.length <= 1) return null;

  let github: RepoUrl['github'] = null;
  if (parsed.hostname === 'github.com') {
    const match = parsed.pathname.match(/^\/([^/]+)\/([^/]+?)(?:\.git)?\/?$/);
    if (match?.[1] && match[2]) {
      github = { owner: match[1], repo: match[2] };
    }
  }

  return { url: url.trim(), host: parsed.hostname, github };
}

/**
 * Check a repository URL before cloning. Only GitHub URLs are probed via
 * the API; a network failure lets the clone attempt go ahead.
 */
export async function validateRepoUrl(url: string, token?: string): Promise<UrlValidation> {
  const repo = parseRepoUrl(url);
  if (!repo) {
    return { valid: false, error: 'Invalid URL format' };
  }
  if (!repo.github) {
    return { valid: true, error: '' };
  }

  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'User-Agent': 'repo-qa-eval',
  };
  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  let status: number;
  try {
    const response = await fetch(`https://api.github.com/repos/${repo.github.owner}/${repo.github.repo}`, { headers });
    status = response.status;
  } catch (error) {
    logger.warn('GitHub API check failed, trying clone anyway', { error: String(error) });
    return { valid: true, error: '' };
  }

  switch (status) {
    case 200:
      return { valid: true, error: '' };
    case 404:
      return { valid: false, error: 'Repository not found (404)' };
    case 401:
      return { valid: false, error: 'Unauthorized - invalid or expired token' };
    case 403:
      // Without a token a 403 is usually the anonymous rate limit
      return token
        ? { valid: false, error: 'Access forbidden - check token permissions or rate limit' }
        : { valid: true, error: '' };
    default:
      return { valid: false, error: `Repository check failed with status code ${status}` };
  }
}

export function withToken(url: string, token?: string): string {
  if (!token) return url;
  const repo = parseRepoUrl(url);
  if (!repo?.github || !url.startsWith('https://')) return url;
  return url.replace('https://', `https://${token}@`);
}

// ============================================================================
// CLONE / CLEANUP
// ============================================================================

export interface CloneOptions {
  shallow?: boolean;
  depth?: number;
  token?: string;
}

function git(args: string[], cwd?: string): string {
  return execFileSync('git', args, {
    cwd,
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
  });
}

/**
 * Clone into a fresh temp directory. The caller owns the directory and
 * must pass it to cleanupClone.
 */
export async function cloneRepo(url: string, options: CloneOptions = {}): Promise<string> {
  const { shallow = true, depth = 50, token } = options;

  const check = await validateRepoUrl(url, token);
  if (!check.valid) {
    throw new RepositoryAccessError(`Repository validation failed: ${check.error}`);
  }

  const dir = mkdtempSync(join(tmpdir(), 'qa-repo-eval-'));
  const args = ['clone', '--quiet'];
  if (shallow) args.push('--depth', String(depth));
  args.push(withToken(url, token), dir);

  try {
    git(args);
  } catch (error) {
    cleanupClone(dir);
    const detail = error instanceof Error ? error.message : String(error);
    throw new RepositoryAccessError(`Clone failed for ${url}: ${detail}`);
  }

  logger.debug('Repository cloned', { url: redactCredentials(url), dir });
  return dir;
}

export function cleanupClone(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

// ============================================================================
// HISTORY
// ============================================================================

export function getCommitCount(repoPath: string): number {
  const output = git(['rev-list', '--count', 'HEAD'], repoPath).trim();
  const count = Number.parseInt(output, 10);
  return Number.isNaN(count) ? 0 : count;
}

export interface CommitInfo {
  message: string;
  author: string;
  date: string;
  filesChanged: number;
}

const FIELD_SEP = '\x1f';
const RECORD_SEP = '\x1e';

/**
 * Parse `git log --shortstat` output produced with the record/field
 * separators used by getCommitHistory.
 */
export function parseCommitLog(output: string): CommitInfo[] {
  return output
    .split(RECORD_SEP)
    .map(chunk => chunk.trim())
    .filter(chunk => chunk.length > 0)
    .map(chunk => {
      const [header = '', ...rest] = chunk.split('\n');
      const [message = '', author = '', date = ''] = header.split(FIELD_SEP);
      const stat = rest.join(' ').match(/(\d+) files? changed/);
      return {
        message: message.trim(),
        author,
        date,
        filesChanged: stat?.[1] ? Number.parseInt(stat[1], 10) : 0,
      };
    });
}

export function getCommitHistory(repoPath: string, maxCommits = 50): CommitInfo[] {
  try {
    const output = git(
      ['log', `-${maxCommits}`, '--shortstat', `--format=${RECORD_SEP}%s${FIELD_SEP}%an <%ae>${FIELD_SEP}%cI`],
      repoPath
    );
    return parseCommitLog(output);
  } catch (error) {
    logger.warn('Error extracting commit history', { error: String(error) });
    return [];
  }
}
