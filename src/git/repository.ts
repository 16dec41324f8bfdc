// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { execa } from 'execa';
import { errorMessage } from '../errors/index.js';
import * as logger from '../utils/logger.js';

export interface GitRemote {
  name: string;
  url: string;
}

/**
 * Top-level directory of the repository containing workDir, or null outside one
 */
export async function getRepositoryRoot(workDir: string): Promise<string | null> {
  try {
    const { stdout } = await execa('git', ['rev-parse', '--show-toplevel'], { cwd: workDir });
    const root = stdout.trim();
    return root.length > 0 ? root : null;
  } catch (error) {
    logger.debug(`Not a git repository: ${workDir} (${errorMessage(error)})`);
    return null;
  }
}

/**
 * Get current branch name; null when detached or outside a repository
 */
export async function getCurrentBranch(workDir: string): Promise<string | null> {
  try {
    const { stdout } = await execa('git', ['branch', '--show-current'], { cwd: workDir });
    const branch = stdout.trim();
    return branch.length > 0 ? branch : null;
  } catch (error) {
    logger.debug(`Could not read current branch: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Parse `git remote -v` output into one entry per remote (its first fetch URL).
 */
export function parseRemotes(output: string): GitRemote[] {
  const remotes = new Map<string, string>();

  for (const line of output.split('\n')) {
    const match = line.trim().match(/^(\S+)\s+(\S+)(?:\s+\((fetch|push)\))?$/);
    if (!match) continue;
    const [, name, url, kind] = match;
    if (kind === 'push' || remotes.has(name)) continue;
    remotes.set(name, url);
  }

  return Array.from(remotes, ([name, url]) => ({ name, url }));
}

/**
 * List configured remotes in git's order
 */
export async function listRemotes(workDir: string): Promise<GitRemote[]> {
  try {
    const { stdout } = await execa('git', ['remote', '-v'], { cwd: workDir });
    return parseRemotes(stdout);
  } catch (error) {
    logger.debug(`Could not list remotes: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * Pick the remote pointing at the review server: "origin" if present,
 * else the first remote whose name mentions bitbucket.
 */
export function selectReviewRemote(remotes: readonly GitRemote[]): GitRemote | null {
  const origin = remotes.find(remote => remote.name === 'origin');
  if (origin) {
    return origin;
  }
  return remotes.find(remote => remote.name.toLowerCase().includes('bitbucket')) ?? null;
}

/**
 * Full message of a commit, or null if it cannot be read
 */
export async function getCommitMessage(workDir: string, commitHash: string): Promise<string | null> {
  try {
    const { stdout } = await execa('git', ['log', '-1', '--format=%B', commitHash], {
      cwd: workDir,
    });
    return stdout.trim();
  } catch (error) {
    logger.debug(`Could not read message of ${commitHash}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Resolve a revision expression (HEAD, short hash, tag) to a full commit hash
 */
export async function resolveRevision(workDir: string, revision: string): Promise<string | null> {
  try {
    const { stdout } = await execa('git', ['rev-parse', '--verify', `${revision}^{commit}`], {
      cwd: workDir,
    });
    return stdout.trim();
  } catch (_error) {
    return null;
  }
}

/**
 * Absolute path of the hooks directory (honours core.hooksPath)
 */
export async function getHooksDir(workDir: string): Promise<string> {
  const { stdout } = await execa(
    'git',
    ['rev-parse', '--path-format=absolute', '--git-path', 'hooks'],
    { cwd: workDir }
  );
  return stdout.trim();
}
