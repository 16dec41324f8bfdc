// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { z } from 'zod';
import type { ResolutionConfig } from '../../config/schema.js';
import { errorMessage } from '../../errors/index.js';
import * as git from '../../git/repository.js';
import type { GitRemote } from '../../git/repository.js';
import * as logger from '../../utils/logger.js';
import { RestClient } from '../http/rest-client.js';
import {
  buildCommitPullRequestsApiUrl,
  buildCommitUrl,
  buildPullRequestUrl,
  resolveRepositoryEndpoint,
  type RepositoryEndpoint,
} from './endpoint.js';
import type { CommitTarget, EmptyReason, PullRequest, PullRequestOutcome } from './types.js';

/** Git reads the service needs; the real implementation shells out to git */
export interface RepositoryGateway {
  getRepositoryRoot(workDir: string): Promise<string | null>;
  listRemotes(workDir: string): Promise<GitRemote[]>;
  getCommitMessage(workDir: string, commitHash: string): Promise<string | null>;
}

export const gitRepositoryGateway: RepositoryGateway = {
  getRepositoryRoot: git.getRepositoryRoot,
  listRemotes: git.listRemotes,
  getCommitMessage: git.getCommitMessage,
};

/** Options for constructing a PullRequestResolutionService */
export interface PullRequestServiceOptions {
  client: RestClient;
  /** Any directory inside the repository */
  workDir: string;
  repository?: RepositoryGateway;
}

type EndpointResolution =
  | { kind: 'ok'; endpoint: RepositoryEndpoint }
  | { kind: 'empty'; reason: EmptyReason };

// Checked in order; the first one with a number wins
const INLINE_REFERENCE_PATTERNS = [
  /\bmerged? (?:pull request|pr) #?(\d+)/i,
  /\bpull request #?(\d+)/i,
  /\bpr #?(\d+)/i,
];

const PullRequestSchema = z.object({
  id: z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]),
  title: z.string(),
  state: z.string(),
});

const PullRequestPageSchema = z.object({
  values: z.array(z.unknown()).nullish(),
});

/**
 * Pull request number mentioned in a commit message ("Merged pull request #42",
 * "PR #42"), or null.
 */
export function extractPullRequestReference(message: string): number | null {
  for (const pattern of INLINE_REFERENCE_PATTERNS) {
    const match = message.match(pattern);
    if (match) {
      return parseInt(match[1], 10);
    }
  }
  return null;
}

/**
 * Map a commit pull-requests page to records. Malformed entries are skipped;
 * an unparseable page yields nothing.
 */
export function parsePullRequestsResponse(body: string, endpoint: RepositoryEndpoint): PullRequest[] {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (err) {
    logger.warn(`Failed to parse pull requests response: ${errorMessage(err)}`);
    return [];
  }

  const page = PullRequestPageSchema.safeParse(payload);
  if (!page.success) {
    logger.warn('Pull requests response is not an object');
    return [];
  }

  const pullRequests: PullRequest[] = [];
  for (const raw of page.data.values ?? []) {
    const parsed = PullRequestSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Failed to parse individual pull request');
      continue;
    }
    const { id, title, state } = parsed.data;
    pullRequests.push({ id, title, state, url: buildPullRequestUrl(endpoint, id) });
  }
  return pullRequests;
}

export function formatPullRequest(pullRequest: PullRequest): string {
  return `PR #${pullRequest.id}: ${pullRequest.title} [${pullRequest.state}]`;
}

/**
 * Finds the pull requests that introduced a commit on the review server.
 *
 * Every failure (no repository, unsupported remote, blank token, network
 * error, empty page) ends in an `empty` outcome with a reason; nothing throws.
 */
export class PullRequestResolutionService {
  private readonly client: RestClient;
  private readonly workDir: string;
  private readonly repository: RepositoryGateway;

  constructor(options: PullRequestServiceOptions) {
    this.client = options.client;
    this.workDir = options.workDir;
    this.repository = options.repository ?? gitRepositoryGateway;
  }

  /**
   * Review server endpoint of the current repository's review remote.
   */
  async resolveEndpoint(): Promise<EndpointResolution> {
    const root = await this.repository.getRepositoryRoot(this.workDir);
    if (!root) {
      logger.info('No Git repository found');
      return { kind: 'empty', reason: 'no-repository' };
    }

    const remote = git.selectReviewRemote(await this.repository.listRemotes(root));
    if (!remote) {
      logger.info('No origin or bitbucket remote configured');
      return { kind: 'empty', reason: 'no-remote' };
    }

    const endpoint = resolveRepositoryEndpoint(remote.url);
    if (!endpoint) {
      logger.info(`Remote ${remote.name} is not on a supported review server: ${remote.url}`);
      return { kind: 'empty', reason: 'unsupported-remote' };
    }

    return { kind: 'ok', endpoint };
  }

  async resolvePullRequests(
    commitHash: string,
    config: ResolutionConfig
  ): Promise<PullRequestOutcome> {
    const resolution = await this.resolveEndpoint();
    if (resolution.kind === 'empty') {
      return resolution;
    }
    return this.fetchPullRequests(resolution.endpoint, commitHash, config);
  }

  /**
   * Best browse target for a commit: its pull requests, else a pull request
   * named in its message, else the commit page itself.
   */
  async resolveCommitTarget(commitHash: string, config: ResolutionConfig): Promise<CommitTarget> {
    const resolution = await this.resolveEndpoint();
    if (resolution.kind === 'empty') {
      return { kind: 'none', reason: resolution.reason };
    }
    const { endpoint } = resolution;

    const outcome = await this.fetchPullRequests(endpoint, commitHash, config);
    if (outcome.kind === 'found') {
      return { kind: 'pull-requests', pullRequests: outcome.pullRequests };
    }

    const message = await this.repository.getCommitMessage(this.workDir, commitHash);
    const reference = message ? extractPullRequestReference(message) : null;
    if (reference !== null) {
      logger.debug(`Using pull request #${reference} named in commit ${commitHash}`);
      return {
        kind: 'inline-reference',
        pullRequestId: reference,
        url: buildPullRequestUrl(endpoint, reference),
      };
    }

    return { kind: 'commit', url: buildCommitUrl(endpoint, commitHash) };
  }

  private async fetchPullRequests(
    endpoint: RepositoryEndpoint,
    commitHash: string,
    config: ResolutionConfig
  ): Promise<PullRequestOutcome> {
    if (config.reviewToken.trim().length === 0) {
      logger.warn('No review server token configured');
      return { kind: 'empty', reason: 'no-token' };
    }

    const result = await this.client.get(
      buildCommitPullRequestsApiUrl(endpoint, commitHash),
      config.reviewToken
    );
    if (result.kind !== 'ok') {
      return { kind: 'empty', reason: result.kind === 'skipped' ? 'no-token' : 'request-failed' };
    }

    const pullRequests = parsePullRequestsResponse(result.body, endpoint);
    return pullRequests.length > 0
      ? { kind: 'found', pullRequests }
      : { kind: 'empty', reason: 'no-results' };
  }
}
