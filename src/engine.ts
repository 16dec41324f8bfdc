// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { readResolutionConfig } from './config/loader.js';
import type { ResolutionConfig } from './config/schema.js';
import { RestClient } from './integrations/http/rest-client.js';
import {
  PullRequestResolutionService,
  type RepositoryGateway,
} from './integrations/review/pull-requests.js';
import type { PullRequestOutcome } from './integrations/review/types.js';

export { readEffectiveConfig, readResolutionConfig } from './config/loader.js';
export type { LinkConfig, ResolutionConfig } from './config/schema.js';
export * from './errors/index.js';
export { resolveCommit } from './git/commit-resolver.js';
export type { CommitContext, ResolvedCommit } from './git/commit-resolver.js';
export { annotationFromMap, createFileAnnotation } from './git/blame.js';
export type { FileAnnotation } from './git/blame.js';
export { RestClient } from './integrations/http/rest-client.js';
export type { RestClientOptions, RestResult } from './integrations/http/rest-client.js';
export {
  buildCommitUrl,
  buildPullRequestUrl,
  normalizeRemoteUrl,
  resolveRepositoryEndpoint,
} from './integrations/review/endpoint.js';
export type { RepositoryEndpoint } from './integrations/review/endpoint.js';
export {
  extractPullRequestReference,
  formatPullRequest,
  PullRequestResolutionService,
} from './integrations/review/pull-requests.js';
export type { RepositoryGateway } from './integrations/review/pull-requests.js';
export type {
  CommitTarget,
  EmptyReason,
  PullRequest,
  PullRequestOutcome,
} from './integrations/review/types.js';
export { fetchAssignedTickets } from './integrations/tracker/search.js';
export type { Ticket, TicketSearchOutcome } from './integrations/tracker/types.js';
export { TicketBoard } from './tickets/board.js';
export type { BoardSnapshot, BoardStatus } from './tickets/board.js';
export { composeMessage } from './tickets/composer.js';
export { extractTicketFromBranch, extractTicketKey } from './tickets/identifier.js';
export { resolveTicketNavigation } from './tickets/navigation.js';
export type { TicketNavigation } from './tickets/navigation.js';

export interface ResolvePullRequestsOptions {
  /** Any directory inside the repository */
  workDir: string;
  /** Credentials snapshot; read from config and environment when omitted */
  config?: ResolutionConfig;
  client?: RestClient;
  repository?: RepositoryGateway;
}

/**
 * Pull requests that introduced a commit, for hosts that do not keep a
 * service around.
 */
export async function resolvePullRequests(
  commitHash: string,
  options: ResolvePullRequestsOptions
): Promise<PullRequestOutcome> {
  const config = options.config ?? readResolutionConfig({ startDir: options.workDir });
  const service = new PullRequestResolutionService({
    client: options.client ?? new RestClient(),
    workDir: options.workDir,
    repository: options.repository,
  });
  return service.resolvePullRequests(commitHash, config);
}
