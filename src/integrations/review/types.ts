// Licensed under the Hungry Ghost Hive License. See LICENSE.

/** A pull request on the review server that contains a given commit */
export interface PullRequest {
  readonly id: number;
  readonly title: string;
  readonly state: string;
  readonly url: string;
}

/** Why a lookup produced nothing */
export type EmptyReason =
  | 'no-repository'
  | 'no-remote'
  | 'unsupported-remote'
  | 'no-token'
  | 'request-failed'
  | 'no-results';

export type PullRequestOutcome =
  | { kind: 'found'; pullRequests: readonly PullRequest[] }
  | { kind: 'empty'; reason: EmptyReason };

/** Where a commit should be browsed, best match first */
export type CommitTarget =
  | { kind: 'pull-requests'; pullRequests: readonly PullRequest[] }
  | { kind: 'inline-reference'; pullRequestId: number; url: string }
  | { kind: 'commit'; url: string }
  | { kind: 'none'; reason: EmptyReason };
