// Licensed under the Hungry Ghost Hive License. See LICENSE.

/**
 * Repository address on the code review server.
 * `project` is kept as written in the remote; every URL builder upper-cases it.
 */
export interface RepositoryEndpoint {
  server: string;
  project: string;
  repo: string;
}

/** Shared by validation and URL building; groups are server, project, repo */
export const REVIEW_URL_PATTERN = /^https?:\/\/([^/]+)\/(?:scm\/)?([^/]+)\/([^/]+)\/?$/;

// git@host:path (scp-like) and ssh://git@host[:port]/path
const SCP_LIKE_PREFIX = /^[^@/\s]+@/;
const SSH_SCHEME_URL = /^ssh:\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/(.*)$/;
// user[:password]@ in an http(s) remote; fetch rejects URLs that carry it
const HTTP_USERINFO = /^(https?:\/\/)[^@/]+@/;

/**
 * Normalize a Git remote URL to the https form the review server browses under.
 * Does not validate; see resolveRepositoryEndpoint.
 */
export function normalizeRemoteUrl(remoteUrl: string): string {
  let normalized = remoteUrl.trim().replace(/\.git$/, '');

  if (HTTP_USERINFO.test(normalized)) {
    return normalized.replace(HTTP_USERINFO, '$1');
  }

  const sshMatch = normalized.match(SSH_SCHEME_URL);
  if (sshMatch) {
    return `https://${sshMatch[1]}/${sshMatch[2]}`;
  }

  if (SCP_LIKE_PREFIX.test(normalized)) {
    normalized = normalized.replace(SCP_LIKE_PREFIX, 'https://');
    const hostEnd = normalized.indexOf(':', 'https://'.length);
    if (hostEnd !== -1) {
      normalized = `${normalized.slice(0, hostEnd)}/${normalized.slice(hostEnd + 1)}`;
    }
  }

  return normalized;
}

/**
 * Resolve a remote URL to its review server endpoint, or null when it does not
 * look like a repository on a supported server.
 */
export function resolveRepositoryEndpoint(remoteUrl: string): RepositoryEndpoint | null {
  const match = normalizeRemoteUrl(remoteUrl).match(REVIEW_URL_PATTERN);
  if (!match) {
    return null;
  }
  return { server: match[1], project: match[2], repo: match[3] };
}

function repositoryPath(endpoint: RepositoryEndpoint): string {
  return `projects/${endpoint.project.toUpperCase()}/repos/${endpoint.repo}`;
}

/**
 * Canonical repository URL; always re-validates against REVIEW_URL_PATTERN.
 */
export function buildRepositoryUrl(endpoint: RepositoryEndpoint): string {
  return `https://${endpoint.server}/${endpoint.project.toUpperCase()}/${endpoint.repo}`;
}

export function buildCommitPullRequestsApiUrl(
  endpoint: RepositoryEndpoint,
  commitHash: string
): string {
  return (
    `https://${endpoint.server}/rest/api/latest/${repositoryPath(endpoint)}` +
    `/commits/${commitHash}/pull-requests?start=0&limit=25`
  );
}

export function buildPullRequestUrl(endpoint: RepositoryEndpoint, pullRequestId: number): string {
  return `https://${endpoint.server}/${repositoryPath(endpoint)}/pull-requests/${pullRequestId}`;
}

export function buildCommitUrl(endpoint: RepositoryEndpoint, commitHash: string): string {
  return `https://${endpoint.server}/${repositoryPath(endpoint)}/commits/${commitHash}`;
}
