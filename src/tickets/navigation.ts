// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { isTrackerConfigured, type ResolutionConfig } from '../config/schema.js';
import { buildTicketUrl } from '../integrations/tracker/search.js';
import { extractLooseTicketKey } from './identifier.js';

// Opens the ticket with its development panel showing linked pull requests
const PULL_REQUEST_PANEL_QUERY = '?devStatusDetailDialog=pullrequest';

export type TicketNavigation =
  | { kind: 'open'; key: string; url: string }
  | { kind: 'no-branch' }
  | { kind: 'no-ticket'; branch: string }
  | { kind: 'not-configured' };

/**
 * Where to go for the ticket of the current branch.
 */
export function resolveTicketNavigation(
  branchName: string | null,
  config: ResolutionConfig
): TicketNavigation {
  if (!branchName) {
    return { kind: 'no-branch' };
  }

  const key = extractLooseTicketKey(branchName);
  if (!key) {
    return { kind: 'no-ticket', branch: branchName };
  }

  if (!isTrackerConfigured(config.ticketBaseUrl)) {
    return { kind: 'not-configured' };
  }

  return {
    kind: 'open',
    key,
    url: `${buildTicketUrl(config.ticketBaseUrl, key)}${PULL_REQUEST_PANEL_QUERY}`,
  };
}
