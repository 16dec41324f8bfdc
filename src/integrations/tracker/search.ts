// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { z } from 'zod';
import { isTrackerConfigured, type ResolutionConfig } from '../../config/schema.js';
import { errorMessage } from '../../errors/index.js';
import * as logger from '../../utils/logger.js';
import { RestClient } from '../http/rest-client.js';
import type { Ticket, TicketSearchOutcome } from './types.js';

export const ASSIGNED_TICKETS_JQL =
  'assignee = currentUser() AND statusCategory != Done ORDER BY priority DESC';

export const SEARCH_FIELDS = ['key', 'summary', 'status', 'priority', 'assignee'];

// Nested objects; anything that is not the expected shape counts as absent
const NameSchema = z.object({ name: z.string().nullish() }).nullish().catch(null);
const UserSchema = z.object({ displayName: z.string().nullish() }).nullish().catch(null);

const IssueSchema = z.object({
  key: z.string().min(1),
  fields: z
    .object({
      summary: z.string().nullish().catch(null),
      status: NameSchema,
      priority: NameSchema,
      assignee: UserSchema,
    })
    .nullish()
    .catch(null),
});

const SearchResponseSchema = z.object({
  issues: z.array(z.unknown()),
});

/**
 * REST API root for a configured browse URL:
 * `https://jira.example.com/browse/` → `https://jira.example.com`.
 */
export function toApiBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace('/browse/', '').replace(/\/+$/, '');
}

export function buildAssignedTicketsUrl(baseUrl: string, jql: string = ASSIGNED_TICKETS_JQL): string {
  const params = new URLSearchParams();
  params.set('jql', jql);
  // fields stay comma-separated, unencoded
  const query = `${params.toString()}&fields=${SEARCH_FIELDS.join(',')}`;
  return `${toApiBaseUrl(baseUrl)}/rest/api/2/search?${query}`;
}

export function buildTicketUrl(baseUrl: string, key: string): string {
  return `${baseUrl.trim()}${key}`;
}

/**
 * Map a search payload to tickets. Issues without a key are skipped;
 * a payload that is not `{ issues: [...] }` yields no tickets at all.
 */
export function parseTicketsResponse(body: string, baseUrl: string): Ticket[] {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (err) {
    logger.warn(`Error parsing ticket search response: ${errorMessage(err)}`);
    return [];
  }

  const response = SearchResponseSchema.safeParse(payload);
  if (!response.success) {
    logger.warn('Ticket search response has no issues array');
    return [];
  }

  const tickets: Ticket[] = [];
  for (const raw of response.data.issues) {
    const issue = IssueSchema.safeParse(raw);
    if (!issue.success) {
      logger.debug('Skipping ticket search entry without a key');
      continue;
    }

    const { key, fields } = issue.data;
    tickets.push({
      key,
      summary: fields?.summary ?? 'No Summary',
      status: fields?.status?.name ?? 'Unknown',
      priority: fields?.priority?.name ?? 'None',
      assignee: fields?.assignee?.displayName ?? 'Unassigned',
      url: buildTicketUrl(baseUrl, key),
    });
  }
  return tickets;
}

/**
 * Tickets assigned to the current user that are not done, highest priority first.
 */
export async function fetchAssignedTickets(
  client: RestClient,
  config: ResolutionConfig
): Promise<TicketSearchOutcome> {
  if (!isTrackerConfigured(config.ticketBaseUrl)) {
    return { kind: 'not-configured', missing: 'base-url' };
  }
  if (config.ticketToken.trim().length === 0) {
    return { kind: 'not-configured', missing: 'token' };
  }

  const result = await client.get(buildAssignedTicketsUrl(config.ticketBaseUrl), config.ticketToken);
  switch (result.kind) {
    case 'ok':
      return { kind: 'ok', tickets: parseTicketsResponse(result.body, config.ticketBaseUrl) };
    case 'skipped':
      return { kind: 'not-configured', missing: 'token' };
    case 'http-error':
      return { kind: 'failed', reason: `HTTP ${result.status}` };
    case 'transport-error':
      return { kind: 'failed', reason: result.message };
  }
}
