// Licensed under the Hungry Ghost Hive License. See LICENSE.

/** A ticket assigned to the current user, ready for display */
export interface Ticket {
  readonly key: string;
  readonly summary: string;
  readonly status: string;
  readonly priority: string;
  readonly assignee: string;
  readonly url: string;
}

/** Result of an assigned-ticket search */
export type TicketSearchOutcome =
  | { kind: 'ok'; tickets: readonly Ticket[] }
  | { kind: 'not-configured'; missing: 'base-url' | 'token' }
  | { kind: 'failed'; reason: string };
