// Licensed under the Hungry Ghost Hive License. See LICENSE.

import type { Ticket, TicketSearchOutcome } from '../integrations/tracker/types.js';

export type BoardStatus = 'idle' | 'loading' | 'ready' | 'not-configured' | 'failed';

export interface BoardSnapshot {
  readonly status: BoardStatus;
  readonly tickets: readonly Ticket[];
  /** Human-readable detail for not-configured and failed states */
  readonly message?: string;
}

export type BoardListener = (snapshot: BoardSnapshot) => void;

/**
 * Displayed list of assigned tickets.
 *
 * Each refresh runs its own fetch and replaces the snapshot when it settles.
 * Overlapping refreshes are not coalesced: whichever completes last is shown.
 */
export class TicketBoard {
  private snapshot: BoardSnapshot = { status: 'idle', tickets: [] };
  private readonly listeners = new Set<BoardListener>();

  constructor(private readonly fetchTickets: () => Promise<TicketSearchOutcome>) {}

  getSnapshot(): BoardSnapshot {
    return this.snapshot;
  }

  subscribe(listener: BoardListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async refresh(): Promise<BoardSnapshot> {
    this.replace({ status: 'loading', tickets: this.snapshot.tickets });
    const outcome = await this.fetchTickets();
    const next = toSnapshot(outcome);
    this.replace(next);
    return next;
  }

  private replace(snapshot: BoardSnapshot): void {
    this.snapshot = snapshot;
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}

function toSnapshot(outcome: TicketSearchOutcome): BoardSnapshot {
  switch (outcome.kind) {
    case 'ok':
      return { status: 'ready', tickets: Object.freeze([...outcome.tickets]) };
    case 'not-configured':
      return {
        status: 'not-configured',
        tickets: [],
        message:
          outcome.missing === 'base-url'
            ? 'Ticket tracker URL is not configured'
            : 'Ticket tracker token is not configured',
      };
    case 'failed':
      return { status: 'failed', tickets: [], message: `Could not load tickets: ${outcome.reason}` };
  }
}
