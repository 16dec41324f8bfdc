// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { toResolutionConfig } from '../../config/schema.js';
import { RestClient } from '../../integrations/http/rest-client.js';
import { fetchAssignedTickets } from '../../integrations/tracker/search.js';
import type { Ticket } from '../../integrations/tracker/types.js';
import { TicketBoard } from '../../tickets/board.js';
import { stateColor } from '../../utils/logger.js';
import { loadCommandContext } from '../context.js';

/**
 * Format a ticket for terminal display.
 */
export function formatTicket(ticket: Ticket): string {
  return [
    chalk.bold.cyan(ticket.key) + '  ' + chalk.bold(ticket.summary),
    chalk.gray('  Status: ') +
      stateColor(ticket.status) +
      chalk.gray('  Priority: ') +
      ticket.priority +
      chalk.gray('  Assignee: ') +
      ticket.assignee,
    chalk.gray('  ' + ticket.url),
  ].join('\n');
}

export const ticketsCommand = new Command('tickets')
  .description('List open tickets assigned to you')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    const { config } = loadCommandContext({ verbose: Boolean(command.optsWithGlobals().verbose) });
    const client = new RestClient();
    const board = new TicketBoard(() => fetchAssignedTickets(client, toResolutionConfig(config)));

    const spinner = options.json ? null : ora('Fetching assigned tickets...').start();
    const snapshot = await board.refresh();
    spinner?.stop();

    if (snapshot.status === 'not-configured') {
      console.error(chalk.yellow(snapshot.message ?? 'Ticket tracker is not configured'));
      console.error(chalk.gray('Run "branchlink init" to set the tracker URL and token.'));
      process.exit(1);
    }

    if (snapshot.status === 'failed') {
      console.error(chalk.red(snapshot.message ?? 'Could not load tickets'));
      process.exit(1);
    }

    if (options.json) {
      console.log(JSON.stringify(snapshot.tickets, null, 2));
      return;
    }

    if (snapshot.tickets.length === 0) {
      console.log(chalk.gray('No open tickets assigned to you.'));
      return;
    }

    console.log(chalk.gray(`Found ${snapshot.tickets.length} tickets:`));
    console.log('');
    for (const ticket of snapshot.tickets) {
      console.log(formatTicket(ticket));
      console.log('');
    }
  });
