// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import { toResolutionConfig } from '../../config/schema.js';
import { getCurrentBranch } from '../../git/repository.js';
import { resolveTicketNavigation } from '../../tickets/navigation.js';
import { openBrowser } from '../../utils/browser.js';
import { loadCommandContext } from '../context.js';

export const ticketCommand = new Command('ticket')
  .description('Show the ticket linked to the current branch')
  .option('-o, --open', 'Open the ticket in the browser')
  .action(async (options: { open?: boolean }, command: Command) => {
    const { config, workDir } = loadCommandContext({
      verbose: Boolean(command.optsWithGlobals().verbose),
    });

    const branch = await getCurrentBranch(workDir);
    const navigation = resolveTicketNavigation(branch, toResolutionConfig(config));

    switch (navigation.kind) {
      case 'no-branch':
        console.log(chalk.yellow('No Git repository found or not on any branch'));
        return;
      case 'no-ticket':
        console.log(chalk.yellow(`No ticket found in branch: ${navigation.branch}`));
        return;
      case 'not-configured':
        console.error(chalk.red('Ticket tracker URL is not configured.'));
        console.error(chalk.gray('Run "branchlink init" or set tracker.base_url.'));
        process.exit(1);
      case 'open':
        console.log(chalk.bold.cyan(navigation.key) + '  ' + navigation.url);
        if (options.open) {
          console.log(chalk.gray(`Opening ticket: ${navigation.key}`));
          await openBrowser(navigation.url);
        }
        return;
    }
  });
