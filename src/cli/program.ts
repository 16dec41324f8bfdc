// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { Command } from 'commander';
import { getVersion } from '../utils/version.js';
import {
  configCommand,
  hookCommand,
  initCommand,
  prsCommand,
  ticketCommand,
  ticketsCommand,
  versionCommand,
} from './commands/index.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('branchlink')
    .description('Link branches and commits to tickets and pull requests')
    .version(getVersion())
    .option('--verbose', 'Print debug logging');

  // Setup
  program.addCommand(initCommand);
  program.addCommand(configCommand);

  // Tickets
  program.addCommand(ticketCommand);
  program.addCommand(ticketsCommand);

  // Pull requests
  program.addCommand(prsCommand);

  // Commit messages
  program.addCommand(hookCommand);

  program.addCommand(versionCommand);

  return program;
}
