// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import { getVersion } from '../../utils/version.js';

export const versionCommand = new Command('version')
  .description('Show branchlink version and system information')
  .action(() => {
    console.log();
    console.log(chalk.cyan(`branchlink v${getVersion()}`));
    console.log(chalk.gray(`Node.js: ${process.version}`));
    console.log(chalk.gray(`Platform: ${process.platform}`));
    console.log();
  });
