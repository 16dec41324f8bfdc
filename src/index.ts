#!/usr/bin/env node
// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { createProgram } from './cli/program.js';
import { errorMessage } from './errors/index.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  });
