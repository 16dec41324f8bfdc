// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { ConfigError, readEffectiveConfig } from '../config/loader.js';
import type { LinkConfig } from '../config/schema.js';
import { getRepositoryRoot } from '../git/repository.js';
import { setLogLevel } from '../utils/logger.js';

export interface CommandContext {
  config: LinkConfig;
  workDir: string;
}

/**
 * Read a fresh configuration snapshot for one command run.
 * Invalid configuration is reported and ends the process.
 */
export function loadCommandContext(options: { verbose?: boolean } = {}): CommandContext {
  const workDir = process.cwd();
  try {
    const config = readEffectiveConfig({ startDir: workDir });
    setLogLevel(options.verbose ? 'debug' : config.logging.level);
    return { config, workDir };
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(chalk.red(err.message));
    } else {
      console.error(chalk.red('Failed to load configuration:'), err);
    }
    process.exit(1);
  }
}

/**
 * Repository root for the working directory; exits when outside a repository.
 */
export async function requireRepositoryRoot(workDir: string): Promise<string> {
  const root = await getRepositoryRoot(workDir);
  if (!root) {
    console.error(chalk.red('Not inside a Git repository.'));
    process.exit(1);
  }
  return root;
}
