// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { Command } from 'commander';
import { readEffectiveConfig } from '../../config/loader.js';
import { errorMessage } from '../../errors/index.js';
import { installHook } from '../../git/hooks.js';
import { getCurrentBranch } from '../../git/repository.js';
import { applyToMessageFile } from '../../tickets/composer.js';
import * as logger from '../../utils/logger.js';
import { loadCommandContext, requireRepositoryRoot } from '../context.js';

// Sources whose message git or the user already settled
const UNTOUCHED_SOURCES = new Set(['merge', 'squash', 'commit']);

export const hookCommand = new Command('hook').description(
  'Prepare commit messages with the ticket of the current branch'
);

hookCommand
  .command('run')
  .description('Prefix a commit message file with the branch ticket (used by the git hook)')
  .argument('<msgFile>', 'Commit message file passed by git')
  .argument('[source]', 'Message source passed by git')
  .action(async (msgFile: string, source: string | undefined, _opts: object, command: Command) => {
    // A failure here must never abort the commit
    try {
      if (source && UNTOUCHED_SOURCES.has(source)) {
        logger.debug(`Leaving ${source} message unchanged`);
        return;
      }
      const workDir = process.cwd();
      const config = readEffectiveConfig({ startDir: workDir });
      logger.setLogLevel(command.optsWithGlobals().verbose ? 'debug' : config.logging.level);
      const branch = await getCurrentBranch(workDir);
      if (!branch) {
        logger.debug('Not on a branch; commit message unchanged');
        return;
      }
      applyToMessageFile(msgFile, branch, { skipBranches: config.commit.skip_branches });
    } catch (err) {
      logger.warn(`Could not prepare commit message: ${errorMessage(err)}`);
    }
  });

hookCommand
  .command('install')
  .description('Install the prepare-commit-msg hook in this repository')
  .option('--force', 'Replace an existing hook not written by branchlink')
  .action(async (options: { force?: boolean }, command: Command) => {
    const { workDir } = loadCommandContext({ verbose: Boolean(command.optsWithGlobals().verbose) });
    const root = await requireRepositoryRoot(workDir);

    try {
      const result = await installHook(root, { force: options.force });
      switch (result.action) {
        case 'installed':
          logger.success(`Installed ${result.path}`);
          break;
        case 'updated':
          logger.success(`Updated ${result.path}`);
          break;
        case 'skipped':
          logger.warn(`Left existing hook in place: ${result.path} (use --force to replace it)`);
          process.exitCode = 1;
          break;
      }
    } catch (err) {
      logger.error(`Failed to install hook: ${errorMessage(err)}`);
      process.exit(1);
    }
  });
