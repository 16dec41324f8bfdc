// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import { existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import {
  CONFIG_FILE_NAME,
  ConfigError,
  createDefaultConfig,
  saveConfig,
} from '../../config/loader.js';
import { errorMessage, ValidationError } from '../../errors/index.js';
import { installHook } from '../../git/hooks.js';
import { getRepositoryRoot } from '../../git/repository.js';
import { runInitWizard } from '../wizard/init-wizard.js';

interface InitOptions {
  force?: boolean;
  global?: boolean;
  nonInteractive?: boolean;
  trackerUrl?: string;
  trackerToken?: string;
  reviewToken?: string;
  hook?: boolean;
}

export const initCommand = new Command('init')
  .description('Create a branchlink config file')
  .option('-f, --force', 'Overwrite an existing config file')
  .option('-g, --global', 'Write the config to the home directory instead of the repository')
  .option('--non-interactive', 'Skip interactive prompts (use CLI flags)')
  .option('--tracker-url <url>', 'Ticket tracker browse URL')
  .option('--tracker-token <token>', 'Ticket tracker API token')
  .option('--review-token <token>', 'Review server access token')
  .option('--hook', 'Install the prepare-commit-msg hook (non-interactive mode)')
  .action(async (options: InitOptions) => {
    const repositoryRoot = await getRepositoryRoot(process.cwd());
    const targetDir = options.global ? homedir() : (repositoryRoot ?? process.cwd());
    const configPath = join(targetDir, CONFIG_FILE_NAME);

    if (existsSync(configPath) && !options.force) {
      console.log(chalk.yellow(`Config already exists: ${configPath}`));
      console.log(chalk.gray('Use --force to overwrite it.'));
      process.exit(1);
    }

    try {
      const answers = await runInitWizard({
        nonInteractive: options.nonInteractive,
        trackerUrl: options.trackerUrl,
        trackerToken: options.trackerToken,
        reviewToken: options.reviewToken,
        installHook: options.hook,
      });

      const config = createDefaultConfig(configPath);
      saveConfig(configPath, { ...config, tracker: answers.tracker, review: answers.review });
      console.log(chalk.green(`Wrote ${configPath}`));

      if (answers.installHook) {
        if (repositoryRoot) {
          const result = await installHook(repositoryRoot, { force: options.force });
          if (result.action !== 'skipped') {
            console.log(chalk.green(`Installed ${result.path}`));
          }
        } else {
          console.log(chalk.yellow('Not inside a Git repository; hook not installed.'));
        }
      }

      const holdsTokens = Boolean(answers.tracker.token || answers.review.token);
      if (!options.global && repositoryRoot && holdsTokens) {
        console.log(chalk.gray(`Keep ${CONFIG_FILE_NAME} out of version control; it holds tokens.`));
      }
    } catch (err) {
      if (err instanceof ConfigError || err instanceof ValidationError) {
        console.error(chalk.red(err.message));
      } else {
        console.error(chalk.red(`Initialization failed: ${errorMessage(err)}`));
      }
      process.exit(1);
    }
  });
