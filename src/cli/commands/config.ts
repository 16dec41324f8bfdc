// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import { stringify } from 'yaml';
import {
  ConfigError,
  findConfigPath,
  getConfigValue,
  loadConfig,
  readEffectiveConfig,
  saveConfig,
  setConfigValue,
} from '../../config/loader.js';
import type { LinkConfig } from '../../config/schema.js';

const MASK = '********';

/**
 * Copy of the config safe to print: tokens are masked.
 */
export function maskSecrets(config: LinkConfig): LinkConfig {
  const mask = (token: string) => (token ? MASK : '');
  return {
    ...config,
    tracker: { ...config.tracker, token: mask(config.tracker.token) },
    review: { ...config.review, token: mask(config.review.token) },
  };
}

/**
 * Interpret a command-line value: JSON first, then booleans and numbers, else a string.
 */
export function parseConfigValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
    if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
    return value;
  }
}

function reportAndExit(err: unknown, fallback: string): never {
  if (err instanceof ConfigError) {
    console.error(chalk.red(err.message));
  } else {
    console.error(chalk.red(fallback), err);
  }
  process.exit(1);
}

export const configCommand = new Command('config').description('Manage branchlink configuration');

configCommand
  .command('show')
  .description('Show the effective configuration (file plus environment)')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    try {
      const path = findConfigPath();
      const config = maskSecrets(readEffectiveConfig());

      if (options.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }
      console.log(chalk.gray(path ? `# ${path}` : '# no config file found; showing defaults'));
      console.log(stringify(config, { indent: 2 }));
    } catch (err) {
      reportAndExit(err, 'Failed to load configuration:');
    }
  });

configCommand
  .command('get <path>')
  .description('Get a specific configuration value')
  .action((path: string) => {
    let value: unknown;
    try {
      value = getConfigValue(maskSecrets(readEffectiveConfig()), path);
    } catch (err) {
      reportAndExit(err, 'Failed to get configuration:');
    }

    if (value === undefined) {
      console.error(chalk.yellow(`Configuration key not found: ${path}`));
      process.exit(1);
    }

    if (typeof value === 'object' && value !== null) {
      console.log(stringify(value, { indent: 2 }));
    } else {
      console.log(String(value));
    }
  });

configCommand
  .command('set <path> <value>')
  .description('Set a configuration value in the nearest config file')
  .action((path: string, value: string) => {
    const configPath = findConfigPath();
    if (!configPath) {
      console.error(chalk.red('No config file found. Run "branchlink init" first.'));
      process.exit(1);
    }

    try {
      const parsedValue = parseConfigValue(value);
      const config = setConfigValue(loadConfig(configPath), path, parsedValue);
      saveConfig(configPath, config);

      const shown = path.endsWith('token') ? MASK : JSON.stringify(parsedValue);
      console.log(chalk.green(`Set ${chalk.bold(path)} = ${shown}`));
    } catch (err) {
      reportAndExit(err, 'Failed to set configuration:');
    }
  });
