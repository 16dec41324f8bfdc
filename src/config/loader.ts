// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { parse, stringify } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import {
  DEFAULT_CONFIG,
  generateDefaultConfigYaml,
  LinkConfigSchema,
  toResolutionConfig,
  type LinkConfig,
  type ResolutionConfig,
} from './schema.js';

export const CONFIG_FILE_NAME = '.branchlink.yaml';

export const ENV_TRACKER_URL = 'BRANCHLINK_TRACKER_URL';
export const ENV_TRACKER_TOKEN = 'BRANCHLINK_TRACKER_TOKEN';
export const ENV_REVIEW_TOKEN = 'BRANCHLINK_REVIEW_TOKEN';

export class ConfigError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function formatIssues(error: ZodError): string {
  return error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

/**
 * Find the nearest config file walking up from startDir, then the home directory.
 */
export function findConfigPath(
  startDir: string = process.cwd(),
  homeDir: string = homedir()
): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    const candidate = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
  }

  const homeCandidate = join(homeDir, CONFIG_FILE_NAME);
  return existsSync(homeCandidate) ? homeCandidate : null;
}

export function loadConfig(configPath: string): LinkConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');
  let rawConfig: unknown;
  try {
    rawConfig = parse(content) ?? {};
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${configPath}: ${message}`);
  }

  const result = LinkConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

export function saveConfig(configPath: string, config: LinkConfig): void {
  const content = stringify(config, { indent: 2 });
  writeFileSync(configPath, content, 'utf-8');
}

export function createDefaultConfig(configPath: string): LinkConfig {
  writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
  return loadConfig(configPath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getConfigValue(config: LinkConfig, path: string): unknown {
  let current: unknown = config;

  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

export function setConfigValue(config: LinkConfig, path: string, value: unknown): LinkConfig {
  const parts = path.split('.');
  const newConfig: Record<string, unknown> = structuredClone(config);

  let current = newConfig;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;

  // Validate the new config
  const result = LinkConfigSchema.safeParse(newConfig);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration after update:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

/**
 * Overlay credentials from the environment. Non-empty variables win over the file.
 */
export function applyEnvOverrides(
  config: LinkConfig,
  env: NodeJS.ProcessEnv = process.env
): LinkConfig {
  const trackerUrl = env[ENV_TRACKER_URL];
  const trackerToken = env[ENV_TRACKER_TOKEN];
  const reviewToken = env[ENV_REVIEW_TOKEN];

  return {
    ...config,
    tracker: {
      base_url: trackerUrl ? trackerUrl : config.tracker.base_url,
      token: trackerToken ? trackerToken : config.tracker.token,
    },
    review: {
      token: reviewToken ? reviewToken : config.review.token,
    },
  };
}

export interface ConfigSource {
  startDir?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load the effective configuration for the current operation.
 * A missing config file is not an error: defaults plus environment apply.
 */
export function readEffectiveConfig(source: ConfigSource = {}): LinkConfig {
  const configPath = findConfigPath(source.startDir, source.homeDir);
  const fileConfig = configPath ? loadConfig(configPath) : DEFAULT_CONFIG;
  return applyEnvOverrides(fileConfig, source.env);
}

/**
 * Credentials snapshot for one resolution call.
 */
export function readResolutionConfig(source: ConfigSource = {}): ResolutionConfig {
  return toResolutionConfig(readEffectiveConfig(source));
}
