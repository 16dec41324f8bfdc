// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { confirm, input, password } from '@inquirer/prompts';
import chalk from 'chalk';
import type { ReviewConfig, TrackerConfig } from '../../config/schema.js';
import { ValidationError } from '../../errors/index.js';

export interface InitWizardOptions {
  nonInteractive?: boolean;
  trackerUrl?: string;
  trackerToken?: string;
  reviewToken?: string;
  installHook?: boolean;
}

export interface InitWizardResult {
  tracker: TrackerConfig;
  review: ReviewConfig;
  installHook: boolean;
}

/**
 * Turn what the user typed into a browse URL prefix. A bare host gets the
 * usual /browse/ path; anything else only gains a trailing slash.
 */
export function normalizeTrackerUrl(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return '';
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ValidationError(`Invalid tracker URL: ${trimmed}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`Tracker URL must use http or https: ${trimmed}`);
  }

  if (url.pathname === '/' && !url.search) {
    return `${url.origin}/browse/`;
  }
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}

export function validateTrackerUrl(value: string): true | string {
  try {
    normalizeTrackerUrl(value);
    return true;
  } catch (err) {
    return err instanceof ValidationError ? err.message : 'Invalid tracker URL';
  }
}

export async function runInitWizard(options: InitWizardOptions = {}): Promise<InitWizardResult> {
  if (options.nonInteractive) {
    return {
      tracker: {
        base_url: normalizeTrackerUrl(options.trackerUrl ?? ''),
        token: options.trackerToken ?? '',
      },
      review: { token: options.reviewToken ?? '' },
      installHook: options.installHook ?? false,
    };
  }

  console.log();
  console.log(chalk.bold('Configure branchlink:'));
  console.log();

  const trackerUrl = await input({
    message: 'Ticket tracker browse URL (e.g. https://example.atlassian.net/browse/)',
    default: options.trackerUrl,
    validate: validateTrackerUrl,
  });

  const trackerToken =
    options.trackerToken ??
    (await password({
      message: 'Ticket tracker API token (leave empty to skip)',
      mask: '*',
    }));

  const reviewToken =
    options.reviewToken ??
    (await password({
      message: 'Review server access token (leave empty to skip)',
      mask: '*',
    }));

  const installHook = await confirm({
    message: 'Install the prepare-commit-msg hook in this repository?',
    default: options.installHook ?? true,
  });

  console.log();

  return {
    tracker: {
      base_url: normalizeTrackerUrl(trackerUrl),
      token: trackerToken,
    },
    review: { token: reviewToken },
    installHook,
  };
}
