// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { select } from '@inquirer/prompts';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import { toResolutionConfig } from '../../config/schema.js';
import { errorMessage } from '../../errors/index.js';
import type { ResolvedCommit } from '../../git/commit-resolver.js';
import { RestClient } from '../../integrations/http/rest-client.js';
import {
  formatPullRequest,
  PullRequestResolutionService,
} from '../../integrations/review/pull-requests.js';
import type { CommitTarget, EmptyReason, PullRequest } from '../../integrations/review/types.js';
import { openBrowser } from '../../utils/browser.js';
import { stateColor } from '../../utils/logger.js';
import { resolveCommitInScope } from '../commit-scope.js';
import { loadCommandContext, requireRepositoryRoot } from '../context.js';

interface PrsOptions {
  file?: string;
  line?: number;
  fallback?: boolean;
  open?: boolean;
  json?: boolean;
}

const EMPTY_REASON_HINTS: Record<EmptyReason, string> = {
  'no-repository': 'No Git repository found',
  'no-remote': 'No origin or bitbucket remote configured',
  'unsupported-remote': 'The review remote is not a Bitbucket Server repository URL',
  'no-token': 'No review server token configured. Run "branchlink init" or set review.token.',
  'request-failed': 'The review server request failed. Run with --verbose for details.',
  'no-results': 'No pull requests found for this commit',
};

export function describeEmptyReason(reason: EmptyReason): string {
  return EMPTY_REASON_HINTS[reason];
}

export function parseLineOption(value: string): number {
  const line = Number(value);
  if (!Number.isInteger(line) || line < 1) {
    throw new InvalidArgumentError('Line must be a positive integer.');
  }
  return line;
}

export function formatPullRequestLine(pullRequest: PullRequest): string {
  return (
    chalk.bold.cyan(`PR #${pullRequest.id}`) +
    `: ${pullRequest.title} [` +
    stateColor(pullRequest.state) +
    ']\n' +
    chalk.gray(`  ${pullRequest.url}`)
  );
}

async function choosePullRequest(pullRequests: readonly PullRequest[]): Promise<PullRequest> {
  if (pullRequests.length === 1) {
    return pullRequests[0];
  }
  return select({
    message: 'Select a pull request to open',
    choices: pullRequests.map(pullRequest => ({
      name: formatPullRequest(pullRequest),
      value: pullRequest,
    })),
  });
}

async function presentTarget(target: CommitTarget, options: PrsOptions): Promise<void> {
  switch (target.kind) {
    case 'pull-requests': {
      for (const pullRequest of target.pullRequests) {
        console.log(formatPullRequestLine(pullRequest));
      }
      if (options.open) {
        const chosen = await choosePullRequest(target.pullRequests);
        await openBrowser(chosen.url);
      }
      return;
    }
    case 'inline-reference':
      console.log(chalk.gray('No pull requests found via API; using reference in commit message'));
      console.log(chalk.bold.cyan(`PR #${target.pullRequestId}`) + '  ' + target.url);
      if (options.open) await openBrowser(target.url);
      return;
    case 'commit':
      console.log(chalk.gray('No pull request found; showing the commit'));
      console.log(target.url);
      if (options.open) await openBrowser(target.url);
      return;
    case 'none':
      console.log(chalk.yellow(describeEmptyReason(target.reason)));
      return;
  }
}

export const prsCommand = new Command('prs')
  .description('Show the pull requests that contain a commit')
  .argument('[commit]', 'Commit to look up (defaults to HEAD)')
  .option('-f, --file <path>', 'Annotate this file to find the commit')
  .option('-l, --line <number>', '1-based line in --file', parseLineOption)
  .option('--fallback', 'Fall back to a PR named in the commit message, then the commit page')
  .option('-o, --open', 'Open the result in the browser')
  .option('--json', 'Output as JSON')
  .action(async (commit: string | undefined, options: PrsOptions, command: Command) => {
    const { config, workDir } = loadCommandContext({
      verbose: Boolean(command.optsWithGlobals().verbose),
    });
    const root = await requireRepositoryRoot(workDir);

    let resolved: ResolvedCommit;
    try {
      resolved = await resolveCommitInScope(root, {
        revision: commit,
        file: options.file,
        line: options.line,
      });
    } catch (err) {
      console.error(chalk.red(errorMessage(err)));
      process.exit(1);
    }

    const service = new PullRequestResolutionService({ client: new RestClient(), workDir: root });
    const resolution = toResolutionConfig(config);
    const spinner = options.json
      ? null
      : ora(`Looking up ${resolved.commitHash.slice(0, 8)}...`).start();

    if (options.fallback) {
      const target = await service.resolveCommitTarget(resolved.commitHash, resolution);
      spinner?.stop();
      if (options.json) {
        console.log(JSON.stringify({ commit: resolved.commitHash, target }, null, 2));
        return;
      }
      await presentTarget(target, options);
      return;
    }

    const outcome = await service.resolvePullRequests(resolved.commitHash, resolution);
    spinner?.stop();

    if (options.json) {
      console.log(JSON.stringify({ commit: resolved.commitHash, ...outcome }, null, 2));
      return;
    }

    if (outcome.kind === 'empty') {
      console.log(chalk.yellow(describeEmptyReason(outcome.reason)));
      return;
    }
    await presentTarget({ kind: 'pull-requests', pullRequests: outcome.pullRequests }, options);
  });
