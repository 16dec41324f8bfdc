// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { NotFoundError, ValidationError } from '../errors/index.js';
import { createFileAnnotation } from '../git/blame.js';
import { resolveCommit, type ResolvedCommit } from '../git/commit-resolver.js';
import { resolveRevision } from '../git/repository.js';

export interface CommitScopeOptions {
  /** Revision named on the command line */
  revision?: string;
  /** File to annotate; the commit comes from the line when one is given */
  file?: string;
  /** 1-based line in file */
  line?: number;
}

/**
 * Commit a `prs` invocation refers to. The named revision plays the part of
 * a log selection; a file line, when given, takes precedence over it.
 */
export async function resolveCommitInScope(
  root: string,
  options: CommitScopeOptions
): Promise<ResolvedCommit> {
  if (options.line !== undefined && !options.file) {
    throw new ValidationError('--line needs --file');
  }

  const selected = options.revision ? await resolveRevision(root, options.revision) : null;
  if (options.revision && !selected) {
    throw new NotFoundError(`Unknown revision: ${options.revision}`);
  }

  const logSelection = selected ?? (await resolveRevision(root, 'HEAD'));
  const annotation =
    options.file && options.line !== undefined
      ? await createFileAnnotation(root, options.file)
      : null;
  const resolved = resolveCommit({
    lineNumber: options.line !== undefined ? options.line - 1 : null,
    annotation,
    logSelection: logSelection ? [logSelection] : null,
  });

  if (!resolved) {
    throw new NotFoundError(
      options.line !== undefined
        ? `No commit found for line ${options.line} of ${options.file}`
        : 'No commit in scope'
    );
  }
  return resolved;
}
