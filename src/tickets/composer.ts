// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { readFileSync, writeFileSync } from 'fs';
import { DEFAULT_SKIP_BRANCHES } from '../config/schema.js';
import * as logger from '../utils/logger.js';
import { extractTicketFromBranch } from './identifier.js';

export interface ComposeOptions {
  /** Branches never used as a reference source. Default: main, master, develop, dev */
  skipBranches?: readonly string[];
}

/**
 * Decide the commit message draft for the given branch.
 *
 * An empty draft becomes `"<KEY>\n\n"`. A non-empty draft is prefixed with
 * `"<KEY>\n\n"` unless it already mentions the key or starts with the raw
 * branch name. Returns the draft untouched when nothing applies.
 */
export function composeMessage(
  branchName: string,
  draft: string,
  options: ComposeOptions = {}
): string {
  const skipBranches = options.skipBranches ?? DEFAULT_SKIP_BRANCHES;
  if (!branchName || skipBranches.includes(branchName)) {
    return draft;
  }

  const reference = extractTicketFromBranch(branchName);
  if (!reference) {
    return draft;
  }

  const current = draft.trim();
  if (current.length === 0) {
    return `${reference}\n\n`;
  }

  if (!current.includes(reference) && !current.startsWith(branchName)) {
    return `${reference}\n\n${current}`;
  }

  return draft;
}

/**
 * Split a Git commit message file into the editable message and the trailing
 * comment block Git appends (lines starting with `#`).
 */
export function splitMessageFile(content: string): { message: string; comments: string } {
  const lines = content.split('\n');
  const firstComment = lines.findIndex(line => line.startsWith('#'));
  if (firstComment === -1) {
    return { message: content, comments: '' };
  }
  return {
    message: lines.slice(0, firstComment).join('\n'),
    comments: lines.slice(firstComment).join('\n'),
  };
}

/**
 * Apply composeMessage to a commit message file in place (prepare-commit-msg hook).
 * Returns true when the file was rewritten.
 */
export function applyToMessageFile(
  messageFile: string,
  branchName: string,
  options: ComposeOptions = {}
): boolean {
  const content = readFileSync(messageFile, 'utf-8');
  const { message, comments } = splitMessageFile(content);
  const composed = composeMessage(branchName, message, options);

  if (composed === message) {
    logger.debug(`Commit message left unchanged for branch ${branchName}`);
    return false;
  }

  const separator = comments && !composed.endsWith('\n') ? '\n' : '';
  writeFileSync(messageFile, composed + separator + comments, 'utf-8');
  logger.debug(`Prepended ticket reference for branch ${branchName}`);
  return true;
}
