// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { OperationalError, toLinkError } from '../errors/index.js';
import * as logger from '../utils/logger.js';
import { getHooksDir } from './repository.js';

export const HOOK_NAME = 'prepare-commit-msg';
export const HOOK_MARKER = '# managed by branchlink';

export type HookInstallAction = 'installed' | 'updated' | 'skipped';

export interface HookInstallResult {
  action: HookInstallAction;
  path: string;
}

/**
 * Script for the prepare-commit-msg hook. Merge, squash and amend messages
 * are left alone, and a failing run never blocks the commit.
 */
export function generateHookScript(command = 'branchlink'): string {
  return [
    '#!/bin/sh',
    HOOK_MARKER,
    'case "$2" in',
    '  merge|squash|commit) exit 0 ;;',
    'esac',
    `${command} hook run "$1" "$2" || true`,
    '',
  ].join('\n');
}

export function isManagedHook(content: string): boolean {
  return content.includes(HOOK_MARKER);
}

/**
 * Write the hook into hooksDir. An existing hook written by someone else is
 * only replaced when force is set.
 */
export function writeHook(hooksDir: string, options: { force?: boolean } = {}): HookInstallResult {
  const path = join(hooksDir, HOOK_NAME);
  let action: HookInstallAction = 'installed';

  if (existsSync(path)) {
    const current = readFileSync(path, 'utf-8');
    if (!isManagedHook(current) && !options.force) {
      logger.warn(`${path} exists and was not written by branchlink; use --force to replace it`);
      return { action: 'skipped', path };
    }
    action = 'updated';
  }

  try {
    mkdirSync(hooksDir, { recursive: true });
    writeFileSync(path, generateHookScript(), 'utf-8');
    chmodSync(path, 0o755);
  } catch (err) {
    throw toLinkError(err, OperationalError);
  }
  return { action, path };
}

export async function installHook(
  workDir: string,
  options: { force?: boolean } = {}
): Promise<HookInstallResult> {
  return writeHook(await getHooksDir(workDir), options);
}
