// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { execa } from 'execa';
import { errorMessage } from '../errors/index.js';
import * as logger from '../utils/logger.js';

/** Line → revision map for one file (0-based line numbers) */
export interface FileAnnotation {
  lineRevision(lineNumber: number): string | null;
}

const UNCOMMITTED = /^0{40}$/;
const PORCELAIN_HEADER = /^([0-9a-f]{40}) \d+ (\d+)(?: \d+)?$/;

/**
 * Parse `git blame --porcelain` output into a 0-based line → commit map.
 * Lines not yet committed map to nothing.
 */
export function parseBlamePorcelain(output: string): Map<number, string> {
  const revisions = new Map<number, string>();

  for (const line of output.split('\n')) {
    const match = line.match(PORCELAIN_HEADER);
    if (!match) continue;
    const [, hash, finalLine] = match;
    if (UNCOMMITTED.test(hash)) continue;
    revisions.set(parseInt(finalLine, 10) - 1, hash);
  }

  return revisions;
}

export function annotationFromMap(revisions: ReadonlyMap<number, string>): FileAnnotation {
  return {
    lineRevision(lineNumber: number): string | null {
      return revisions.get(lineNumber) ?? null;
    },
  };
}

/**
 * Blame a file once and serve per-line lookups from the result.
 * A file git cannot blame yields an annotation with no revisions.
 */
export async function createFileAnnotation(workDir: string, file: string): Promise<FileAnnotation> {
  try {
    const { stdout } = await execa('git', ['blame', '--porcelain', '--', file], { cwd: workDir });
    return annotationFromMap(parseBlamePorcelain(stdout));
  } catch (error) {
    logger.debug(`Could not annotate ${file}: ${errorMessage(error)}`);
    return annotationFromMap(new Map());
  }
}
