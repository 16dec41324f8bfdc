// Licensed under the Hungry Ghost Hive License. See LICENSE.

import type { FileAnnotation } from './blame.js';

/** What a trigger knows about the commit it refers to */
export interface CommitContext {
  /** 0-based line in an annotated file, if the trigger came from one */
  lineNumber?: number | null;
  annotation?: FileAnnotation | null;
  /** Commit ids selected in a log view, first entry wins */
  logSelection?: readonly string[] | null;
}

export interface ResolvedCommit {
  commitHash: string;
  lineNumber?: number;
}

function hasLineContext(lineNumber: number | null | undefined): lineNumber is number {
  return lineNumber !== null && lineNumber !== undefined && lineNumber >= 0;
}

/**
 * Determine the commit in scope. With a non-negative line only the annotation
 * is consulted; the log selection is read only without one.
 */
export function resolveCommit(context: CommitContext): ResolvedCommit | null {
  const { lineNumber, annotation, logSelection } = context;

  if (!hasLineContext(lineNumber)) {
    const first = logSelection?.[0];
    return first ? { commitHash: first } : null;
  }

  const revision = annotation?.lineRevision(lineNumber) ?? null;
  return revision ? { commitHash: revision, lineNumber } : null;
}
