// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { beforeEach, describe, expect, it, vi } from 'vitest';

const execaMock = vi.hoisted(() =>
  vi.fn<(file: string, args: string[], options: { cwd: string }) => Promise<{ stdout: string }>>()
);

vi.mock('execa', () => ({
  execa: execaMock,
}));

import { annotationFromMap, createFileAnnotation, parseBlamePorcelain } from './blame.js';

const FIRST = '1'.repeat(40);
const SECOND = '2'.repeat(40);
const UNCOMMITTED = '0'.repeat(40);

const PORCELAIN = [
  `${FIRST} 1 1 2`,
  'author Sam Doe',
  'summary first',
  'filename src/app.ts',
  '\tconst a = 1;',
  `${FIRST} 2 2`,
  '\tconst b = 2;',
  `${SECOND} 5 3 1`,
  'author Alex Roe',
  'summary second',
  'filename src/app.ts',
  '\tconst c = 3;',
  `${UNCOMMITTED} 4 4 1`,
  'author Not Committed Yet',
  'filename src/app.ts',
  '\tconst d = 4;',
].join('\n');

describe('parseBlamePorcelain', () => {
  it('should map 0-based final lines to commits', () => {
    const revisions = parseBlamePorcelain(PORCELAIN);

    expect(revisions.get(0)).toBe(FIRST);
    expect(revisions.get(1)).toBe(FIRST);
    expect(revisions.get(2)).toBe(SECOND);
  });

  it('should leave uncommitted lines out', () => {
    expect(parseBlamePorcelain(PORCELAIN).has(3)).toBe(false);
  });

  it('should not treat content lines as headers', () => {
    const revisions = parseBlamePorcelain(`${FIRST} 1 1 1\n\t${SECOND} 9 9 9`);

    expect([...revisions.entries()]).toEqual([[0, FIRST]]);
  });
});

describe('annotationFromMap', () => {
  it('should return null for unknown lines', () => {
    const annotation = annotationFromMap(new Map([[0, FIRST]]));

    expect(annotation.lineRevision(0)).toBe(FIRST);
    expect(annotation.lineRevision(1)).toBeNull();
  });
});

describe('createFileAnnotation', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should blame the file once and serve lines from the result', async () => {
    execaMock.mockResolvedValueOnce({ stdout: PORCELAIN });

    const annotation = await createFileAnnotation('/test/repo', 'src/app.ts');

    expect(annotation.lineRevision(2)).toBe(SECOND);
    expect(annotation.lineRevision(0)).toBe(FIRST);
    expect(execaMock).toHaveBeenCalledTimes(1);
    expect(execaMock).toHaveBeenCalledWith('git', ['blame', '--porcelain', '--', 'src/app.ts'], {
      cwd: '/test/repo',
    });
  });

  it('should return an empty annotation when git cannot blame the file', async () => {
    execaMock.mockRejectedValueOnce(new Error('no such path'));

    const annotation = await createFileAnnotation('/test/repo', 'missing.ts');

    expect(annotation.lineRevision(0)).toBeNull();
  });
});
