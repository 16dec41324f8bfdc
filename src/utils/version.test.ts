// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { readFileSync } from 'fs';
import { describe, expect, it } from 'vitest';
import { getVersion } from './version.js';

describe('getVersion', () => {
  it('should read the version from package.json', () => {
    const packageJson: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
    );
    const expected =
      packageJson !== null && typeof packageJson === 'object' && 'version' in packageJson
        ? packageJson.version
        : undefined;

    expect(getVersion()).toBe(expected);
    expect(getVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
