// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

let cachedVersion: string | null = null;

function readVersion(packageJsonPath: string): string | null {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      packageJson !== null &&
      typeof packageJson === 'object' &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (_error) {
    // Try next path
  }
  return null;
}

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  const moduleDir = dirname(fileURLToPath(import.meta.url));

  // dist/utils/version.js and src/utils/version.ts both sit two levels below the root
  const possiblePaths = [
    join(moduleDir, '../../package.json'),
    join(process.cwd(), 'package.json'),
  ];

  for (const packageJsonPath of possiblePaths) {
    const version = readVersion(packageJsonPath);
    if (version) {
      cachedVersion = version;
      return version;
    }
  }

  cachedVersion = '0.0.0';
  return cachedVersion;
}
