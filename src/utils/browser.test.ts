// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const execaMock = vi.hoisted(() =>
  vi.fn<(file: string, args: string[]) => Promise<{ stdout: string }>>()
);

vi.mock('execa', () => ({
  execa: execaMock,
}));

import { openBrowser } from './browser.js';

const originalPlatform = process.platform;

function setPlatform(platform: NodeJS.Platform): void {
  Object.defineProperty(process, 'platform', { value: platform });
}

describe('openBrowser', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    execaMock.mockResolvedValue({ stdout: '' });
  });

  afterEach(() => {
    setPlatform(originalPlatform);
  });

  it('should use open on macOS', async () => {
    setPlatform('darwin');

    expect(await openBrowser('https://example.com')).toBe(true);
    expect(execaMock).toHaveBeenCalledWith('open', ['https://example.com']);
  });

  it('should use start on Windows', async () => {
    setPlatform('win32');

    await openBrowser('https://example.com');

    expect(execaMock).toHaveBeenCalledWith('cmd', ['/c', 'start', '', 'https://example.com']);
  });

  it('should use xdg-open elsewhere', async () => {
    setPlatform('linux');

    await openBrowser('https://example.com');

    expect(execaMock).toHaveBeenCalledWith('xdg-open', ['https://example.com']);
  });

  it('should return false when the launcher fails', async () => {
    setPlatform('linux');
    execaMock.mockRejectedValueOnce(new Error('xdg-open not found'));

    expect(await openBrowser('https://example.com')).toBe(false);
  });
});
