// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { execa } from 'execa';
import { errorMessage } from '../errors/index.js';
import * as logger from './logger.js';

/**
 * Open a URL in the default browser.
 * Works on macOS, Windows, and Linux. Returns false when no browser could be launched;
 * callers print the URL either way.
 */
export async function openBrowser(url: string): Promise<boolean> {
  const platform = process.platform;

  try {
    if (platform === 'darwin') {
      await execa('open', [url]);
    } else if (platform === 'win32') {
      // Empty title argument so `start` does not treat the URL as one
      await execa('cmd', ['/c', 'start', '', url]);
    } else {
      await execa('xdg-open', [url]);
    }
    return true;
  } catch (err) {
    logger.debug(`Could not open browser: ${errorMessage(err)}`);
    return false;
  }
}
