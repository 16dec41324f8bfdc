// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { errorMessage } from '../../errors/index.js';
import * as logger from '../../utils/logger.js';

/** Options for constructing a RestClient */
export interface RestClientOptions {
  /** Time allowed until response headers arrive. Default: 10000 */
  connectTimeoutMs?: number;
  /** Time allowed for reading the response body. Default: 30000 */
  readTimeoutMs?: number;
}

/** Outcome of a GET; the client never throws */
export type RestResult =
  | { kind: 'ok'; body: string }
  | { kind: 'skipped' }
  | { kind: 'http-error'; status: number }
  | { kind: 'transport-error'; message: string };

export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
export const DEFAULT_READ_TIMEOUT_MS = 30_000;

const HTTP_OK = 200;

/**
 * Bearer-token JSON GET client shared by the tracker and review server lookups.
 *
 * A blank token skips the request. Non-200 responses and transport failures are
 * logged and reported as results so callers always have something to render.
 */
export class RestClient {
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;

  constructor(options: RestClientOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  }

  async get(url: string, token: string): Promise<RestResult> {
    if (token.trim().length === 0) {
      logger.debug(`Skipping request without token: ${url}`);
      return { kind: 'skipped' };
    }

    const controller = new AbortController();
    let stage = `connect timeout after ${this.connectTimeoutMs}ms`;
    let timer = setTimeout(() => controller.abort(), this.connectTimeoutMs);
    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });

      clearTimeout(timer);
      stage = `read timeout after ${this.readTimeoutMs}ms`;
      timer = setTimeout(() => controller.abort(), this.readTimeoutMs);

      if (response.status !== HTTP_OK) {
        await this.logApiError(response);
        return { kind: 'http-error', status: response.status };
      }

      return { kind: 'ok', body: await response.text() };
    } catch (err) {
      const message = controller.signal.aborted ? stage : errorMessage(err);
      logger.warn(`API request failed: GET ${url} (${message})`);
      return { kind: 'transport-error', message };
    } finally {
      clearTimeout(timer);
    }
  }

  private async logApiError(response: Response): Promise<void> {
    logger.warn(`API request failed with response code: ${response.status}`);
    try {
      const body = await response.text();
      if (body) {
        logger.warn(`Error response: ${body}`);
      }
    } catch (err) {
      logger.debug(`Could not read error response: ${errorMessage(err)}`);
    }
  }
}
