// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { createServer, type IncomingHttpHeaders, type RequestListener, type Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../utils/logger.js', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

import * as logger from '../../utils/logger.js';
import { RestClient } from './rest-client.js';

let originalFetch: typeof globalThis.fetch;
let mockServer: Server | undefined;

function respondWith(
  handler: (headers: IncomingHttpHeaders) => { status: number; body: string }
): RequestListener {
  return (req, res) => {
    const { status, body } = handler(req.headers);
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(body);
  };
}

async function startServer(listener: RequestListener): Promise<number> {
  const server = createServer(listener);
  mockServer = server;

  return new Promise<number>((resolve, reject) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server has no port'));
        return;
      }
      resolve(address.port);
    });
  });
}

beforeEach(() => {
  originalFetch = globalThis.fetch;
  vi.clearAllMocks();
});

afterEach(() => {
  globalThis.fetch = originalFetch;
  mockServer?.closeAllConnections();
  mockServer?.close();
  mockServer = undefined;
});

describe('RestClient', () => {
  describe('get', () => {
    it('should return the body of a 200 response with bearer and accept headers', async () => {
      let captured: IncomingHttpHeaders = {};
      const port = await startServer(
        respondWith(headers => {
          captured = headers;
          return { status: 200, body: '{"issues":[]}' };
        })
      );

      const client = new RestClient();
      const result = await client.get(`http://127.0.0.1:${port}/rest/api/2/search`, 'test-secret');

      expect(result).toEqual({ kind: 'ok', body: '{"issues":[]}' });
      expect(captured.authorization).toBe('Bearer test-secret');
      expect(captured.accept).toBe('application/json');
    });

    it('should skip the request when the token is blank', async () => {
      const fetchSpy = vi.fn<typeof globalThis.fetch>();
      globalThis.fetch = fetchSpy;

      const client = new RestClient();
      const result = await client.get('https://tracker.example.com/rest/api/2/search', '   ');

      expect(result).toEqual({ kind: 'skipped' });
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('should report non-200 responses and log the error body', async () => {
      const port = await startServer(
        respondWith(() => ({ status: 401, body: '{"message":"denied"}' }))
      );

      const client = new RestClient();
      const result = await client.get(`http://127.0.0.1:${port}/any`, 'test-secret');

      expect(result).toEqual({ kind: 'http-error', status: 401 });
      expect(logger.warn).toHaveBeenCalledWith('API request failed with response code: 401');
      expect(logger.warn).toHaveBeenCalledWith('Error response: {"message":"denied"}');
    });

    it('should treat other 2xx statuses as errors', async () => {
      const port = await startServer(respondWith(() => ({ status: 204, body: '' })));

      const client = new RestClient();
      const result = await client.get(`http://127.0.0.1:${port}/any`, 'test-secret');

      expect(result).toEqual({ kind: 'http-error', status: 204 });
    });

    it('should report transport failures without throwing', async () => {
      globalThis.fetch = async () => {
        throw new TypeError('fetch failed');
      };

      const client = new RestClient();
      const result = await client.get('https://review.example.com/rest', 'test-secret');

      expect(result).toEqual({ kind: 'transport-error', message: 'fetch failed' });
      expect(logger.warn).toHaveBeenCalledWith(
        'API request failed: GET https://review.example.com/rest (fetch failed)'
      );
    });

    it('should abort when no response arrives within the connect timeout', async () => {
      globalThis.fetch = (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });

      const client = new RestClient({ connectTimeoutMs: 20 });
      const result = await client.get('https://review.example.com/rest', 'test-secret');

      expect(result).toEqual({ kind: 'transport-error', message: 'connect timeout after 20ms' });
    });

    it('should abort when the body is not read within the read timeout', async () => {
      const port = await startServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.write('{"values":');
      });

      const client = new RestClient({ connectTimeoutMs: 1000, readTimeoutMs: 20 });
      const result = await client.get(`http://127.0.0.1:${port}/slow`, 'test-secret');

      expect(result).toEqual({ kind: 'transport-error', message: 'read timeout after 20ms' });
    });
  });
});
