/**
 * Tests for APIClient
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { APIClient } from '../../../../src/shared/utils/apiClient.js';
import {
  NetworkError,
  ProviderError,
  RequestCancelledError,
} from '../../../../src/shared/utils/errors.js';
import { sseResponse } from '../../../helpers/sse.js';

const BASE = 'http://api.test';

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

const client = new APIClient({ baseURL: BASE, name: 'Test API', headers: { 'X-Tenant': 'acme' } });

describe('APIClient', () => {
  it('should name itself after the host by default', () => {
    expect(new APIClient({ baseURL: 'http://agents.internal:8042' }).name).toBe('agents.internal');
    expect(client.name).toBe('Test API');
  });

  describe('post()', () => {
    it('should send JSON with the configured headers and params', async () => {
      let tenant: string | null = null;
      let version: string | null = null;
      server.use(
        http.post(`${BASE}/items`, ({ request }) => {
          tenant = request.headers.get('x-tenant');
          version = new URL(request.url).searchParams.get('v');
          return HttpResponse.json({ id: 'i-1' });
        })
      );

      const data = await client.post<{ id: string }>('/items', { name: 'x' }, { params: { v: '2' } });

      expect(data).toEqual({ id: 'i-1' });
      expect(tenant).toBe('acme');
      expect(version).toBe('2');
    });

    it('should map a 4xx response to ProviderError with the body message', async () => {
      server.use(
        http.post(`${BASE}/items`, () =>
          HttpResponse.json({ message: 'conversation not found' }, { status: 404 })
        )
      );

      await expect(client.post('/items', {})).rejects.toThrow(
        new ProviderError('Test API request error: conversation not found')
      );
    });

    it('should map a missing response to NetworkError', async () => {
      server.use(http.post(`${BASE}/items`, () => HttpResponse.error()));

      const error = await client.post('/items', {}).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error instanceof NetworkError && error.message.startsWith('Test API unreachable:')).toBe(
        true
      );
    });

    it('should map an aborted request to RequestCancelledError', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(client.post('/items', {}, { signal: controller.signal })).rejects.toThrow(
        new RequestCancelledError('Test API request cancelled')
      );
    });
  });

  describe('stream()', () => {
    it('should yield the response body as text', async () => {
      server.use(
        http.post(`${BASE}/stream`, ({ request }) => {
          if (!request.headers.get('accept')?.includes('text/event-stream')) {
            return HttpResponse.json({ error: { message: 'not a stream request' } }, { status: 400 });
          }
          return sseResponse(['data: {"a":1}\n\n', 'data: [DONE]\n\n']);
        })
      );

      let text = '';
      for await (const chunk of client.stream('/stream', {})) {
        text += chunk;
      }

      expect(text).toBe('data: {"a":1}\n\ndata: [DONE]\n\n');
    });

    it('should decode a character split across chunks', async () => {
      const bytes = new TextEncoder().encode('data: {"name":"José ✓"}\n\n');
      // 'é' is 0xC3 0xA9; split between the two bytes
      const split = bytes.indexOf(0xc3) + 1;
      server.use(
        http.post(
          `${BASE}/stream`,
          () =>
            new HttpResponse(
              new ReadableStream({
                start(controller) {
                  controller.enqueue(bytes.slice(0, split));
                  controller.enqueue(bytes.slice(split));
                  controller.close();
                },
              }),
              { headers: { 'content-type': 'text/event-stream' } }
            )
        )
      );

      let text = '';
      for await (const chunk of client.stream('/stream', {})) {
        text += chunk;
      }

      expect(text).toBe('data: {"name":"José ✓"}\n\n');
    });

    it('should map an error status to a typed error', async () => {
      server.use(http.post(`${BASE}/stream`, () => new HttpResponse(null, { status: 500 })));

      const consume = async () => {
        for await (const chunk of client.stream('/stream', {})) {
          void chunk;
        }
      };

      await expect(consume()).rejects.toBeInstanceOf(NetworkError);
    });

    it('should reject with RequestCancelledError when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const consume = async () => {
        for await (const chunk of client.stream('/stream', {}, { signal: controller.signal })) {
          void chunk;
        }
      };

      await expect(consume()).rejects.toBeInstanceOf(RequestCancelledError);
    });
  });
});
