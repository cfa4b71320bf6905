/**
 * Tests for the fetch transport, against an in-process msw server
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { delay, http, HttpResponse } from 'msw';
import { FetchTransport } from '../fetch-transport.js';
import { NetworkError } from '../../errors/index.js';

const BASE_URL = 'https://transport.test';

const server = setupServer();

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

afterEach(() => {
  server.resetHandlers();
});

afterAll(() => {
  server.close();
});

describe('FetchTransport', () => {
  it('should send method, headers and body', async () => {
    let received: { method: string; header: string | null; body: string } | undefined;
    server.use(
      http.put(`${BASE_URL}/echo`, async ({ request }) => {
        received = {
          method: request.method,
          header: request.headers.get('x-test'),
          body: await request.text(),
        };
        return HttpResponse.json({ ok: true });
      })
    );

    const response = await new FetchTransport().send({
      method: 'PUT',
      url: `${BASE_URL}/echo`,
      headers: { 'x-test': 'yes' },
      body: new TextEncoder().encode('payload'),
    });

    expect(received).toEqual({ method: 'PUT', header: 'yes', body: 'payload' });
    expect(response.status).toBe(200);
    expect(new TextDecoder().decode(response.body)).toBe('{"ok":true}');
    expect(response.headers['content-type']).toBe('application/json');
  });

  it('should resolve for error statuses', async () => {
    server.use(
      http.get(`${BASE_URL}/missing`, () => new HttpResponse('not here', { status: 404 }))
    );

    const response = await new FetchTransport().send({
      method: 'GET',
      url: `${BASE_URL}/missing`,
      headers: {},
    });

    expect(response.status).toBe(404);
    expect(new TextDecoder().decode(response.body)).toBe('not here');
  });

  it('should map an aborted request to a timeout', async () => {
    server.use(
      http.get(`${BASE_URL}/slow`, async () => {
        await delay(500);
        return HttpResponse.json({});
      })
    );

    const error = await new FetchTransport({ timeout: 20 })
      .send({ method: 'GET', url: `${BASE_URL}/slow`, headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ code: 'TIMEOUT', message: 'Request timed out after 20ms' });
  });

  it('should map a network failure to a connection error', async () => {
    server.use(http.get(`${BASE_URL}/down`, () => HttpResponse.error()));

    const error = await new FetchTransport()
      .send({ method: 'GET', url: `${BASE_URL}/down`, headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ code: 'CONNECTION_FAILED', isRetryable: true });
  });
});
