/**
 * Client tests through the fetch transport against an in-process msw server
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { StorageClient } from '../client.js';
import { createClient, createClientFromEnv } from '../factory.js';
import { ConfigError, HeaderError, StorageApiError } from '../../errors/index.js';

const PROJECT_URL = 'https://test-project.supabase.co';
const ENDPOINT = `${PROJECT_URL}/storage/v1`;

const server = setupServer();

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

afterEach(() => {
  server.resetHandlers();
  vi.unstubAllEnvs();
});

afterAll(() => {
  server.close();
});

describe('StorageClient', () => {
  describe('construction', () => {
    it('should never throw and strip a trailing slash', () => {
      const client = new StorageClient(`${PROJECT_URL}/`, 'test-secret');

      expect(client.url).toBe(PROJECT_URL);
      expect(client.endpoint).toBe(ENDPOINT);
      expect(client.headers).toEqual({});
    });

    it('should read the environment', () => {
      vi.stubEnv('SUPABASE_URL', PROJECT_URL);
      vi.stubEnv('SUPABASE_API_KEY', 'test-secret');

      expect(StorageClient.fromEnv().url).toBe(PROJECT_URL);
      expect(createClientFromEnv().endpoint).toBe(ENDPOINT);
    });

    it('should fail from the environment without a key', () => {
      vi.stubEnv('SUPABASE_URL', PROJECT_URL);
      vi.stubEnv('SUPABASE_API_KEY', '');

      expect(() => StorageClient.fromEnv()).toThrow(ConfigError);
    });

    it('should validate in createClient', () => {
      expect(() => createClient({ url: 'not-a-url', apiKey: 'test-secret' })).toThrow(ConfigError);
      expect(() =>
        createClient({ url: PROJECT_URL, apiKey: 'test-secret', headers: { 'bad header': 'x' } })
      ).toThrow(HeaderError);
    });
  });

  describe('withHeader', () => {
    it('should return a new client and leave the original unchanged', () => {
      const client = new StorageClient(PROJECT_URL, 'test-secret');
      const tagged = client.withHeader('X-Client-Info', 'tests/1.0');

      expect(tagged).not.toBe(client);
      expect(tagged.headers).toEqual({ 'x-client-info': 'tests/1.0' });
      expect(client.headers).toEqual({});
    });

    it('should overwrite an existing default', () => {
      const client = new StorageClient(PROJECT_URL, 'test-secret', { headers: { 'x-trace': 'a' } });

      expect(client.withHeader('x-trace', 'b').headers).toEqual({ 'x-trace': 'b' });
    });

    it('should reject invalid headers', () => {
      const client = new StorageClient(PROJECT_URL, 'test-secret');

      expect(() => client.withHeader('bad name', 'x')).toThrow(HeaderError);
      expect(() => client.withHeader('x-ok', 'line\nbreak')).toThrow(HeaderError);
    });

    it('should send defaults unless the call sets the same header', async () => {
      let received: Record<string, string | null> = {};
      server.use(
        http.post(`${ENDPOINT}/object/docs/a.txt`, ({ request }) => {
          received = {
            contentType: request.headers.get('content-type'),
            clientInfo: request.headers.get('x-client-info'),
            apikey: request.headers.get('apikey'),
            authorization: request.headers.get('authorization'),
          };
          return HttpResponse.json({ Id: 'obj-1', Key: 'docs/a.txt' });
        })
      );

      const client = new StorageClient(PROJECT_URL, 'test-secret')
        .withHeader('content-type', 'application/octet-stream')
        .withHeader('x-client-info', 'tests');

      await client.uploadFile('docs', 'a.txt', 'text', { contentType: 'text/plain' });

      expect(received).toEqual({
        contentType: 'text/plain',
        clientInfo: 'tests',
        apikey: 'test-secret',
        authorization: 'Bearer test-secret',
      });
    });
  });

  describe('round trips', () => {
    it('should upload then download the same bytes', async () => {
      const stored = new Map<string, Uint8Array>();
      server.use(
        http.post(`${ENDPOINT}/object/docs/:name`, async ({ request, params }) => {
          stored.set(String(params['name']), new Uint8Array(await request.arrayBuffer()));
          return HttpResponse.json({ Id: 'obj-1', Key: `docs/${String(params['name'])}` });
        }),
        http.get(`${ENDPOINT}/object/docs/:name`, ({ params }) => {
          const body = stored.get(String(params['name']));
          return body
            ? new HttpResponse(body)
            : HttpResponse.json({ error: 'not_found' }, { status: 404 });
        })
      );
      const client = new StorageClient(PROJECT_URL, 'test-secret');

      const uploaded = await client.uploadFile('docs', 'hello.txt', 'Hello, world!');
      const bytes = await client.downloadFile('docs', 'hello.txt');

      expect(uploaded).toEqual({ id: 'obj-1', key: 'docs/hello.txt' });
      expect(new TextDecoder().decode(bytes)).toBe('Hello, world!');
    });

    it('should move an object and find it at the new path', async () => {
      const keys = new Set(['a.txt']);
      server.use(
        http.post(`${ENDPOINT}/object/move`, async ({ request }) => {
          const body = await request.json();
          if (
            typeof body === 'object' &&
            body !== null &&
            'sourceKey' in body &&
            'destinationKey' in body &&
            typeof body.sourceKey === 'string' &&
            typeof body.destinationKey === 'string'
          ) {
            keys.delete(body.sourceKey);
            keys.add(body.destinationKey);
          }
          return HttpResponse.json({ message: 'Successfully moved' });
        }),
        http.post(`${ENDPOINT}/object/list/docs`, () =>
          HttpResponse.json(
            [...keys].map((name) => ({
              name,
              id: `id-${name}`,
              created_at: '2024-01-01T00:00:00.000Z',
              updated_at: '2024-01-01T00:00:00.000Z',
              last_accessed_at: '2024-01-01T00:00:00.000Z',
              metadata: { size: 1 },
            }))
          )
        )
      );
      const client = new StorageClient(PROJECT_URL, 'test-secret');

      await client.moveFile({ fromBucket: 'docs', fromPath: 'a.txt', toPath: 'b.txt' });
      const files = await client.listFiles('docs');

      expect(files.map((file) => file.name)).toEqual(['b.txt']);
    });
  });

  describe('errors', () => {
    it('should carry the exact status and raw body', async () => {
      const body = '{"statusCode":"403","error":"Unauthorized","message":"new row violates row-level security policy"}';
      server.use(http.get(`${ENDPOINT}/bucket`, () => new HttpResponse(body, { status: 403 })));

      const error = await new StorageClient(PROJECT_URL, 'test-secret')
        .listBuckets()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageApiError);
      expect(error).toMatchObject({ status: 403, message: body, code: 'Unauthorized' });
    });
  });

  describe('logging', () => {
    it('should log requests through a console logger when a level is set', async () => {
      server.use(http.get(`${ENDPOINT}/bucket`, () => HttpResponse.json([])));
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      await new StorageClient(PROJECT_URL, 'test-secret', { logLevel: 'debug' }).listBuckets();

      expect(spy).toHaveBeenNthCalledWith(1, 'storage DEBUG Outgoing request method=GET path=/bucket');
      expect(spy).toHaveBeenCalledTimes(2);
      spy.mockRestore();
    });

    it('should stay silent without a level', async () => {
      server.use(http.get(`${ENDPOINT}/bucket`, () => HttpResponse.json([])));
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      await new StorageClient(PROJECT_URL, 'test-secret').listBuckets();

      expect(spy).not.toHaveBeenCalled();
      spy.mockRestore();
    });
  });

  describe('getPublicUrl', () => {
    it('should build the URL without a request', () => {
      const client = new StorageClient(PROJECT_URL, 'test-secret');

      expect(client.getPublicUrl('public-bucket', 'folder/img.png')).toBe(
        `${ENDPOINT}/object/public/public-bucket/folder/img.png`
      );
      expect(
        client.getPublicUrl('public-bucket', 'folder/img.png', {
          transform: { width: 100, height: 100, resize: 'fill', format: 'webp', quality: 75 },
          download: true,
        })
      ).toBe(
        `${ENDPOINT}/render/image/public/public-bucket/folder/img.png?width=100&height=100&resize=fill&format=webp&quality=75&download=true`
      );
    });
  });
});
