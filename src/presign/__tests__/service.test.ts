/**
 * Tests for signed URL operations
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createMockClient, requestJson, type MockHttpTransport } from '../../testing/index.js';
import type { StorageClient } from '../../client/client.js';
import { StorageApiError } from '../../errors/index.js';
import { extractToken } from '../service.js';

const ENDPOINT = 'https://test-project.supabase.co/storage/v1';

describe('extractToken', () => {
  it('should read the token query parameter', () => {
    expect(extractToken('/object/upload/sign/docs/a.txt?token=test-token')).toBe('test-token');
  });

  it('should return null without a query', () => {
    expect(extractToken('/object/upload/sign/docs/a.txt')).toBeNull();
  });
});

describe('PresignService', () => {
  let client: StorageClient;
  let transport: MockHttpTransport;

  beforeEach(() => {
    ({ client, transport } = createMockClient());
  });

  describe('createSignedUrl', () => {
    it('should return an absolute URL', async () => {
      transport.mock(
        { method: 'POST', path: '/object/sign/docs/a.txt' },
        { json: { signedURL: '/object/sign/docs/a.txt?token=signed-token' } }
      );

      const url = await client.createSignedUrl('docs', 'a.txt', 60);

      expect(url).toBe(`${ENDPOINT}/object/sign/docs/a.txt?token=signed-token`);
      expect(requestJson(transport.lastCall())).toEqual({ expiresIn: 60 });
    });

    it('should append download and send a sanitized transform', async () => {
      transport.mock(
        { method: 'POST', path: '/object/sign/images/cat.png' },
        { json: { signedURL: '/render/image/sign/images/cat.png?token=signed-token' } }
      );

      const url = await client.createSignedUrl('images', 'cat.png', 120, {
        download: true,
        transform: { width: 64, resize: 'squash' },
      });

      expect(url).toBe(`${ENDPOINT}/render/image/sign/images/cat.png?token=signed-token&download=true`);
      expect(requestJson(transport.lastCall())).toEqual({ expiresIn: 120, transform: { width: 64 } });
    });
  });

  describe('createSignedUrls', () => {
    it('should sign several paths and keep per-path errors', async () => {
      transport.mock(
        { method: 'POST', path: '/object/sign/docs' },
        {
          json: [
            { path: 'a.txt', signedURL: '/object/sign/docs/a.txt?token=t1', error: null },
            { path: 'missing.txt', signedURL: null, error: 'Either the object does not exist or you do not have access to it' },
          ],
        }
      );

      const urls = await client.createSignedUrls('docs', ['a.txt', 'missing.txt'], 30);

      expect(requestJson(transport.lastCall())).toEqual({ expiresIn: 30, paths: ['a.txt', 'missing.txt'] });
      expect(urls).toEqual([
        { path: 'a.txt', signedUrl: `${ENDPOINT}/object/sign/docs/a.txt?token=t1`, error: null },
        {
          path: 'missing.txt',
          signedUrl: null,
          error: 'Either the object does not exist or you do not have access to it',
        },
      ]);
    });
  });

  it('should append download to every signed URL of a batch', async () => {
    transport.mock(
      { method: 'POST', path: '/object/sign/docs' },
      { json: [{ path: 'a.txt', signedURL: '/object/sign/docs/a.txt?token=t1', error: null }] }
    );

    const urls = await client.createSignedUrls('docs', ['a.txt'], 60, { download: true });

    expect(requestJson(transport.lastCall())).toEqual({ expiresIn: 60, paths: ['a.txt'] });
    expect(urls).toEqual([
      { path: 'a.txt', signedUrl: `${ENDPOINT}/object/sign/docs/a.txt?token=t1&download=true`, error: null },
    ]);
  });

  describe('createSignedUploadUrl', () => {
    it('should read the token from the returned url', async () => {
      transport.mock(
        { method: 'POST', path: '/object/upload/sign/docs/new.txt' },
        { json: { url: '/object/upload/sign/docs/new.txt?token=upload-token' } }
      );

      const signed = await client.createSignedUploadUrl('docs', '/new.txt', { upsert: true });

      expect(signed).toEqual({
        url: '/object/upload/sign/docs/new.txt?token=upload-token',
        path: 'new.txt',
        token: 'upload-token',
      });
      expect(transport.lastCall()?.headers['x-upsert']).toBe('true');
    });

    it('should fail when the url carries no token', async () => {
      const body = '{"url":"/object/upload/sign/docs/new.txt"}';
      transport.mock({ method: 'POST' }, { text: body });

      const error = await client.createSignedUploadUrl('docs', 'new.txt').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageApiError);
      expect(error).toMatchObject({ status: 200, message: body });
    });
  });

  describe('uploadToSignedUrl', () => {
    it('should PUT with the token query and return the key', async () => {
      transport.mock(
        { method: 'PUT', path: '/object/upload/sign/docs/new.txt' },
        { json: { Key: 'docs/new.txt' } }
      );

      const result = await client.uploadToSignedUrl('docs', 'new.txt', 'upload-token', 'data', {
        contentType: 'text/plain',
      });

      expect(result).toEqual({ key: 'docs/new.txt' });
      const call = transport.lastCall();
      expect(call?.url).toBe(`${ENDPOINT}/object/upload/sign/docs/new.txt?token=upload-token`);
      expect(call?.headers['content-type']).toBe('text/plain');
    });
  });
});
