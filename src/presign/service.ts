/**
 * Signed URL service implementation
 * @module supabase-storage-client/presign/service
 */

import { z } from 'zod';
import type { PresignService } from './interface.js';
import type { RequestExecutor } from '../client/executor.js';
import {
  KeyResponseSchema,
  SignedUploadUrlResponseSchema,
  SignedUrlResponseSchema,
  SignedUrlsResponseSchema,
  type FileOptions,
  type SignUrlPayload,
  type SignUrlsPayload,
  type SignedUploadResult,
  type SignedUploadUrl,
  type SignedUploadUrlOptions,
  type SignedUrl,
  type SignedUrlOptions,
  type SignedUrlsOptions,
  type UploadBody,
} from '../types/index.js';
import { normalizePath, objectPath } from '../urls/paths.js';
import { sanitizeTransform } from '../urls/transform.js';
import { buildFileHeaders, toBytes } from '../objects/utils.js';

/**
 * Reads the `token` query parameter of a URL or path.
 */
export function extractToken(url: string): string | null {
  const queryStart = url.indexOf('?');
  if (queryStart === -1) {
    return null;
  }
  return new URLSearchParams(url.slice(queryStart + 1)).get('token');
}

// A signed upload URL without a token is unusable; reject it as a bad body.
const SignedUploadTokenSchema = SignedUploadUrlResponseSchema.transform((raw, ctx) => {
  const token = raw.token ?? extractToken(raw.url);
  if (!token) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'No token in signed upload URL' });
    return z.NEVER;
  }
  return { url: raw.url, token };
});

export class PresignServiceImpl implements PresignService {
  constructor(private readonly executor: RequestExecutor) {}

  async createSignedUrl(
    bucketId: string,
    path: string,
    expiresIn: number,
    options: SignedUrlOptions = {}
  ): Promise<string> {
    const payload: SignUrlPayload = {
      expiresIn,
      ...(options.transform && { transform: sanitizeTransform(options.transform) }),
    };

    const response = await this.executor.json(
      { method: 'POST', path: `/object/sign/${objectPath(bucketId, path)}`, json: payload },
      SignedUrlResponseSchema
    );
    return this.toAbsoluteUrl(response.signedURL, options.download);
  }

  async createSignedUrls(
    bucketId: string,
    paths: string[],
    expiresIn: number,
    options: SignedUrlsOptions = {}
  ): Promise<SignedUrl[]> {
    const payload: SignUrlsPayload = { expiresIn, paths };

    const entries = await this.executor.json(
      { method: 'POST', path: `/object/sign/${encodeURIComponent(bucketId)}`, json: payload },
      SignedUrlsResponseSchema
    );

    return entries.map((entry) => ({
      path: entry.path,
      signedUrl: entry.signedURL ? this.toAbsoluteUrl(entry.signedURL, options.download) : null,
      error: entry.error,
    }));
  }

  async createSignedUploadUrl(
    bucketId: string,
    path: string,
    options: SignedUploadUrlOptions = {}
  ): Promise<SignedUploadUrl> {
    const headers: Record<string, string> = options.upsert ? { 'x-upsert': 'true' } : {};

    const { url, token } = await this.executor.json(
      { method: 'POST', path: `/object/upload/sign/${objectPath(bucketId, path)}`, headers },
      SignedUploadTokenSchema
    );
    return { url, path: normalizePath(path), token };
  }

  async uploadToSignedUrl(
    bucketId: string,
    path: string,
    token: string,
    body: UploadBody,
    options: FileOptions = {}
  ): Promise<SignedUploadResult> {
    const response = await this.executor.json(
      {
        method: 'PUT',
        path: `/object/upload/sign/${objectPath(bucketId, path)}`,
        query: new URLSearchParams({ token }),
        headers: buildFileHeaders(options),
        body: toBytes(body),
        ...(options.duplex && { duplex: options.duplex }),
      },
      KeyResponseSchema
    );
    return { key: response.Key };
  }

  private toAbsoluteUrl(signedUrl: string, download?: boolean): string {
    const url = `${this.executor.endpoint}${signedUrl}`;
    if (!download) {
      return url;
    }
    return `${url}${url.includes('?') ? '&' : '?'}download=true`;
  }
}
