/**
 * Helpers shared by object and signed-upload requests
 * @module supabase-storage-client/objects/utils
 */

import type { FileOptions, UploadBody } from '../types/index.js';

const encoder = new TextEncoder();

/**
 * Upload headers for a set of file options.
 *
 * `x-upsert` is sent only when `upsert` is true; the server treats a missing
 * header as false.
 */
export function buildFileHeaders(options: FileOptions = {}): Record<string, string> {
  const headers: Record<string, string> = {};

  if (options.cacheControl !== undefined) {
    headers['cache-control'] = `max-age=${options.cacheControl}`;
  }
  if (options.contentType !== undefined) {
    headers['content-type'] = options.contentType;
  }
  if (options.upsert === true) {
    headers['x-upsert'] = 'true';
  }

  return headers;
}

/**
 * Converts an upload body to bytes. Strings are UTF-8 encoded.
 */
export function toBytes(body: UploadBody): Uint8Array {
  if (typeof body === 'string') {
    return encoder.encode(body);
  }
  if (body instanceof ArrayBuffer) {
    return new Uint8Array(body);
  }
  return body;
}
