/**
 * Public object URLs, built locally without a request
 * @module supabase-storage-client/urls/public-url
 */

import type { DownloadOptions } from '../types/requests.js';
import { objectPath, withQuery } from './paths.js';
import { buildDownloadParams } from './transform.js';

/**
 * Builds the public URL of an object in a public bucket.
 *
 * With `transform` present the URL points at the image renderer
 * (`render/image/public`), otherwise at the plain object route
 * (`object/public`).
 *
 * @param endpoint - Storage API root, `{url}/storage/v1`
 *
 * @example
 * ```typescript
 * buildPublicUrl('https://abc.supabase.co/storage/v1', 'photos', 'beach.jpg', {
 *   transform: { width: 300, resize: 'cover' },
 * });
 * // 'https://abc.supabase.co/storage/v1/render/image/public/photos/beach.jpg?width=300&resize=cover'
 * ```
 */
export function buildPublicUrl(
  endpoint: string,
  bucketId: string,
  path: string,
  options?: DownloadOptions
): string {
  const route = options?.transform ? 'render/image/public' : 'object/public';
  return withQuery(
    `${endpoint}/${route}/${objectPath(bucketId, path)}`,
    buildDownloadParams(options)
  );
}
