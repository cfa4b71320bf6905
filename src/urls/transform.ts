/**
 * Image transformation and download query parameters
 * @module supabase-storage-client/urls/transform
 */

import { isResizeMode } from '../types/common.js';
import type { DownloadOptions, TransformOptions } from '../types/requests.js';

/**
 * Copy of the options with unsupported values removed. An unknown `resize`
 * value is dropped rather than rejected.
 */
export function sanitizeTransform(transform: TransformOptions): TransformOptions {
  const { resize, ...rest } = transform;
  return resize !== undefined && isResizeMode(resize) ? { ...rest, resize } : rest;
}

/**
 * Query parameters for the image renderer, in the order
 * `width`, `height`, `resize`, `format`, `quality`.
 */
export function buildTransformParams(transform: TransformOptions): URLSearchParams {
  const { width, height, resize, format, quality } = sanitizeTransform(transform);
  const params = new URLSearchParams();

  if (width !== undefined) params.set('width', String(width));
  if (height !== undefined) params.set('height', String(height));
  if (resize !== undefined) params.set('resize', resize);
  if (format !== undefined) params.set('format', format);
  if (quality !== undefined) params.set('quality', String(quality));

  return params;
}

/**
 * Transform parameters followed by `download=true` when a download is asked for.
 */
export function buildDownloadParams(options?: DownloadOptions): URLSearchParams {
  const params = options?.transform
    ? buildTransformParams(options.transform)
    : new URLSearchParams();

  if (options?.download) {
    params.set('download', 'true');
  }

  return params;
}
