/**
 * Common types shared by requests and responses
 * @module supabase-storage-client/types/common
 */

import MIME_TYPE_TABLE from './mime-types.json' with { type: 'json' };

// ============================================================================
// MIME types
// ============================================================================

/**
 * Name of a well-known MIME type, e.g. `'png'` or `'plainText'`.
 */
export type KnownMimeType = keyof typeof MIME_TYPE_TABLE;

/**
 * Any MIME string not covered by the known names, including wildcards
 * such as `image/*`.
 */
export interface CustomMimeType {
  readonly custom: string;
}

/**
 * A known MIME type name or a custom MIME string.
 *
 * @example
 * ```typescript
 * const allowed: MimeType[] = ['png', 'wav', customMimeType('image/*')];
 * allowed.map(mimeTypeToString); // ['image/png', 'audio/wav', 'image/*']
 * ```
 */
export type MimeType = KnownMimeType | CustomMimeType;

export function customMimeType(value: string): CustomMimeType {
  return { custom: value };
}

export function isKnownMimeType(name: string): name is KnownMimeType {
  return Object.hasOwn(MIME_TYPE_TABLE, name);
}

/**
 * All known MIME type names, in table order.
 */
export const KNOWN_MIME_TYPES: readonly KnownMimeType[] = Object.keys(MIME_TYPE_TABLE).filter(
  isKnownMimeType
);

/**
 * Returns the `type/subtype` string of a MIME type. A custom MIME type yields
 * exactly the string it was built with.
 */
export function mimeTypeToString(mime: MimeType): string {
  return typeof mime === 'string' ? MIME_TYPE_TABLE[mime] : mime.custom;
}

// ============================================================================
// Listing
// ============================================================================

export type SortColumn = 'name' | 'updated_at' | 'created_at' | 'last_accessed_at';

export type SortOrder = 'asc' | 'desc';

export interface SortBy {
  column: SortColumn;
  order: SortOrder;
}

// ============================================================================
// Image transformation
// ============================================================================

/**
 * Resize modes accepted by the image renderer. Any other value is dropped
 * from generated query strings.
 */
export const RESIZE_MODES = ['cover', 'contain', 'fill'] as const;

export type ResizeMode = (typeof RESIZE_MODES)[number];

export function isResizeMode(value: string): value is ResizeMode {
  return RESIZE_MODES.some((mode) => mode === value);
}

/**
 * `origin` keeps the stored format.
 */
export type ImageFormat = 'origin' | 'avif' | 'webp';
