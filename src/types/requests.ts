/**
 * Request option types and wire payloads
 * @module supabase-storage-client/types/requests
 */

import type { ImageFormat, MimeType, SortBy } from './common.js';

// ============================================================================
// Buckets
// ============================================================================

export interface CreateBucketOptions {
  /**
   * Bucket id used for updates and deletion. Defaults to the bucket name.
   */
  id?: string;

  /**
   * Public buckets serve objects without an authorization token; every other
   * operation still requires one.
   * @default false
   */
  public?: boolean;

  /**
   * MIME types accepted on upload. All types are accepted when omitted.
   */
  allowedMimeTypes?: MimeType[];

  /**
   * Largest accepted upload in bytes. The project-wide limit takes precedence.
   */
  fileSizeLimit?: number;
}

/**
 * Options for updating a bucket. Omitted optional fields are not sent, and
 * the server leaves them unchanged.
 */
export interface UpdateBucketOptions {
  public: boolean;
  allowedMimeTypes?: MimeType[];
  fileSizeLimit?: number;
}

// ============================================================================
// Objects
// ============================================================================

/**
 * Per-call upload options.
 */
export interface FileOptions {
  /**
   * Seconds the asset is cached by browsers and the CDN; sent as
   * `cache-control: max-age=<seconds>`.
   */
  cacheControl?: number;

  /**
   * Content type of the upload, sent as `content-type`.
   */
  contentType?: string;

  /**
   * Overwrite an existing object at the same path. Only `true` is sent.
   */
  upsert?: boolean;

  /**
   * Passed to fetch as its `duplex` option.
   */
  duplex?: 'half';
}

/**
 * Object contents. Strings are sent UTF-8 encoded.
 */
export type UploadBody = Uint8Array | ArrayBuffer | string;

export interface TransformOptions {
  /** Width in pixels */
  width?: number;
  /** Height in pixels */
  height?: number;
  /**
   * One of `cover`, `contain` or `fill`; any other value is left out of the
   * request.
   */
  resize?: string;
  format?: ImageFormat;
  /** 20 to 100 */
  quality?: number;
}

export interface DownloadOptions {
  /** Render the image through the transformation endpoint */
  transform?: TransformOptions;
  /** Ask for `content-disposition: attachment` */
  download?: boolean;
}

export interface FileSearchOptions {
  /** @default 100 */
  limit?: number;
  /** @default 0 */
  offset?: number;
  /** @default { column: 'name', order: 'asc' } */
  sortBy?: SortBy;
  /** Substring matched against object names */
  search?: string;
}

export interface CopyFileRequest {
  fromBucket: string;
  /** Defaults to `fromBucket` */
  toBucket?: string;
  fromPath: string;
  /** Defaults to `fromPath` */
  toPath?: string;
  /** @default false */
  copyMetadata?: boolean;
}

export interface MoveFileRequest {
  fromBucket: string;
  /** Defaults to `fromBucket` */
  toBucket?: string;
  fromPath: string;
  toPath: string;
}

// ============================================================================
// Signed URLs
// ============================================================================

export interface SignedUrlOptions {
  transform?: TransformOptions;
  download?: boolean;
}

/**
 * Options for signing several paths at once. The batch endpoint takes no
 * transformation.
 */
export interface SignedUrlsOptions {
  download?: boolean;
}

export interface SignedUploadUrlOptions {
  upsert?: boolean;
}

// ============================================================================
// Wire payloads
// ============================================================================

export interface BucketPayload {
  id: string;
  name: string;
  public: boolean;
  allowed_mime_types?: string[];
  file_size_limit?: number;
}

export interface ListFilesPayload {
  prefix: string;
  limit: number;
  offset: number;
  sortBy: SortBy;
  search?: string;
}

export interface MoveFilePayload {
  bucketId: string;
  sourceKey: string;
  destinationBucket: string;
  destinationKey: string;
}

export interface CopyFilePayload extends MoveFilePayload {
  copyMetadata: boolean;
}

export interface SignUrlPayload {
  expiresIn: number;
  transform?: TransformOptions;
}

export interface SignUrlsPayload {
  expiresIn: number;
  paths: string[];
}
