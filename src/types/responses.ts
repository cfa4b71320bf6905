/**
 * Response models and the schemas that decode them
 * @module supabase-storage-client/types/responses
 */

import { z } from 'zod';

// ============================================================================
// Buckets
// ============================================================================

export interface Bucket {
  id: string;
  name: string;
  /** Owner's user id; empty when the bucket was created with a service key */
  owner: string;
  public: boolean;
  /** Largest accepted upload in bytes, null when unlimited */
  fileSizeLimit: number | null;
  /** Accepted MIME types, null when all are accepted */
  allowedMimeTypes: string[] | null;
  createdAt: string;
  updatedAt: string;
}

export const BucketSchema: z.ZodType<Bucket, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string(),
    name: z.string(),
    owner: z.string().nullish(),
    public: z.boolean(),
    file_size_limit: z.number().nullish(),
    allowed_mime_types: z.array(z.string()).nullish(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    owner: raw.owner ?? '',
    public: raw.public,
    fileSizeLimit: raw.file_size_limit ?? null,
    allowedMimeTypes: raw.allowed_mime_types ?? null,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at,
  }));

export const BucketListSchema = z.array(BucketSchema);

export const CreateBucketResponseSchema = z.object({ name: z.string() });

// ============================================================================
// Objects
// ============================================================================

export interface FileMetadata {
  eTag?: string;
  size?: number;
  mimetype?: string;
  cacheControl?: string;
  lastModified?: string;
  contentLength?: number;
  httpStatusCode?: number;
}

export const FileMetadataSchema: z.ZodType<FileMetadata, z.ZodTypeDef, unknown> = z.object({
  eTag: z.string().optional(),
  size: z.number().optional(),
  mimetype: z.string().optional(),
  cacheControl: z.string().optional(),
  lastModified: z.string().optional(),
  contentLength: z.number().optional(),
  httpStatusCode: z.number().optional(),
});

/**
 * An entry of a listing. Folders carry only a name: their id, timestamps and
 * metadata are null.
 */
export interface FileObject {
  name: string;
  id: string | null;
  bucketId?: string;
  owner?: string;
  createdAt: string | null;
  updatedAt: string | null;
  lastAccessedAt: string | null;
  metadata: FileMetadata | null;
}

export const FileObjectSchema: z.ZodType<FileObject, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string(),
    id: z.string().nullish(),
    bucket_id: z.string().nullish(),
    owner: z.string().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    last_accessed_at: z.string().nullish(),
    metadata: FileMetadataSchema.nullish(),
  })
  .transform((raw) => ({
    name: raw.name,
    id: raw.id ?? null,
    ...(raw.bucket_id != null && { bucketId: raw.bucket_id }),
    ...(raw.owner != null && { owner: raw.owner }),
    createdAt: raw.created_at ?? null,
    updatedAt: raw.updated_at ?? null,
    lastAccessedAt: raw.last_accessed_at ?? null,
    metadata: raw.metadata ?? null,
  }));

export const FileObjectListSchema = z.array(FileObjectSchema);

/**
 * True for folder placeholders returned by a listing.
 */
export function isFolder(entry: FileObject): boolean {
  return entry.id === null;
}

/**
 * Result of an upload. `key` is the object key prefixed with its bucket.
 */
export interface UploadedObject {
  id: string;
  key: string;
}

export const UploadResponseSchema: z.ZodType<UploadedObject, z.ZodTypeDef, unknown> = z
  .object({ Id: z.string(), Key: z.string() })
  .transform((raw) => ({ id: raw.Id, key: raw.Key }));

export const KeyResponseSchema = z.object({ Key: z.string() });

export const MessageResponseSchema = z.object({ message: z.string() });

// ============================================================================
// Signed URLs
// ============================================================================

export const SignedUrlResponseSchema = z.object({ signedURL: z.string() });

export interface SignedUrl {
  /** Requested path, as echoed by the server */
  path: string | null;
  /** Absolute URL; null when the server could not sign this path */
  signedUrl: string | null;
  /** Server's reason when `signedUrl` is null */
  error: string | null;
}

export const SignedUrlsResponseSchema = z.array(
  z.object({
    path: z.string().nullable(),
    signedURL: z.string().nullable(),
    error: z.string().nullable(),
  })
);

export const SignedUploadUrlResponseSchema = z.object({
  url: z.string(),
  token: z.string().optional(),
});

export interface SignedUploadUrl {
  /** Path below the storage API root, without host, token included */
  url: string;
  /** Object path the URL uploads to */
  path: string;
  /** Short-lived upload token */
  token: string;
}

export interface SignedUploadResult {
  /** Object key prefixed with its bucket */
  key: string;
}
