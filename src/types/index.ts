/**
 * Request and response types for all storage operations
 * @module supabase-storage-client/types
 */

export {
  customMimeType,
  isKnownMimeType,
  mimeTypeToString,
  isResizeMode,
  KNOWN_MIME_TYPES,
  RESIZE_MODES,
  type KnownMimeType,
  type CustomMimeType,
  type MimeType,
  type SortColumn,
  type SortOrder,
  type SortBy,
  type ResizeMode,
  type ImageFormat,
} from './common.js';

export type {
  CreateBucketOptions,
  UpdateBucketOptions,
  FileOptions,
  UploadBody,
  TransformOptions,
  DownloadOptions,
  FileSearchOptions,
  CopyFileRequest,
  MoveFileRequest,
  SignedUrlOptions,
  SignedUrlsOptions,
  SignedUploadUrlOptions,
  BucketPayload,
  ListFilesPayload,
  MoveFilePayload,
  CopyFilePayload,
  SignUrlPayload,
  SignUrlsPayload,
} from './requests.js';

export {
  BucketSchema,
  BucketListSchema,
  CreateBucketResponseSchema,
  FileMetadataSchema,
  FileObjectSchema,
  FileObjectListSchema,
  UploadResponseSchema,
  KeyResponseSchema,
  MessageResponseSchema,
  SignedUrlResponseSchema,
  SignedUrlsResponseSchema,
  SignedUploadUrlResponseSchema,
  isFolder,
  type Bucket,
  type FileMetadata,
  type FileObject,
  type UploadedObject,
  type SignedUrl,
  type SignedUploadUrl,
  type SignedUploadResult,
} from './responses.js';
