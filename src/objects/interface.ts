/**
 * Object operations
 * @module supabase-storage-client/objects/interface
 */

import type {
  CopyFileRequest,
  DownloadOptions,
  FileObject,
  FileOptions,
  FileSearchOptions,
  MoveFileRequest,
  UploadBody,
  UploadedObject,
} from '../types/index.js';

export interface ObjectsService {
  /**
   * Uploads a new object. Fails if one exists at the path unless `upsert` is set.
   */
  upload(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject>;

  /**
   * Overwrites an existing object.
   */
  update(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject>;

  /**
   * Same request as `update`.
   */
  replace(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject>;

  /**
   * Downloads an object, rendered through the image transformer when
   * `options.transform` is set.
   */
  download(bucketId: string, path: string, options?: DownloadOptions): Promise<Uint8Array>;

  /**
   * Deletes an object. Resolves with the server's message.
   */
  delete(bucketId: string, path: string): Promise<string>;

  /**
   * Lists the objects and folders directly below `path`.
   */
  list(bucketId: string, path?: string, options?: FileSearchOptions): Promise<FileObject[]>;

  /**
   * Copies an object. Resolves with the new object's key, prefixed with its bucket.
   */
  copy(request: CopyFileRequest): Promise<string>;

  /**
   * Moves an object. Resolves with the server's message.
   */
  move(request: MoveFileRequest): Promise<string>;
}
