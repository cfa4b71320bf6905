/**
 * Object service implementation
 * @module supabase-storage-client/objects/service
 */

import type { ObjectsService } from './interface.js';
import type { RequestExecutor } from '../client/executor.js';
import { DEFAULT_SEARCH_OPTIONS } from '../config/defaults.js';
import {
  FileObjectListSchema,
  KeyResponseSchema,
  MessageResponseSchema,
  UploadResponseSchema,
  type CopyFileRequest,
  type CopyFilePayload,
  type DownloadOptions,
  type FileObject,
  type FileOptions,
  type FileSearchOptions,
  type ListFilesPayload,
  type MoveFileRequest,
  type MoveFilePayload,
  type UploadBody,
  type UploadedObject,
} from '../types/index.js';
import { objectPath } from '../urls/paths.js';
import { buildTransformParams } from '../urls/transform.js';
import { buildFileHeaders, toBytes } from './utils.js';

/**
 * Object operations under `/object`.
 *
 * @example
 * ```typescript
 * const uploaded = await objects.upload('avatars', 'users/42.png', bytes, {
 *   contentType: 'image/png',
 *   upsert: true,
 * });
 * uploaded.key; // 'avatars/users/42.png'
 * ```
 */
export class ObjectsServiceImpl implements ObjectsService {
  constructor(private readonly executor: RequestExecutor) {}

  async upload(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject> {
    return this.uploadOrUpdate('POST', bucketId, path, body, options);
  }

  async update(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject> {
    return this.uploadOrUpdate('PUT', bucketId, path, body, options);
  }

  async replace(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject> {
    return this.uploadOrUpdate('PUT', bucketId, path, body, options);
  }

  async download(bucketId: string, path: string, options?: DownloadOptions): Promise<Uint8Array> {
    if (options?.transform) {
      return this.executor.bytes({
        method: 'GET',
        path: `/render/image/authenticated/${objectPath(bucketId, path)}`,
        query: buildTransformParams(options.transform),
      });
    }

    return this.executor.bytes({ method: 'GET', path: `/object/${objectPath(bucketId, path)}` });
  }

  async delete(bucketId: string, path: string): Promise<string> {
    const response = await this.executor.json(
      { method: 'DELETE', path: `/object/${objectPath(bucketId, path)}` },
      MessageResponseSchema
    );
    return response.message;
  }

  async list(
    bucketId: string,
    path?: string,
    options: FileSearchOptions = {}
  ): Promise<FileObject[]> {
    const payload: ListFilesPayload = {
      prefix: path ?? '',
      limit: options.limit ?? DEFAULT_SEARCH_OPTIONS.limit,
      offset: options.offset ?? DEFAULT_SEARCH_OPTIONS.offset,
      sortBy: options.sortBy ?? { ...DEFAULT_SEARCH_OPTIONS.sortBy },
      ...(options.search !== undefined && { search: options.search }),
    };

    return this.executor.json(
      { method: 'POST', path: `/object/list/${encodeURIComponent(bucketId)}`, json: payload },
      FileObjectListSchema
    );
  }

  async copy(request: CopyFileRequest): Promise<string> {
    const payload: CopyFilePayload = {
      bucketId: request.fromBucket,
      sourceKey: request.fromPath,
      destinationBucket: request.toBucket ?? request.fromBucket,
      destinationKey: request.toPath ?? request.fromPath,
      copyMetadata: request.copyMetadata ?? false,
    };

    const response = await this.executor.json(
      { method: 'POST', path: '/object/copy', json: payload },
      KeyResponseSchema
    );
    return response.Key;
  }

  async move(request: MoveFileRequest): Promise<string> {
    const payload: MoveFilePayload = {
      bucketId: request.fromBucket,
      sourceKey: request.fromPath,
      destinationBucket: request.toBucket ?? request.fromBucket,
      destinationKey: request.toPath,
    };

    const response = await this.executor.json(
      { method: 'POST', path: '/object/move', json: payload },
      MessageResponseSchema
    );
    return response.message;
  }

  private async uploadOrUpdate(
    method: 'POST' | 'PUT',
    bucketId: string,
    path: string,
    body: UploadBody,
    options: FileOptions = {}
  ): Promise<UploadedObject> {
    return this.executor.json(
      {
        method,
        path: `/object/${objectPath(bucketId, path)}`,
        headers: buildFileHeaders(options),
        body: toBytes(body),
        ...(options.duplex && { duplex: options.duplex }),
      },
      UploadResponseSchema
    );
  }
}
