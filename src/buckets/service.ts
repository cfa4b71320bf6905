/**
 * Bucket service implementation
 * @module supabase-storage-client/buckets/service
 */

import type { BucketsService } from './interface.js';
import type { RequestExecutor } from '../client/executor.js';
import { ValidationError } from '../errors/index.js';
import {
  BucketListSchema,
  BucketSchema,
  CreateBucketResponseSchema,
  MessageResponseSchema,
  mimeTypeToString,
  type Bucket,
  type BucketPayload,
  type CreateBucketOptions,
  type MimeType,
  type UpdateBucketOptions,
} from '../types/index.js';

function bucketPath(id: string): string {
  return `/bucket/${encodeURIComponent(id)}`;
}

function buildBucketPayload(
  id: string,
  name: string,
  isPublic: boolean,
  allowedMimeTypes?: MimeType[],
  fileSizeLimit?: number
): BucketPayload {
  return {
    id,
    name,
    public: isPublic,
    ...(allowedMimeTypes && { allowed_mime_types: allowedMimeTypes.map(mimeTypeToString) }),
    ...(fileSizeLimit !== undefined && { file_size_limit: fileSizeLimit }),
  };
}

export class BucketsServiceImpl implements BucketsService {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * @throws {ValidationError} If `name` is empty
   * @throws {StorageApiError} If the server rejects the bucket
   */
  async create(name: string, options: CreateBucketOptions = {}): Promise<string> {
    if (name === '') {
      throw ValidationError.required('name');
    }

    const payload = buildBucketPayload(
      options.id ?? name,
      name,
      options.public ?? false,
      options.allowedMimeTypes,
      options.fileSizeLimit
    );

    const response = await this.executor.json(
      { method: 'POST', path: '/bucket', json: payload },
      CreateBucketResponseSchema
    );
    return response.name;
  }

  async delete(id: string): Promise<void> {
    await this.executor.expectSuccess({ method: 'DELETE', path: bucketPath(id) });
  }

  async get(id: string): Promise<Bucket> {
    return this.executor.json({ method: 'GET', path: bucketPath(id) }, BucketSchema);
  }

  async list(): Promise<Bucket[]> {
    return this.executor.json({ method: 'GET', path: '/bucket' }, BucketListSchema);
  }

  async update(id: string, options: UpdateBucketOptions): Promise<string> {
    // The server requires the name field; a bucket's name is its id.
    const payload = buildBucketPayload(
      id,
      id,
      options.public,
      options.allowedMimeTypes,
      options.fileSizeLimit
    );

    const response = await this.executor.json(
      { method: 'PUT', path: bucketPath(id), json: payload },
      MessageResponseSchema
    );
    return response.message;
  }

  async empty(id: string): Promise<string> {
    const response = await this.executor.json(
      { method: 'POST', path: `${bucketPath(id)}/empty` },
      MessageResponseSchema
    );
    return response.message;
  }
}
