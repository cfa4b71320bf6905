/**
 * Bucket operations
 * @module supabase-storage-client/buckets/interface
 */

import type { Bucket, CreateBucketOptions, UpdateBucketOptions } from '../types/index.js';

export interface BucketsService {
  /**
   * Creates a bucket. Resolves with the created bucket's name.
   */
  create(name: string, options?: CreateBucketOptions): Promise<string>;

  /**
   * Deletes an empty bucket.
   */
  delete(id: string): Promise<void>;

  get(id: string): Promise<Bucket>;

  /**
   * All buckets of the project, in the order the server returns them.
   */
  list(): Promise<Bucket[]>;

  /**
   * Updates a bucket's settings. Resolves with the server's message.
   */
  update(id: string, options: UpdateBucketOptions): Promise<string>;

  /**
   * Removes every object in a bucket. Resolves with the server's message.
   */
  empty(id: string): Promise<string>;
}
