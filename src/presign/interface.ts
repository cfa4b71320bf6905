/**
 * Signed URL operations
 * @module supabase-storage-client/presign/interface
 */

import type {
  FileOptions,
  SignedUploadResult,
  SignedUploadUrl,
  SignedUploadUrlOptions,
  SignedUrl,
  SignedUrlOptions,
  SignedUrlsOptions,
  UploadBody,
} from '../types/index.js';

export interface PresignService {
  /**
   * Signs a download URL valid for `expiresIn` seconds. Resolves with an
   * absolute URL.
   */
  createSignedUrl(
    bucketId: string,
    path: string,
    expiresIn: number,
    options?: SignedUrlOptions
  ): Promise<string>;

  /**
   * Signs several download URLs in one request.
   */
  createSignedUrls(
    bucketId: string,
    paths: string[],
    expiresIn: number,
    options?: SignedUrlsOptions
  ): Promise<SignedUrl[]>;

  /**
   * Signs an upload URL. The token is valid for two hours.
   */
  createSignedUploadUrl(
    bucketId: string,
    path: string,
    options?: SignedUploadUrlOptions
  ): Promise<SignedUploadUrl>;

  /**
   * Uploads to a URL signed by `createSignedUploadUrl`.
   */
  uploadToSignedUrl(
    bucketId: string,
    path: string,
    token: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<SignedUploadResult>;
}
