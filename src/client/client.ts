/**
 * Storage client implementation
 * @module supabase-storage-client/client/client
 */

import { RequestExecutor } from './executor.js';
import { BucketsServiceImpl } from '../buckets/service.js';
import { ObjectsServiceImpl } from '../objects/service.js';
import { PresignServiceImpl } from '../presign/service.js';
import { createConfigFromEnv, resolveConfig, type NormalizedStorageConfig } from '../config/index.js';
import { ConsoleLogger, NoopLogger, type Logger, type LogLevel } from '../observability/index.js';
import { assertValidHeader } from '../transport/headers.js';
import { createFetchTransport, type HttpTransport } from '../transport/index.js';
import { buildPublicUrl } from '../urls/public-url.js';
import type {
  Bucket,
  CopyFileRequest,
  CreateBucketOptions,
  DownloadOptions,
  FileObject,
  FileOptions,
  FileSearchOptions,
  MoveFileRequest,
  SignedUploadResult,
  SignedUploadUrl,
  SignedUploadUrlOptions,
  SignedUrl,
  SignedUrlOptions,
  SignedUrlsOptions,
  UpdateBucketOptions,
  UploadBody,
  UploadedObject,
} from '../types/index.js';

export interface StorageClientOptions {
  /** Headers sent with every request unless a call sets the same header */
  headers?: Record<string, string>;
  /** Defaults to a fetch transport */
  transport?: HttpTransport;
  /**
   * Defaults to a `ConsoleLogger` at `logLevel` when that is set, otherwise
   * to a logger that discards everything
   */
  logger?: Logger;
  logLevel?: LogLevel;
  /** Request timeout in milliseconds for the default transport */
  timeout?: number;
}

/**
 * Client for the storage API of one project.
 *
 * Instances are immutable and safe to share; `withHeader` returns a new
 * client that reuses the same transport.
 *
 * @example
 * ```typescript
 * const client = new StorageClient('https://abc.supabase.co', process.env.SUPABASE_API_KEY ?? '');
 *
 * await client.createBucket('avatars', { public: true, allowedMimeTypes: ['png', 'jpeg'] });
 * await client.uploadFile('avatars', 'users/42.png', bytes, { contentType: 'image/png' });
 * const url = client.getPublicUrl('avatars', 'users/42.png', { transform: { width: 64 } });
 * ```
 */
export class StorageClient {
  private readonly config: NormalizedStorageConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly buckets: BucketsServiceImpl;
  private readonly objects: ObjectsServiceImpl;
  private readonly presign: PresignServiceImpl;

  /**
   * Never throws. Use `createClient` to validate the URL and key first.
   *
   * @param url - Project URL, e.g. `https://<project-ref>.supabase.co`
   */
  constructor(url: string, apiKey: string, options: StorageClientOptions = {}) {
    this.config = resolveConfig({
      url,
      apiKey,
      timeout: options.timeout,
      logLevel: options.logLevel,
      headers: options.headers,
    });
    this.transport = options.transport ?? createFetchTransport(options.timeout);
    this.logger =
      options.logger ??
      (options.logLevel ? new ConsoleLogger({ level: options.logLevel }) : new NoopLogger());

    const executor = new RequestExecutor({
      endpoint: this.config.endpoint,
      apiKey: this.config.apiKey,
      headers: this.config.headers,
      transport: this.transport,
      logger: this.logger,
    });

    this.buckets = new BucketsServiceImpl(executor);
    this.objects = new ObjectsServiceImpl(executor);
    this.presign = new PresignServiceImpl(executor);
  }

  /**
   * Creates a client from `SUPABASE_URL`, `SUPABASE_API_KEY` and the optional
   * `SUPABASE_STORAGE_TIMEOUT_MS` and `SUPABASE_STORAGE_LOG_LEVEL`.
   *
   * @throws {ConfigError} If a required variable is missing or a value is invalid
   */
  static fromEnv(
    options: Omit<StorageClientOptions, 'timeout' | 'logLevel'> = {}
  ): StorageClient {
    const config = createConfigFromEnv();
    return new StorageClient(config.url, config.apiKey, {
      ...options,
      timeout: config.timeout,
      logLevel: config.logLevel,
    });
  }

  /** Project URL without a trailing slash */
  get url(): string {
    return this.config.url;
  }

  /** Storage API root, `{url}/storage/v1` */
  get endpoint(): string {
    return this.config.endpoint;
  }

  /** Copy of the default headers */
  get headers(): Record<string, string> {
    return { ...this.config.headers };
  }

  /**
   * Returns a client that sends `name: value` with every request, replacing
   * an existing default of the same name.
   *
   * @throws {HeaderError} If the name or value cannot be sent as a header
   */
  withHeader(name: string, value: string): StorageClient {
    assertValidHeader(name, value);
    return new StorageClient(this.config.url, this.config.apiKey, {
      headers: { ...this.config.headers, [name.toLowerCase()]: value },
      transport: this.transport,
      logger: this.logger,
      timeout: this.config.timeout,
    });
  }

  // ==========================================================================
  // Buckets
  // ==========================================================================

  /**
   * @returns Name of the created bucket
   * @throws {ValidationError} If `name` is empty
   */
  createBucket(name: string, options?: CreateBucketOptions): Promise<string> {
    return this.buckets.create(name, options);
  }

  deleteBucket(id: string): Promise<void> {
    return this.buckets.delete(id);
  }

  getBucket(id: string): Promise<Bucket> {
    return this.buckets.get(id);
  }

  listBuckets(): Promise<Bucket[]> {
    return this.buckets.list();
  }

  updateBucket(id: string, options: UpdateBucketOptions): Promise<string> {
    return this.buckets.update(id, options);
  }

  emptyBucket(id: string): Promise<string> {
    return this.buckets.empty(id);
  }

  // ==========================================================================
  // Objects
  // ==========================================================================

  uploadFile(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject> {
    return this.objects.upload(bucketId, path, body, options);
  }

  updateFile(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject> {
    return this.objects.update(bucketId, path, body, options);
  }

  replaceFile(
    bucketId: string,
    path: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<UploadedObject> {
    return this.objects.replace(bucketId, path, body, options);
  }

  downloadFile(bucketId: string, path: string, options?: DownloadOptions): Promise<Uint8Array> {
    return this.objects.download(bucketId, path, options);
  }

  deleteFile(bucketId: string, path: string): Promise<string> {
    return this.objects.delete(bucketId, path);
  }

  listFiles(bucketId: string, path?: string, options?: FileSearchOptions): Promise<FileObject[]> {
    return this.objects.list(bucketId, path, options);
  }

  copyFile(request: CopyFileRequest): Promise<string> {
    return this.objects.copy(request);
  }

  moveFile(request: MoveFileRequest): Promise<string> {
    return this.objects.move(request);
  }

  // ==========================================================================
  // Signed and public URLs
  // ==========================================================================

  createSignedUrl(
    bucketId: string,
    path: string,
    expiresIn: number,
    options?: SignedUrlOptions
  ): Promise<string> {
    return this.presign.createSignedUrl(bucketId, path, expiresIn, options);
  }

  createSignedUrls(
    bucketId: string,
    paths: string[],
    expiresIn: number,
    options?: SignedUrlsOptions
  ): Promise<SignedUrl[]> {
    return this.presign.createSignedUrls(bucketId, paths, expiresIn, options);
  }

  createSignedUploadUrl(
    bucketId: string,
    path: string,
    options?: SignedUploadUrlOptions
  ): Promise<SignedUploadUrl> {
    return this.presign.createSignedUploadUrl(bucketId, path, options);
  }

  uploadToSignedUrl(
    bucketId: string,
    path: string,
    token: string,
    body: UploadBody,
    options?: FileOptions
  ): Promise<SignedUploadResult> {
    return this.presign.uploadToSignedUrl(bucketId, path, token, body, options);
  }

  /**
   * Public URL of an object in a public bucket. Makes no request.
   */
  getPublicUrl(bucketId: string, path: string, options?: DownloadOptions): string {
    return buildPublicUrl(this.config.endpoint, bucketId, path, options);
  }
}
