/**
 * Typed client for the Supabase Storage API
 *
 * Bucket and object management, signed download and upload URLs, public URLs
 * and image transformation parameters, over `{project-url}/storage/v1`.
 *
 * @module supabase-storage-client
 *
 * @example
 * ```typescript
 * import { createClientFromEnv, isStorageApiError } from 'supabase-storage-client';
 *
 * const client = createClientFromEnv();
 *
 * try {
 *   await client.uploadFile('docs', 'hello.txt', 'Hello, world!', {
 *     contentType: 'text/plain',
 *     upsert: true,
 *   });
 *   const signed = await client.createSignedUrl('docs', 'hello.txt', 60);
 * } catch (error) {
 *   if (isStorageApiError(error)) {
 *     console.error(error.status, error.message);
 *   }
 *   throw error;
 * }
 * ```
 */

// ============================================================================
// Client
// ============================================================================

export {
  StorageClient,
  createClient,
  createClientFromEnv,
  RequestExecutor,
  type StorageClientOptions,
  type ClientDependencies,
  type ExecutorContext,
  type StorageRequest,
} from './client/index.js';

// ============================================================================
// Services
// ============================================================================

export { BucketsServiceImpl, type BucketsService } from './buckets/index.js';
export { ObjectsServiceImpl, type ObjectsService } from './objects/index.js';
export { PresignServiceImpl, type PresignService } from './presign/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  STORAGE_API_PATH,
  API_KEY_HEADER,
  ENV_VARS,
  DEFAULT_SEARCH_OPTIONS,
  validateConfig,
  normalizeConfig,
  createConfigFromEnv,
  type StorageConfig,
  type NormalizedStorageConfig,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  StorageError,
  ConfigError,
  HeaderError,
  SerializationError,
  NetworkError,
  StorageApiError,
  ValidationError,
  isStorageError,
  isStorageApiError,
  type StorageErrorParams,
} from './errors/index.js';

// ============================================================================
// Transport and logging
// ============================================================================

export {
  FetchTransport,
  createFetchTransport,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './transport/index.js';

export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LogContext,
  type ConsoleLoggerOptions,
} from './observability/index.js';

// ============================================================================
// URLs and types
// ============================================================================

export { buildPublicUrl, buildTransformParams, encodeKey } from './urls/index.js';

export * from './types/index.js';
