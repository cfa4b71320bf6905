/**
 * Factory functions for creating storage clients
 * @module supabase-storage-client/client/factory
 */

import { StorageClient, type StorageClientOptions } from './client.js';
import { normalizeConfig, type StorageConfig } from '../config/index.js';
import { assertValidHeader } from '../transport/headers.js';

export type ClientDependencies = Pick<StorageClientOptions, 'transport' | 'logger'>;

/**
 * Creates a client from a configuration object, validating it first.
 *
 * @throws {ConfigError} If the URL, key or timeout is invalid
 * @throws {HeaderError} If a default header cannot be sent
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   url: 'https://abc.supabase.co',
 *   apiKey: process.env.SUPABASE_API_KEY ?? '',
 *   timeout: 30000,
 * });
 * ```
 */
export function createClient(
  config: StorageConfig,
  dependencies: ClientDependencies = {}
): StorageClient {
  const normalizedConfig = normalizeConfig(config);

  for (const [name, value] of Object.entries(normalizedConfig.headers)) {
    assertValidHeader(name, value);
  }

  return new StorageClient(normalizedConfig.url, normalizedConfig.apiKey, {
    ...dependencies,
    headers: { ...normalizedConfig.headers },
    timeout: normalizedConfig.timeout,
    logLevel: normalizedConfig.logLevel,
  });
}

/**
 * Creates a client from environment variables:
 * - SUPABASE_URL (required)
 * - SUPABASE_API_KEY (required)
 * - SUPABASE_STORAGE_TIMEOUT_MS (optional)
 * - SUPABASE_STORAGE_LOG_LEVEL (optional)
 *
 * @throws {ConfigError} If required environment variables are missing or invalid
 */
export function createClientFromEnv(dependencies: ClientDependencies = {}): StorageClient {
  return StorageClient.fromEnv(dependencies);
}
