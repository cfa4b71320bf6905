/**
 * Configuration type definitions for the storage client
 * @module supabase-storage-client/config/types
 */

import type { LogLevel } from '../observability/index.js';

/**
 * Core storage configuration parameters.
 */
export interface StorageConfig {
  /**
   * Project URL, e.g. `https://<project-ref>.supabase.co`.
   * The storage API lives under `{url}/storage/v1`.
   */
  url: string;

  /**
   * API key. Sent both as the `apikey` header and as a bearer token.
   *
   * A service-role key bypasses row level security; never ship it to clients.
   */
  apiKey: string;

  /**
   * Request timeout in milliseconds. No timeout when omitted.
   */
  timeout?: number;

  /**
   * Writes request logs through a `ConsoleLogger` at this level. Nothing is
   * logged when omitted.
   */
  logLevel?: LogLevel;

  /**
   * Headers sent with every request unless a call sets the same header.
   */
  headers?: Record<string, string>;
}

/**
 * Configuration with the endpoint resolved and header names lower-cased.
 */
export interface NormalizedStorageConfig {
  /** Project URL without a trailing slash */
  url: string;

  /** Storage API root: `{url}/storage/v1` */
  endpoint: string;

  apiKey: string;

  timeout?: number;

  logLevel?: LogLevel;

  headers: Readonly<Record<string, string>>;
}
