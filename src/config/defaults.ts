/**
 * Default configuration values and protocol constants
 * @module supabase-storage-client/config/defaults
 */

import type { SortBy } from '../types/common.js';

/**
 * Versioned path of the storage API below the project URL.
 */
export const STORAGE_API_PATH = '/storage/v1';

/**
 * Header carrying the API key on every authenticated call.
 */
export const API_KEY_HEADER = 'apikey';

/**
 * Environment variable names read by `createConfigFromEnv`.
 */
export const ENV_VARS = {
  URL: 'SUPABASE_URL',
  API_KEY: 'SUPABASE_API_KEY',
  TIMEOUT_MS: 'SUPABASE_STORAGE_TIMEOUT_MS',
  LOG_LEVEL: 'SUPABASE_STORAGE_LOG_LEVEL',
} as const;

export const DEFAULT_SORT_BY: Readonly<SortBy> = {
  column: 'name',
  order: 'asc',
};

/**
 * Listing defaults applied when a field of FileSearchOptions is omitted.
 */
export const DEFAULT_SEARCH_OPTIONS = {
  limit: 100,
  offset: 0,
  sortBy: DEFAULT_SORT_BY,
} as const;
