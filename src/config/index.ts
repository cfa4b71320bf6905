/**
 * Configuration for the storage client
 * @module supabase-storage-client/config
 */

export type { StorageConfig, NormalizedStorageConfig } from './types.js';

export {
  STORAGE_API_PATH,
  API_KEY_HEADER,
  ENV_VARS,
  DEFAULT_SORT_BY,
  DEFAULT_SEARCH_OPTIONS,
} from './defaults.js';

export { validateConfig, resolveConfig, normalizeConfig } from './validation.js';

export { createConfigFromEnv } from './env.js';
