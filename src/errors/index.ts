/**
 * Error system for the storage client
 * @module supabase-storage-client/errors
 */

import { StorageError } from './error.js';
import { StorageApiError } from './categories.js';

export { StorageError, type StorageErrorParams } from './error.js';

export {
  ConfigError,
  HeaderError,
  SerializationError,
  NetworkError,
  StorageApiError,
  ValidationError,
  type StorageApiErrorParams,
} from './categories.js';

/**
 * Type guard for errors raised by this client
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type guard for service errors (non-2xx or non-conforming body)
 */
export function isStorageApiError(error: unknown): error is StorageApiError {
  return error instanceof StorageApiError;
}
