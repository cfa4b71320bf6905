/**
 * Client module: the storage client, its factories and request executor
 * @module supabase-storage-client/client
 */

export { StorageClient, type StorageClientOptions } from './client.js';
export { createClient, createClientFromEnv, type ClientDependencies } from './factory.js';
export {
  RequestExecutor,
  decodeText,
  type ExecutorContext,
  type StorageRequest,
} from './executor.js';
