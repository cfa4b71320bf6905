/**
 * Configuration validation and normalization
 * @module supabase-storage-client/config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { LOG_LEVELS } from '../observability/index.js';
import type { StorageConfig, NormalizedStorageConfig } from './types.js';
import { STORAGE_API_PATH } from './defaults.js';

const StorageConfigSchema = z.object({
  url: z
    .string({ required_error: 'url is required' })
    .min(1, 'url is required')
    .url('url must be a valid URL')
    .refine((value) => /^https?:\/\//i.test(value), 'url must use http or https protocol'),
  apiKey: z.string({ required_error: 'apiKey is required' }).min(1, 'apiKey is required'),
  timeout: z.number().int().positive('timeout must be a positive integer').optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  headers: z.record(z.string()).optional(),
});

/**
 * Validates storage configuration.
 *
 * @throws {ConfigError} If a field is missing or malformed; `details.paramName`
 * names the first offending field.
 */
export function validateConfig(config: Partial<StorageConfig>): StorageConfig {
  const result = StorageConfigSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const paramName = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw ConfigError.invalidConfig(paramName, issue?.message);
  }
  return result.data;
}

/**
 * Resolves the endpoint and lower-cases header names. Performs no validation,
 * so it is safe to call from constructors.
 */
export function resolveConfig(config: StorageConfig): NormalizedStorageConfig {
  const url = config.url.replace(/\/+$/, '');
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }

  return {
    url,
    endpoint: `${url}${STORAGE_API_PATH}`,
    apiKey: config.apiKey,
    timeout: config.timeout,
    logLevel: config.logLevel,
    headers,
  };
}

/**
 * Validates, then resolves, a configuration.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: Partial<StorageConfig>): NormalizedStorageConfig {
  return resolveConfig(validateConfig(config));
}
