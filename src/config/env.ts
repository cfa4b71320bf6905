/**
 * Environment variable configuration loading
 * @module supabase-storage-client/config/env
 */

import { ConfigError } from '../errors/index.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../observability/index.js';
import type { NormalizedStorageConfig } from './types.js';
import { ENV_VARS } from './defaults.js';
import { normalizeConfig } from './validation.js';

/**
 * Parses a positive integer from an environment variable.
 *
 * @returns Parsed integer or undefined if value is empty
 * @throws {ConfigError} If value is not a base-10 integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  if (!/^\d+$/.test(value.trim())) {
    throw ConfigError.invalidConfig(name, `${name} must be a valid integer, got: ${value}`);
  }

  return parseInt(value, 10);
}

function parseLogLevelEnv(value: string | undefined, name: string): LogLevel | undefined {
  const level = value?.trim().toLowerCase();
  if (!level) {
    return undefined;
  }
  if (!isLogLevel(level)) {
    throw ConfigError.invalidConfig(
      name,
      `${name} must be one of ${LOG_LEVELS.join(', ')}, got: ${value}`
    );
  }
  return level;
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    throw ConfigError.missingEnvVar(name);
  }
  return value;
}

/**
 * Creates storage configuration from environment variables.
 *
 * Environment variables:
 * - SUPABASE_URL (required): project URL
 * - SUPABASE_API_KEY (required): API key
 * - SUPABASE_STORAGE_TIMEOUT_MS (optional): request timeout in milliseconds
 * - SUPABASE_STORAGE_LOG_LEVEL (optional): trace, debug, info, warn or error
 *
 * @param env - Variables to read, `process.env` by default
 * @throws {ConfigError} If required environment variables are missing or invalid
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): NormalizedStorageConfig {
  return normalizeConfig({
    url: requireEnv(env, ENV_VARS.URL),
    apiKey: requireEnv(env, ENV_VARS.API_KEY),
    timeout: parseIntEnv(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS),
    logLevel: parseLogLevelEnv(env[ENV_VARS.LOG_LEVEL], ENV_VARS.LOG_LEVEL),
  });
}
