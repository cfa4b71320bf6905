/**
 * Error categories for the storage client
 * @module supabase-storage-client/errors/categories
 */

import { StorageError, type StorageErrorParams } from './error.js';

type CategoryParams = Omit<StorageErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Configuration errors: missing or unreadable environment variables,
 * malformed URLs, invalid numeric settings.
 */
export class ConfigError extends StorageError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'config_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Required environment variable is not set or empty
   */
  static missingEnvVar(name: string): ConfigError {
    return new ConfigError({
      message: `Environment variable ${name} is required but not set`,
      code: 'MISSING_ENV_VAR',
      details: { variable: name },
    });
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }
}

/**
 * A header name or value that cannot be sent over HTTP.
 */
export class HeaderError extends StorageError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'header_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'HeaderError';
    Object.setPrototypeOf(this, HeaderError.prototype);
  }

  static invalidName(name: string): HeaderError {
    return new HeaderError({
      message: `Invalid header name: ${JSON.stringify(name)}`,
      code: 'INVALID_HEADER_NAME',
      details: { name },
    });
  }

  static invalidValue(name: string): HeaderError {
    // The value itself is left out: it may be a credential.
    return new HeaderError({
      message: `Invalid value for header ${name}`,
      code: 'INVALID_HEADER_VALUE',
      details: { name },
    });
  }
}

/**
 * A request payload that cannot be encoded.
 */
export class SerializationError extends StorageError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'serialization_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'SerializationError';
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * The request could not be sent or its response could not be read.
 */
export class NetworkError extends StorageError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'network_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static timeout(timeoutMs: number, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs },
      cause,
    });
  }

  static connectionFailed(message: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `Connection failed: ${message}`,
      code: 'CONNECTION_FAILED',
      cause,
    });
  }
}

/**
 * Parameters for a service error
 */
export interface StorageApiErrorParams {
  /** HTTP status of the response */
  readonly status: number;
  /** Response body, verbatim */
  readonly body: string;
}

/**
 * The storage service answered with a non-2xx status, or with a body that
 * does not match the expected success shape.
 *
 * `message` is the raw response text and `status` the actual HTTP status.
 */
export class StorageApiError extends StorageError {
  /**
   * HTTP status code of the response
   */
  declare readonly status: number;

  constructor(params: StorageApiErrorParams) {
    super({
      message: params.body,
      status: params.status,
      code: extractErrorCode(params.body),
      isRetryable: params.status === 429 || params.status >= 500,
      type: 'api_error',
    });
    this.name = 'StorageApiError';
    Object.setPrototypeOf(this, StorageApiError.prototype);
  }
}

/**
 * Input rejected before any request is made.
 */
export class ValidationError extends StorageError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'validation_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static required(field: string): ValidationError {
    return new ValidationError({
      message: `${field} must not be empty`,
      code: 'REQUIRED',
      details: { field },
    });
  }
}

/**
 * Reads the `error` field of a JSON error body, if there is one.
 */
function extractErrorCode(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
    const { error } = parsed;
    return typeof error === 'string' ? error : undefined;
  }
  return undefined;
}
