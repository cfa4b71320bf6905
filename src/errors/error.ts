/**
 * Base error class for the storage client
 * @module supabase-storage-client/errors/error
 */

/**
 * Parameters for creating a StorageError
 */
export interface StorageErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether a later attempt could succeed
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all storage operations
 *
 * Every failure raised by the client is a StorageError subclass, so callers
 * can branch on `type` or on `instanceof` against the category classes.
 */
export class StorageError extends Error {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether a later attempt could succeed. The client itself never retries.
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(params: StorageErrorParams) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, StorageError.prototype);

    this.name = 'StorageError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StorageError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }

  toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
