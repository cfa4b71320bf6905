/**
 * Request execution shared by the storage services
 * @module supabase-storage-client/client/executor
 */

import type { z } from 'zod';
import {
  NetworkError,
  SerializationError,
  StorageApiError,
  isStorageError,
} from '../errors/index.js';
import { logError, logRequest, logResponse, type Logger } from '../observability/index.js';
import { assertValidHeader, mergeHeaders } from '../transport/headers.js';
import {
  isSuccessResponse,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
} from '../transport/types.js';
import { withQuery } from '../urls/paths.js';
import { API_KEY_HEADER } from '../config/defaults.js';

export interface ExecutorContext {
  /** Storage API root, `{url}/storage/v1` */
  endpoint: string;
  apiKey: string;
  /** Client-wide default headers, names lower-cased */
  headers: Readonly<Record<string, string>>;
  transport: HttpTransport;
  logger: Logger;
}

/**
 * A call against the storage API. `json` and `body` are mutually exclusive;
 * `json` adds `content-type: application/json`.
 */
export interface StorageRequest {
  method: HttpMethod;
  /** Path below the API root, starting with `/` and already encoded */
  path: string;
  query?: URLSearchParams;
  headers?: Record<string, string>;
  json?: unknown;
  body?: Uint8Array;
  duplex?: 'half';
}

const decoder = new TextDecoder();

/**
 * Decodes a response body as UTF-8, replacing invalid sequences.
 */
export function decodeText(body: Uint8Array): string {
  return decoder.decode(body);
}

function encodeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (error) {
    throw new SerializationError({
      message: `Failed to encode request body: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }
}

/**
 * Builds, sends and decodes storage API requests.
 */
export class RequestExecutor {
  constructor(private readonly context: ExecutorContext) {}

  get endpoint(): string {
    return this.context.endpoint;
  }

  /**
   * Sends a request and returns the response whatever its status.
   *
   * @throws {SerializationError} If the JSON payload cannot be encoded
   * @throws {HeaderError} If a header name or value cannot be sent
   * @throws {NetworkError} If no response was received
   */
  async send(request: StorageRequest): Promise<HttpResponse> {
    const { method, path } = request;
    const { apiKey, logger } = this.context;

    const callHeaders: Record<string, string> = {
      [API_KEY_HEADER]: apiKey,
      authorization: `Bearer ${apiKey}`,
      ...request.headers,
    };

    let body: Uint8Array | string | undefined = request.body;
    if (request.json !== undefined) {
      body = encodeJson(request.json);
      callHeaders['content-type'] = 'application/json';
    }

    const headers = mergeHeaders(this.context.headers, callHeaders);
    for (const [name, value] of Object.entries(headers)) {
      assertValidHeader(name, value);
    }
    const url = withQuery(`${this.context.endpoint}${path}`, request.query);

    logRequest(logger, method, path);
    const startTime = Date.now();

    let response: HttpResponse;
    try {
      response = await this.context.transport.send({
        method,
        url,
        headers,
        ...(body !== undefined && { body }),
        ...(request.duplex && { duplex: request.duplex }),
      });
    } catch (error) {
      const failure = isStorageError(error)
        ? error
        : NetworkError.connectionFailed(error instanceof Error ? error.message : String(error), error);
      logError(logger, failure, `${method} ${path}`);
      throw failure;
    }

    logResponse(logger, method, path, response.status, Date.now() - startTime);
    return response;
  }

  /**
   * Sends a request and decodes a 2xx JSON body with `schema`.
   *
   * @throws {StorageApiError} On a non-2xx status, or a body that is not JSON
   * or does not match the schema; carries the status and the raw text
   */
  async json<T>(request: StorageRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.send(request);
    const text = decodeText(response.body);

    if (!isSuccessResponse(response)) {
      throw new StorageApiError({ status: response.status, body: text });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new StorageApiError({ status: response.status, body: text });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new StorageApiError({ status: response.status, body: text });
    }
    return result.data;
  }

  /**
   * Sends a request and returns the raw body of a 2xx response.
   *
   * @throws {StorageApiError} On a non-2xx status
   */
  async bytes(request: StorageRequest): Promise<Uint8Array> {
    const response = await this.send(request);
    if (!isSuccessResponse(response)) {
      throw new StorageApiError({ status: response.status, body: decodeText(response.body) });
    }
    return response.body;
  }

  /**
   * Sends a request whose success body is ignored.
   *
   * @throws {StorageApiError} On a non-2xx status
   */
  async expectSuccess(request: StorageRequest): Promise<void> {
    await this.bytes(request);
  }
}
