/**
 * Fetch-based HTTP transport implementation
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { NetworkError } from '../errors/index.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds; none when omitted */
  timeout?: number;
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Uses the runtime's `fetch`. Connection reuse is left to it. Bodies are
 * buffered in full.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions = {}) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const { timeout } = this.options;
    const controller = new AbortController();
    const timeoutId =
      timeout !== undefined ? setTimeout(() => controller.abort(), timeout) : undefined;

    try {
      const response = await fetch(request.url, this.buildInit(request, controller.signal));
      const body = new Uint8Array(await response.arrayBuffer());

      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw this.handleError(error);
    } finally {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
    }
  }

  private buildInit(request: HttpRequest, signal: AbortSignal): RequestInit {
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      signal,
    };

    if (request.body !== undefined) {
      init.body = request.body;
    }

    if (request.duplex) {
      init.duplex = request.duplex;
    }

    return init;
  }

  /**
   * Converts Headers object to plain object
   */
  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  private handleError(error: unknown): NetworkError {
    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return NetworkError.timeout(this.options.timeout ?? 0, error);
      }

      // fetch reports DNS and socket failures as a TypeError with the
      // underlying error as its cause.
      const cause = error.cause instanceof Error ? error.cause : undefined;
      return NetworkError.connectionFailed(cause?.message ?? error.message, error);
    }

    return NetworkError.connectionFailed(String(error), error);
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout?: number): HttpTransport {
  return new FetchTransport({ timeout });
}
