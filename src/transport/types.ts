/**
 * HTTP transport type definitions
 */

/**
 * HTTP methods used by the storage API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers, names lower-cased */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: Uint8Array | string;
  /** Forwarded to fetch as `duplex` */
  duplex?: 'half';
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Response body as buffer */
  body: Uint8Array;
}

/**
 * HTTP transport interface
 *
 * Implementations resolve with the response for every status code and reject
 * only when no response could be obtained.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Helper to check if response is successful (2xx status)
 */
export function isSuccessResponse(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}
