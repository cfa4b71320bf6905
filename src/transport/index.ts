/**
 * HTTP transport layer
 */

export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from './types.js';
export { isSuccessResponse } from './types.js';

export {
  FetchTransport,
  createFetchTransport,
  type FetchTransportOptions,
} from './fetch-transport.js';

export {
  isValidHeaderName,
  isValidHeaderValue,
  assertValidHeader,
  mergeHeaders,
} from './headers.js';
