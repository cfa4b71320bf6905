/**
 * Path helpers for storage API resources
 * @module supabase-storage-client/urls/paths
 */

/**
 * Drops leading and trailing slashes and collapses repeated ones.
 *
 * @example
 * ```typescript
 * normalizePath('/folder//a.png/'); // 'folder/a.png'
 * ```
 */
export function normalizePath(path: string): string {
  return path.replace(/^\/+|\/+$/g, '').replace(/\/+/g, '/');
}

/**
 * Encodes an object key for use in URLs, keeping `/` between segments.
 *
 * @example
 * ```typescript
 * encodeKey('reports/q1 summary.pdf'); // 'reports/q1%20summary.pdf'
 * ```
 */
export function encodeKey(key: string): string {
  return normalizePath(key)
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

/**
 * `{bucket}/{key}` with both parts encoded.
 */
export function objectPath(bucketId: string, key: string): string {
  return `${encodeURIComponent(bucketId)}/${encodeKey(key)}`;
}

/**
 * Appends a query string when there is one.
 */
export function withQuery(url: string, params?: URLSearchParams): string {
  const query = params?.toString();
  return query ? `${url}?${query}` : url;
}
