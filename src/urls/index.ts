export { normalizePath, encodeKey, objectPath, withQuery } from './paths.js';
export { sanitizeTransform, buildTransformParams, buildDownloadParams } from './transform.js';
export { buildPublicUrl } from './public-url.js';
