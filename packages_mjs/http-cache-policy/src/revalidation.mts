/**
 * Builders for the requests sent to the origin when a cache entry
 * cannot be served
 */

import type { CacheEntry, CacheRequest, HeaderList } from './types.mjs';
import { addHeader, getHeaderValue, removeHeaders, setHeader } from './headers.mjs';
import { mustRevalidate, proxyRevalidate } from './validity.mjs';

const CONDITIONAL_HEADERS = [
  'If-Range',
  'If-Match',
  'If-None-Match',
  'If-Unmodified-Since',
  'If-Modified-Since',
];

/**
 * Conditional request validating `entry` with its ETag and Last-Modified.
 * Entries carrying must-revalidate or proxy-revalidate also get
 * `Cache-Control: max-age=0`.
 */
export function buildConditionalRequest(request: CacheRequest, entry: CacheEntry): CacheRequest {
  let headers: HeaderList = request.headers;

  const etag = getHeaderValue(entry.headers, 'ETag');
  if (etag !== undefined) {
    headers = setHeader(headers, 'If-None-Match', etag);
  }

  const lastModified = getHeaderValue(entry.headers, 'Last-Modified');
  if (lastModified !== undefined) {
    headers = setHeader(headers, 'If-Modified-Since', lastModified);
  }

  if (mustRevalidate(entry) || proxyRevalidate(entry)) {
    headers = addHeader(headers, 'Cache-Control', 'max-age=0');
  }

  return Object.freeze({ ...request, headers });
}

/**
 * Conditional request listing the ETags of every stored variant
 */
export function buildConditionalRequestFromVariants(
  request: CacheRequest,
  variants: readonly CacheEntry[]
): CacheRequest {
  const etags = variants
    .map((variant) => getHeaderValue(variant.headers, 'ETag'))
    .filter((etag): etag is string => etag !== undefined);

  if (etags.length === 0) {
    return request;
  }

  return Object.freeze({
    ...request,
    headers: setHeader(request.headers, 'If-None-Match', etags.join(', ')),
  });
}

/**
 * End-to-end reload: strips every validator and forbids cached answers
 */
export function buildUnconditionalRequest(request: CacheRequest): CacheRequest {
  let headers: HeaderList = request.headers;
  for (const name of CONDITIONAL_HEADERS) {
    headers = removeHeaders(headers, name);
  }
  headers = addHeader(headers, 'Cache-Control', 'no-cache');
  headers = addHeader(headers, 'Pragma', 'no-cache');

  return Object.freeze({ ...request, headers });
}
