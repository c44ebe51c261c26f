/**
 * Matching of request validators (If-None-Match, If-Modified-Since)
 * against a cache entry
 */

import type { CacheEntry, CacheRequest } from './types.mjs';
import {
  containsHeader,
  getDateHeader,
  getHeaders,
  getHeaderValue,
  hasValidDateHeader,
  parseHttpDate,
  splitHeaderElements,
} from './headers.mjs';

/**
 * Conditional forms this engine cannot answer from cache
 */
export function hasUnsupportedConditionalHeaders(request: CacheRequest): boolean {
  return (
    containsHeader(request.headers, 'If-Range') ||
    containsHeader(request.headers, 'If-Match') ||
    hasValidDateHeader(request.headers, 'If-Unmodified-Since')
  );
}

export function hasSupportedEtagValidator(request: CacheRequest): boolean {
  return containsHeader(request.headers, 'If-None-Match');
}

export function hasSupportedLastModifiedValidator(request: CacheRequest): boolean {
  return hasValidDateHeader(request.headers, 'If-Modified-Since');
}

/**
 * Does the request carry a validator we support?
 */
export function isConditional(request: CacheRequest): boolean {
  return hasSupportedEtagValidator(request) || hasSupportedLastModifiedValidator(request);
}

/**
 * Compare each If-None-Match element with the entry's ETag.
 * Weak tags are compared as opaque strings; `*` matches any ETag.
 */
export function etagMatches(request: CacheRequest, entry: CacheEntry): boolean {
  const etag = getHeaderValue(entry.headers, 'ETag')?.trim();
  if (etag === undefined) return false;

  for (const header of getHeaders(request.headers, 'If-None-Match')) {
    for (const candidate of splitHeaderElements(header.value)) {
      if (candidate === '*' || candidate === etag) {
        return true;
      }
    }
  }
  return false;
}

/**
 * The entry must not have been modified since any If-Modified-Since date.
 * An unparseable or future-dated If-Modified-Since fails the match.
 */
export function lastModifiedMatches(
  request: CacheRequest,
  entry: CacheEntry,
  now: number
): boolean {
  const lastModified = getDateHeader(entry.headers, 'Last-Modified');
  if (lastModified === undefined) return false;

  for (const header of getHeaders(request.headers, 'If-Modified-Since')) {
    const ifModifiedSince = parseHttpDate(header.value);
    if (ifModifiedSince === undefined) return false;
    if (ifModifiedSince > now || lastModified > ifModifiedSince) return false;
  }
  return true;
}

/**
 * Every validator present on the request must match. Vacuously true for an
 * unconditional request.
 */
export function allConditionalsMatch(
  request: CacheRequest,
  entry: CacheEntry,
  now: number
): boolean {
  const hasEtagValidator = hasSupportedEtagValidator(request);
  const hasLastModifiedValidator = hasSupportedLastModifiedValidator(request);

  if (hasEtagValidator && !etagMatches(request, entry)) {
    return false;
  }
  if (hasLastModifiedValidator && !lastModifiedMatches(request, entry, now)) {
    return false;
  }
  return true;
}
