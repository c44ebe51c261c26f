/**
 * Builds outgoing responses from cache entries
 */

import type { CacheEntry, CachedHttpResponse, HeaderList, HttpHeader } from './types.mjs';
import {
  containsHeader,
  formatHttpDate,
  getFirstHeader,
  getHeaders,
  setHeader,
} from './headers.mjs';
import { getCurrentAgeSecs, MAX_AGE_SECS } from './validity.mjs';

/**
 * Largest age written as-is; anything at or above it is sent as MAX_AGE_SECS
 */
const MAX_INT32 = 2147483647;

/**
 * Full response replaying the stored status, headers and body, with a
 * computed Age and a Content-Length when no framing header is stored
 */
export function generateFullResponse(entry: CacheEntry, now: number): CachedHttpResponse {
  let headers: HeaderList = entry.headers;

  if (
    !containsHeader(headers, 'Transfer-Encoding') &&
    !containsHeader(headers, 'Content-Length')
  ) {
    headers = setHeader(headers, 'Content-Length', String(entry.body.length));
  }

  const age = getCurrentAgeSecs(entry, now);
  if (age > 0) {
    headers = setHeader(headers, 'Age', age >= MAX_INT32 ? String(MAX_AGE_SECS) : String(age));
  }

  return Object.freeze({
    statusCode: entry.statusCode,
    reasonPhrase: entry.reasonPhrase,
    headers: Object.freeze([...headers]),
    body: entry.body,
  });
}

/**
 * 304 Not Modified carrying only Date, ETag, Content-Location, Expires,
 * Cache-Control and Vary
 */
export function generateNotModifiedResponse(entry: CacheEntry, now: number): CachedHttpResponse {
  const headers: HttpHeader[] = [];

  headers.push(
    getFirstHeader(entry.headers, 'Date') ??
      Object.freeze({ name: 'Date', value: formatHttpDate(now) })
  );

  for (const name of ['ETag', 'Content-Location', 'Expires']) {
    const header = getFirstHeader(entry.headers, name);
    if (header) headers.push(header);
  }

  // list-valued fields may legally repeat
  for (const name of ['Cache-Control', 'Vary']) {
    headers.push(...getHeaders(entry.headers, name));
  }

  return Object.freeze({
    statusCode: 304,
    reasonPhrase: 'Not Modified',
    headers: Object.freeze(headers),
    body: null,
  });
}
