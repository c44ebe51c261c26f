/**
 * Construction and revalidation update of immutable cache entries
 */

import type {
  CacheEntry,
  CacheEntryInit,
  CachedHttpResponse,
  CacheRequest,
  HeaderInit,
  HeaderList,
} from './types.mjs';
import { getDateHeader, toHeaderList } from './headers.mjs';
import { CacheEntryError } from './errors.mjs';

function toEpochMs(value: number | Date): number {
  return typeof value === 'number' ? value : value.getTime();
}

function byteLength(body: Buffer | string | null | undefined): number {
  if (!body) return 0;
  return Buffer.isBuffer(body) ? body.length : Buffer.byteLength(body, 'utf8');
}

/**
 * Create a frozen cache entry
 *
 * @throws CacheEntryError when the dates, status or body length are invalid
 */
export function createCacheEntry(init: CacheEntryInit): CacheEntry {
  const requestDate = toEpochMs(init.requestDate);
  const responseDate = toEpochMs(init.responseDate);

  if (!Number.isFinite(requestDate) || !Number.isFinite(responseDate)) {
    throw new CacheEntryError('requestDate and responseDate must be valid times');
  }
  if (responseDate < requestDate) {
    throw new CacheEntryError('responseDate must not be before requestDate');
  }
  if (!Number.isInteger(init.statusCode) || init.statusCode < 100 || init.statusCode > 599) {
    throw new CacheEntryError(`Invalid status code: ${init.statusCode}`);
  }

  const data = init.body ?? null;
  const length = init.bodyLength ?? byteLength(data);
  if (!Number.isInteger(length) || length < 0) {
    throw new CacheEntryError(`Invalid body length: ${length}`);
  }

  return Object.freeze({
    requestDate,
    responseDate,
    statusCode: init.statusCode,
    reasonPhrase: init.reasonPhrase ?? '',
    headers: toHeaderList(init.headers),
    body: Object.freeze({ data, length }),
  });
}

/**
 * Create a frozen request view
 */
export function createCacheRequest(method: string, uri: string, headers?: HeaderInit): CacheRequest {
  return Object.freeze({
    method: method.toUpperCase(),
    uri,
    headers: toHeaderList(headers),
  });
}

/**
 * Produce the entry that replaces `entry` after the origin answered a
 * revalidation with 304 Not Modified
 *
 * @throws CacheEntryError when the response is not a 304
 */
export function updateCacheEntry(
  entry: CacheEntry,
  requestDate: number | Date,
  responseDate: number | Date,
  notModified: Pick<CachedHttpResponse, 'statusCode' | 'headers'>
): CacheEntry {
  if (notModified.statusCode !== 304) {
    throw new CacheEntryError(
      `Response must have 304 status code, got ${notModified.statusCode}`
    );
  }

  return createCacheEntry({
    requestDate,
    responseDate,
    statusCode: entry.statusCode,
    reasonPhrase: entry.reasonPhrase,
    headers: mergeHeaders(entry.headers, notModified.headers),
    body: entry.body.data,
    bodyLength: entry.body.length,
  });
}

/**
 * 304 headers replace stored headers of the same name, unless the stored
 * Date is newer than the 304's
 */
export function mergeHeaders(stored: HeaderList, fresh: HeaderList): HeaderList {
  const storedDate = getDateHeader(stored, 'Date');
  const freshDate = getDateHeader(fresh, 'Date');
  if (storedDate !== undefined && freshDate !== undefined && storedDate > freshDate) {
    return stored;
  }

  const replaced = new Set(fresh.map((h) => h.name.toLowerCase()));
  return Object.freeze([
    ...stored.filter((h) => !replaced.has(h.name.toLowerCase())),
    ...fresh,
  ]);
}
