/**
 * Age, freshness and staleness of cache entries (RFC 7234 section 4.2).
 *
 * Every function is pure: the reference time is always passed in, and all
 * results are whole, non-negative seconds.
 */

import type { CacheEntry, CacheRequest, Directive } from './types.mjs';
import { getDateHeader, getHeaders, getHeaderValue, containsHeader } from './headers.mjs';
import {
  getCacheControlDirectives,
  getMinimumDirectiveSeconds,
  hasDirective,
  findDirectives,
  parseDirectiveInteger,
} from './directives.mjs';
import { DEFAULT_CACHE_CONFIG } from './config.mjs';

/**
 * Age reported when an Age header cannot be trusted
 */
export const MAX_AGE_SECS = 2147483648;

function toSecs(ms: number): number {
  return Math.max(0, Math.trunc(ms / 1000));
}

/**
 * responseDate minus the Date header, or 0 without a usable Date
 */
export function getApparentAgeSecs(entry: CacheEntry): number {
  const date = getDateHeader(entry.headers, 'Date');
  if (date === undefined) return 0;
  return toSecs(entry.responseDate - date);
}

/**
 * Largest Age header value. Malformed or negative values fail closed.
 */
export function getAgeValue(entry: CacheEntry): number {
  let ageValue = 0;
  for (const header of getHeaders(entry.headers, 'Age')) {
    const trimmed = header.value.trim();
    const age = /^\d+$/.test(trimmed) ? Number(trimmed) : MAX_AGE_SECS;
    ageValue = Math.max(ageValue, age);
  }
  return ageValue;
}

export function getResponseDelaySecs(entry: CacheEntry): number {
  return toSecs(entry.responseDate - entry.requestDate);
}

export function getCorrectedInitialAgeSecs(entry: CacheEntry): number {
  const correctedAgeValue = getAgeValue(entry) + getResponseDelaySecs(entry);
  return Math.max(getApparentAgeSecs(entry), correctedAgeValue);
}

export function getResidentTimeSecs(entry: CacheEntry, now: number): number {
  return toSecs(now - entry.responseDate);
}

export function getCurrentAgeSecs(entry: CacheEntry, now: number): number {
  return getCorrectedInitialAgeSecs(entry) + getResidentTimeSecs(entry, now);
}

/**
 * Explicit freshness lifetime: s-maxage (shared caches only), then max-age,
 * then Expires - Date, else 0
 */
export function getFreshnessLifetimeSecs(
  entry: CacheEntry,
  sharedCache: boolean = DEFAULT_CACHE_CONFIG.sharedCache
): number {
  const directives = getCacheControlDirectives(entry.headers);

  if (sharedCache) {
    const sMaxAge = getMinimumDirectiveSeconds(directives, 's-maxage');
    if (sMaxAge !== undefined) return sMaxAge;
  }

  const maxAge = getMinimumDirectiveSeconds(directives, 'max-age');
  if (maxAge !== undefined) return maxAge;

  const date = getDateHeader(entry.headers, 'Date');
  const expires = getDateHeader(entry.headers, 'Expires');
  if (date !== undefined && expires !== undefined) {
    return toSecs(expires - date);
  }

  return 0;
}

export function isResponseFresh(
  entry: CacheEntry,
  now: number,
  sharedCache: boolean = DEFAULT_CACHE_CONFIG.sharedCache
): boolean {
  return getCurrentAgeSecs(entry, now) < getFreshnessLifetimeSecs(entry, sharedCache);
}

/**
 * coefficient * (Date - Last-Modified) when both dates parse, else the default
 */
export function getHeuristicFreshnessLifetimeSecs(
  entry: CacheEntry,
  coefficient: number,
  defaultLifetimeSecs: number
): number {
  const date = getDateHeader(entry.headers, 'Date');
  const lastModified = getDateHeader(entry.headers, 'Last-Modified');

  if (date !== undefined && lastModified !== undefined) {
    return Math.trunc(coefficient * toSecs(date - lastModified));
  }

  return defaultLifetimeSecs;
}

export function isResponseHeuristicallyFresh(
  entry: CacheEntry,
  now: number,
  coefficient: number,
  defaultLifetimeSecs: number
): boolean {
  return (
    getCurrentAgeSecs(entry, now) <
    getHeuristicFreshnessLifetimeSecs(entry, coefficient, defaultLifetimeSecs)
  );
}

export function getStalenessSecs(
  entry: CacheEntry,
  now: number,
  sharedCache: boolean = DEFAULT_CACHE_CONFIG.sharedCache
): number {
  return Math.max(0, getCurrentAgeSecs(entry, now) - getFreshnessLifetimeSecs(entry, sharedCache));
}

export function hasCacheControlDirective(entry: CacheEntry, name: string): boolean {
  return hasDirective(getCacheControlDirectives(entry.headers), name);
}

export function mustRevalidate(entry: CacheEntry): boolean {
  return hasCacheControlDirective(entry, 'must-revalidate');
}

export function proxyRevalidate(entry: CacheEntry): boolean {
  return hasCacheControlDirective(entry, 'proxy-revalidate');
}

/**
 * An entry carrying a validator can be revalidated with a conditional request
 */
export function isRevalidatable(entry: CacheEntry): boolean {
  return containsHeader(entry.headers, 'ETag') || containsHeader(entry.headers, 'Last-Modified');
}

/**
 * A stale entry may be served while it is revalidated in the background
 * if its staleness is within stale-while-revalidate
 */
export function mayReturnStaleWhileRevalidating(
  entry: CacheEntry,
  now: number,
  sharedCache: boolean = DEFAULT_CACHE_CONFIG.sharedCache
): boolean {
  const staleness = getStalenessSecs(entry, now, sharedCache);
  return withinStaleAllowance(
    findDirectives(getCacheControlDirectives(entry.headers), 'stale-while-revalidate'),
    staleness
  );
}

/**
 * A stale entry may be served when the origin errors if either the
 * request or the entry allows it through stale-if-error
 */
export function mayReturnStaleIfError(
  request: CacheRequest,
  entry: CacheEntry,
  now: number,
  sharedCache: boolean = DEFAULT_CACHE_CONFIG.sharedCache
): boolean {
  const staleness = getStalenessSecs(entry, now, sharedCache);
  return (
    withinStaleAllowance(
      findDirectives(getCacheControlDirectives(request.headers), 'stale-if-error'),
      staleness
    ) ||
    withinStaleAllowance(
      findDirectives(getCacheControlDirectives(entry.headers), 'stale-if-error'),
      staleness
    )
  );
}

function withinStaleAllowance(
  directives: readonly Directive[],
  staleness: number
): boolean {
  return directives.some((d) => {
    const allowed = parseDirectiveInteger(d.value);
    return allowed !== undefined && staleness <= allowed;
  });
}

/**
 * A missing Content-Length never mismatches; a malformed one always does
 */
export function contentLengthHeaderMatchesActualLength(entry: CacheEntry): boolean {
  const header = getHeaderValue(entry.headers, 'Content-Length');
  if (header === undefined) return true;

  const trimmed = header.trim();
  if (!/^\d+$/.test(trimmed)) return false;
  return Number(trimmed) === entry.body.length;
}
