/**
 * Cache key generation: method + canonical URI, plus a variant selector
 * built from the request headers named by Vary
 */

import type { CacheEntry, CacheRequest, HeaderList } from './types.mjs';
import { getHeaders, splitHeaderElements } from './headers.mjs';

/**
 * Lowercase scheme and host, drop the default port and fragment, and use
 * `/` for an empty path. Relative or unparseable URIs are returned as-is.
 */
export function canonicalizeUri(uri: string): string {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return uri;
  }

  url.hash = '';
  return url.toString();
}

/**
 * Root key for a request
 */
export function getCacheKey(method: string, uri: string): string {
  return `${method.toUpperCase()}:${canonicalizeUri(uri)}`;
}

/**
 * Lowercased header names listed by every Vary header
 */
export function parseVary(headers: HeaderList): string[] {
  return getHeaders(headers, 'Vary').flatMap((h) =>
    splitHeaderElements(h.value).map((name) => name.toLowerCase())
  );
}

/**
 * `Vary: *` means no stored variant can ever be selected
 */
export function isVaryUncacheable(headers: HeaderList): boolean {
  return parseVary(headers).includes('*');
}

/**
 * Variant selector: the request's values for each Vary name, sorted by name
 */
export function getVariantKey(request: CacheRequest, varyNames: readonly string[]): string {
  return [...new Set(varyNames)]
    .filter((name) => name !== '*')
    .sort((a, b) => a.localeCompare(b))
    .map((name) => {
      const value = getHeaders(request.headers, name)
        .map((h) => h.value.trim())
        .join(', ');
      return `${name}=${encodeURIComponent(value)}`;
    })
    .join('&');
}

/**
 * Full key for the variant of `entry` that `request` selects. Equals the
 * root key when the entry does not vary.
 */
export function getVariantCacheKey(request: CacheRequest, entry: CacheEntry): string {
  const rootKey = getCacheKey(request.method, request.uri);
  const varyNames = parseVary(entry.headers);
  if (varyNames.length === 0) {
    return rootKey;
  }
  return `${rootKey}|${getVariantKey(request, varyNames)}`;
}
