/**
 * @http-cache/policy
 *
 * HTTP response cache-policy engine (RFC 7234):
 * - Age, freshness and staleness of stored responses, including heuristic freshness
 * - If-None-Match / If-Modified-Since matching
 * - Request and response Cache-Control precedence
 * - Full cached responses with Age, and 304 Not Modified responses
 * - Pluggable entry stores (In-Memory LRU)
 *
 * @example Deciding for a single entry
 * ```typescript
 * import {
 *   CachedResponseSuitabilityChecker,
 *   createCacheEntry,
 *   createCacheRequest,
 *   generateFullResponse,
 *   generateNotModifiedResponse,
 *   mergeCacheConfig,
 * } from '@http-cache/policy';
 *
 * const checker = new CachedResponseSuitabilityChecker(mergeCacheConfig({ sharedCache: false }));
 * const request = createCacheRequest('GET', 'https://api.example.com/users', {
 *   'If-None-Match': '"v42"',
 * });
 *
 * const now = Date.now();
 * const result = checker.canServe(request, entry, now);
 * switch (result.kind) {
 *   case 'serve-full':
 *     return generateFullResponse(entry, now);
 *   case 'serve-not-modified':
 *     return generateNotModifiedResponse(entry, now);
 *   case 'must-fetch':
 *     console.debug(`cache miss: ${result.reason}`);
 * }
 * ```
 *
 * @example With a store
 * ```typescript
 * import { HttpCachePolicyEngine, buildConditionalRequest } from '@http-cache/policy';
 *
 * const engine = new HttpCachePolicyEngine({ heuristicCachingEnabled: true });
 * const result = await engine.lookup(request);
 * if (result.kind === 'must-fetch' && result.entry) {
 *   const conditional = buildConditionalRequest(request, result.entry);
 *   // send `conditional` to the origin; on 304 call engine.revalidated(...)
 * }
 * ```
 */

// Types
export type {
  HttpHeader,
  HeaderList,
  HeaderInit,
  CacheBody,
  CacheEntry,
  CacheEntryInit,
  CacheRequest,
  CachedHttpResponse,
  Directive,
  CacheConfig,
  MissReason,
  SuitabilityResult,
  CacheEntryStore,
  CachePolicyEventType,
  CachePolicyEvent,
  CachePolicyEventListener,
} from './types.mjs';

// Errors
export { CacheConfigError, CacheEntryError } from './errors.mjs';

// Configuration
export { DEFAULT_CACHE_CONFIG, mergeCacheConfig, loadCacheConfigFromEnv } from './config.mjs';

// Logging
export { logger, componentLogger, type Logger } from './logger.mjs';

// Headers
export {
  toHeaderList,
  getHeaders,
  getFirstHeader,
  getHeaderValue,
  containsHeader,
  setHeader,
  addHeader,
  removeHeaders,
  headersToRecord,
  splitHeaderElements,
  parseHttpDate,
  formatHttpDate,
} from './headers.mjs';

// Directives
export {
  parseCacheControl,
  getCacheControlDirectives,
  findDirectives,
  hasDirective,
  parseDirectiveInteger,
} from './directives.mjs';

// Validity policy
export {
  MAX_AGE_SECS,
  getApparentAgeSecs,
  getAgeValue,
  getCurrentAgeSecs,
  getFreshnessLifetimeSecs,
  isResponseFresh,
  getHeuristicFreshnessLifetimeSecs,
  isResponseHeuristicallyFresh,
  getStalenessSecs,
  hasCacheControlDirective,
  mustRevalidate,
  proxyRevalidate,
  isRevalidatable,
  mayReturnStaleWhileRevalidating,
  mayReturnStaleIfError,
  contentLengthHeaderMatchesActualLength,
} from './validity.mjs';

// Conditional requests
export {
  isConditional,
  etagMatches,
  lastModifiedMatches,
  allConditionalsMatch,
  hasUnsupportedConditionalHeaders,
} from './conditional.mjs';

// Suitability
export {
  CachedResponseSuitabilityChecker,
  createSuitabilityChecker,
  getMaxStale,
  type SuitabilityCheckerOptions,
} from './suitability.mjs';

// Response generation
export { generateFullResponse, generateNotModifiedResponse } from './generator.mjs';

// Entries
export { createCacheEntry, createCacheRequest, updateCacheEntry, mergeHeaders } from './entry.mjs';

// Revalidation requests
export {
  buildConditionalRequest,
  buildConditionalRequestFromVariants,
  buildUnconditionalRequest,
} from './revalidation.mjs';

// Keys
export {
  canonicalizeUri,
  getCacheKey,
  parseVary,
  isVaryUncacheable,
  getVariantKey,
  getVariantCacheKey,
} from './key.mjs';

// Engine
export {
  HttpCachePolicyEngine,
  createHttpCachePolicyEngine,
  type CacheLookupResult,
  type LookupMissReason,
  type HttpCachePolicyEngineOptions,
} from './engine.mjs';

// Stores
export {
  MemoryEntryStore,
  createMemoryEntryStore,
  type MemoryEntryStoreOptions,
  type MemoryEntryStoreStats,
} from './stores/index.mjs';
