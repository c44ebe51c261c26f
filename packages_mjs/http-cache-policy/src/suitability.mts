/**
 * Decides whether a stored entry may answer a request without contacting
 * the origin
 */

import type {
  CacheConfig,
  CacheEntry,
  CacheRequest,
  MissReason,
  SuitabilityResult,
} from './types.mjs';
import { DEFAULT_CACHE_CONFIG } from './config.mjs';
import { componentLogger, type Logger } from './logger.mjs';
import {
  findDirectives,
  getCacheControlDirectives,
  isBareDirective,
  parseDirectiveInteger,
} from './directives.mjs';
import {
  contentLengthHeaderMatchesActualLength,
  getCurrentAgeSecs,
  getFreshnessLifetimeSecs,
  getStalenessSecs,
  hasCacheControlDirective,
  isResponseFresh,
  isResponseHeuristicallyFresh,
  mustRevalidate,
  proxyRevalidate,
} from './validity.mjs';
import {
  allConditionalsMatch,
  hasUnsupportedConditionalHeaders,
  isConditional,
} from './conditional.mjs';

export interface SuitabilityCheckerOptions {
  /** Logger for miss reasons. Default: package logger */
  logger?: Logger;
}

const SERVE_FULL: SuitabilityResult = Object.freeze({ kind: 'serve-full' });
const SERVE_NOT_MODIFIED: SuitabilityResult = Object.freeze({ kind: 'serve-not-modified' });

/**
 * CachedResponseSuitabilityChecker - runs the ordered suitability checks
 *
 * Holds only the frozen configuration, so one instance can serve any number
 * of concurrent evaluations.
 *
 * @example
 * const checker = new CachedResponseSuitabilityChecker(mergeCacheConfig({ sharedCache: false }));
 * const result = checker.canServe(request, entry, Date.now());
 * if (result.kind === 'serve-full') {
 *   return generateFullResponse(entry, now);
 * }
 */
export class CachedResponseSuitabilityChecker {
  private readonly config: CacheConfig;
  private readonly log: Logger;

  constructor(config: CacheConfig = DEFAULT_CACHE_CONFIG, options: SuitabilityCheckerOptions = {}) {
    this.config = config;
    this.log = options.logger ?? componentLogger('suitability');
  }

  /**
   * Evaluate a stored entry against a request at time `now` (epoch ms)
   */
  canServe(request: CacheRequest, entry: CacheEntry, now: number): SuitabilityResult {
    if (hasUnsupportedConditionalHeaders(request)) {
      return this.miss(request, 'unsupported-conditional', 'Request contained conditional headers we do not handle');
    }

    if (!this.isFreshEnough(request, entry, now)) {
      return this.miss(request, 'not-fresh-enough', 'Cache entry was not fresh enough');
    }

    if (!contentLengthHeaderMatchesActualLength(entry)) {
      return this.miss(request, 'content-length-mismatch', 'Cache entry Content-Length does not match stored body');
    }

    const conditional = isConditional(request);
    if (conditional && !allConditionalsMatch(request, entry, now)) {
      return this.miss(request, 'validators-mismatch', 'Request validators did not match cache entry');
    }

    const override = this.checkRequestDirectives(request, entry, now);
    if (override) {
      return this.miss(request, override, 'Request Cache-Control directives rejected cache entry');
    }

    this.log.debug({ uri: request.uri, conditional }, 'Cache entry was suitable');
    return conditional ? SERVE_NOT_MODIFIED : SERVE_FULL;
  }

  isConditional(request: CacheRequest): boolean {
    return isConditional(request);
  }

  allConditionalsMatch(request: CacheRequest, entry: CacheEntry, now: number): boolean {
    return allConditionalsMatch(request, entry, now);
  }

  private isFreshEnough(request: CacheRequest, entry: CacheEntry, now: number): boolean {
    const { sharedCache } = this.config;

    if (isResponseFresh(entry, now, sharedCache)) return true;

    if (
      this.config.heuristicCachingEnabled &&
      isResponseHeuristicallyFresh(
        entry,
        now,
        this.config.heuristicCoefficient,
        this.config.heuristicDefaultLifetimeSecs
      )
    ) {
      return true;
    }

    if (this.originInsistsOnFreshness(entry)) return false;

    const maxStale = getMaxStale(request);
    if (maxStale === undefined) return false;
    return maxStale > getStalenessSecs(entry, now, sharedCache);
  }

  private originInsistsOnFreshness(entry: CacheEntry): boolean {
    if (mustRevalidate(entry)) return true;
    if (!this.config.sharedCache) return false;
    return proxyRevalidate(entry) || hasCacheControlDirective(entry, 's-maxage');
  }

  /**
   * Request-side overrides, in header order; the first failing one wins
   */
  private checkRequestDirectives(
    request: CacheRequest,
    entry: CacheEntry,
    now: number
  ): MissReason | undefined {
    const { sharedCache } = this.config;

    for (const directive of getCacheControlDirectives(request.headers)) {
      switch (directive.name) {
        case 'no-cache':
          return 'request-no-cache';
        case 'no-store':
          return 'request-no-store';
        case 'max-age': {
          const maxAge = parseDirectiveInteger(directive.value);
          if (maxAge === undefined) return 'malformed-directive';
          if (getCurrentAgeSecs(entry, now) > maxAge) return 'request-max-age';
          break;
        }
        case 'max-stale': {
          // bare max-stale accepts any staleness
          if (isBareDirective(directive)) break;
          const maxStale = parseDirectiveInteger(directive.value);
          if (maxStale === undefined) return 'malformed-directive';
          if (getFreshnessLifetimeSecs(entry, sharedCache) > maxStale) return 'request-max-stale';
          break;
        }
        case 'min-fresh': {
          const minFresh = parseDirectiveInteger(directive.value);
          if (minFresh === undefined || minFresh < 0) return 'malformed-directive';
          const age = getCurrentAgeSecs(entry, now);
          const freshness = getFreshnessLifetimeSecs(entry, sharedCache);
          if (freshness - age < minFresh) return 'request-min-fresh';
          break;
        }
      }
    }

    return undefined;
  }

  private miss(request: CacheRequest, reason: MissReason, message: string): SuitabilityResult {
    this.log.debug({ uri: request.uri, reason }, message);
    return { kind: 'must-fetch', reason };
  }
}

/**
 * Most restrictive request max-stale in seconds. A bare max-stale is
 * unbounded; negative values count as 0 and malformed ones as 0.
 * Undefined when the request has no max-stale.
 */
export function getMaxStale(request: CacheRequest): number | undefined {
  let maxStale: number | undefined;

  for (const directive of findDirectives(getCacheControlDirectives(request.headers), 'max-stale')) {
    if (isBareDirective(directive)) {
      if (maxStale === undefined) maxStale = Infinity;
      continue;
    }

    const parsed = parseDirectiveInteger(directive.value);
    if (parsed === undefined) {
      maxStale = 0;
      continue;
    }

    const value = Math.max(0, parsed);
    if (maxStale === undefined || value < maxStale) {
      maxStale = value;
    }
  }

  return maxStale;
}

/**
 * Create a suitability checker
 */
export function createSuitabilityChecker(
  config?: CacheConfig,
  options?: SuitabilityCheckerOptions
): CachedResponseSuitabilityChecker {
  return new CachedResponseSuitabilityChecker(config, options);
}
