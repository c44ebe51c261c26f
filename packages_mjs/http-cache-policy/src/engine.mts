/**
 * HTTP cache-policy engine: store lookup, suitability decision and
 * response synthesis behind one facade
 */

import type {
  CacheConfig,
  CacheEntry,
  CacheEntryStore,
  CachedHttpResponse,
  CachePolicyEvent,
  CachePolicyEventListener,
  CacheRequest,
  MissReason,
} from './types.mjs';
import { mergeCacheConfig } from './config.mjs';
import { componentLogger, type Logger } from './logger.mjs';
import { CachedResponseSuitabilityChecker } from './suitability.mjs';
import { generateFullResponse, generateNotModifiedResponse } from './generator.mjs';
import { updateCacheEntry } from './entry.mjs';
import { getCacheKey, getVariantCacheKey, isVaryUncacheable } from './key.mjs';
import { MemoryEntryStore } from './stores/memory.mjs';

export type LookupMissReason = MissReason | 'no-entry' | 'vary-uncacheable';

/**
 * Result of an engine lookup
 */
export type CacheLookupResult =
  | {
      readonly kind: 'serve-full' | 'serve-not-modified';
      readonly key: string;
      readonly entry: CacheEntry;
      readonly response: CachedHttpResponse;
    }
  | {
      readonly kind: 'must-fetch';
      readonly key: string;
      readonly entry: CacheEntry | null;
      readonly reason: LookupMissReason;
    };

export interface HttpCachePolicyEngineOptions {
  /** Logger for engine events. Default: package logger */
  logger?: Logger;
}

/**
 * HttpCachePolicyEngine - answers requests from a pluggable entry store
 *
 * Entries are stored under `METHOD:uri`; entries carrying Vary are also
 * stored under a variant key built from the selecting request headers.
 *
 * @example
 * const engine = new HttpCachePolicyEngine({ sharedCache: false });
 *
 * const result = await engine.lookup(request);
 * if (result.kind !== 'must-fetch') {
 *   return result.response;
 * }
 *
 * // fetch from origin (conditionally when result.entry is revalidatable),
 * // then store what came back
 * await engine.store(request, createCacheEntry({ ... }));
 */
export class HttpCachePolicyEngine {
  private readonly config: CacheConfig;
  private readonly entryStore: CacheEntryStore;
  private readonly checker: CachedResponseSuitabilityChecker;
  private readonly log: Logger;
  private readonly listeners: Set<CachePolicyEventListener> = new Set();

  constructor(
    config?: Partial<CacheConfig>,
    store?: CacheEntryStore,
    options: HttpCachePolicyEngineOptions = {}
  ) {
    this.config = mergeCacheConfig(config);
    this.entryStore = store ?? new MemoryEntryStore();
    this.log = options.logger ?? componentLogger('engine');
    this.checker = new CachedResponseSuitabilityChecker(this.config, { logger: this.log });
  }

  /**
   * Find a stored entry for the request and decide how to answer it
   */
  async lookup(request: CacheRequest, now: number = Date.now()): Promise<CacheLookupResult> {
    const rootKey = getCacheKey(request.method, request.uri);
    const root = await this.entryStore.get(rootKey);

    if (!root) {
      return this.missed(request, rootKey, null, 'no-entry', now);
    }

    if (isVaryUncacheable(root.headers)) {
      return this.missed(request, rootKey, null, 'vary-uncacheable', now);
    }

    const key = getVariantCacheKey(request, root);
    const entry = key === rootKey ? root : await this.entryStore.get(key);
    if (!entry) {
      return this.missed(request, key, null, 'no-entry', now);
    }

    const decision = this.checker.canServe(request, entry, now);

    if (decision.kind === 'must-fetch') {
      if (decision.reason === 'content-length-mismatch') {
        await this.evict(request, rootKey, root, key, entry, now);
        return this.missed(request, key, null, decision.reason, now);
      }
      return this.missed(request, key, entry, decision.reason, now);
    }

    if (decision.kind === 'serve-not-modified') {
      this.emit({ type: 'cache:not-modified', key, uri: request.uri, timestamp: now });
      return {
        kind: decision.kind,
        key,
        entry,
        response: generateNotModifiedResponse(entry, now),
      };
    }

    this.emit({ type: 'cache:hit', key, uri: request.uri, timestamp: now });
    return {
      kind: decision.kind,
      key,
      entry,
      response: generateFullResponse(entry, now),
    };
  }

  /**
   * Store an entry for the request. Returns false for `Vary: *` and for
   * entries the store declines.
   */
  async store(request: CacheRequest, entry: CacheEntry): Promise<boolean> {
    const rootKey = getCacheKey(request.method, request.uri);

    if (isVaryUncacheable(entry.headers)) {
      this.bypass(request, rootKey, entry, 'vary-star');
      return false;
    }

    const key = getVariantCacheKey(request, entry);

    if (!(await this.entryStore.put(rootKey, entry))) {
      this.bypass(request, key, entry, 'rejected-by-store');
      return false;
    }

    if (key !== rootKey && !(await this.entryStore.put(key, entry))) {
      // the root must never point at an unreachable variant
      await this.entryStore.delete(rootKey);
      this.bypass(request, key, entry, 'rejected-by-store');
      return false;
    }

    this.emit({
      type: 'cache:store',
      key,
      uri: request.uri,
      timestamp: entry.responseDate,
      metadata: { statusCode: entry.statusCode },
    });
    return true;
  }

  /**
   * Replace `entry` after the origin answered a revalidation with 304
   */
  async revalidated(
    request: CacheRequest,
    entry: CacheEntry,
    requestDate: number,
    responseDate: number,
    notModified: Pick<CachedHttpResponse, 'statusCode' | 'headers'>
  ): Promise<CacheEntry> {
    const updated = updateCacheEntry(entry, requestDate, responseDate, notModified);
    if (!(await this.store(request, updated))) {
      return updated;
    }

    this.emit({
      type: 'cache:revalidate',
      key: getVariantCacheKey(request, updated),
      uri: request.uri,
      timestamp: responseDate,
    });
    return updated;
  }

  /**
   * Drop the root entry for a request and every stored variant of it
   */
  async invalidate(request: CacheRequest): Promise<boolean> {
    const rootKey = getCacheKey(request.method, request.uri);
    const variantPrefix = `${rootKey}|`;

    let deleted = 0;
    for (const key of await this.entryStore.keys()) {
      if (key === rootKey || key.startsWith(variantPrefix)) {
        if (await this.entryStore.delete(key)) deleted++;
      }
    }

    if (deleted > 0) {
      this.emit({
        type: 'cache:evict',
        key: rootKey,
        uri: request.uri,
        timestamp: Date.now(),
        metadata: { entries: deleted },
      });
    }
    return deleted > 0;
  }

  getConfig(): CacheConfig {
    return this.config;
  }

  async getStats(): Promise<{ size: number }> {
    return { size: await this.entryStore.size() };
  }

  /**
   * Add event listener
   */
  on(listener: CachePolicyEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove event listener
   */
  off(listener: CachePolicyEventListener): void {
    this.listeners.delete(listener);
  }

  async clear(): Promise<void> {
    await this.entryStore.clear();
  }

  async close(): Promise<void> {
    await this.entryStore.close();
    this.listeners.clear();
  }

  /**
   * Drop an inconsistent entry. The root is dropped with it only while it
   * still points at that entry; otherwise it holds another, valid variant.
   */
  private async evict(
    request: CacheRequest,
    rootKey: string,
    root: CacheEntry,
    key: string,
    entry: CacheEntry,
    now: number
  ): Promise<void> {
    this.log.warn({ key, uri: request.uri }, 'Evicting cache entry with inconsistent Content-Length');
    await this.entryStore.delete(key);
    if (key !== rootKey && root === entry) {
      await this.entryStore.delete(rootKey);
    }
    this.emit({
      type: 'cache:evict',
      key,
      uri: request.uri,
      timestamp: now,
      metadata: { reason: 'content-length-mismatch' },
    });
  }

  private bypass(request: CacheRequest, key: string, entry: CacheEntry, reason: string): void {
    this.emit({
      type: 'cache:bypass',
      key,
      uri: request.uri,
      timestamp: entry.responseDate,
      metadata: { reason },
    });
  }

  private missed(
    request: CacheRequest,
    key: string,
    entry: CacheEntry | null,
    reason: LookupMissReason,
    now: number
  ): CacheLookupResult {
    this.emit({ type: 'cache:miss', key, uri: request.uri, timestamp: now, metadata: { reason } });
    return { kind: 'must-fetch', key, entry, reason };
  }

  private emit(event: CachePolicyEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error({ err: error, event: event.type }, 'Cache event listener failed');
      }
    }
  }
}

/**
 * Create a cache-policy engine
 */
export function createHttpCachePolicyEngine(
  config?: Partial<CacheConfig>,
  store?: CacheEntryStore,
  options?: HttpCachePolicyEngineOptions
): HttpCachePolicyEngine {
  return new HttpCachePolicyEngine(config, store, options);
}
