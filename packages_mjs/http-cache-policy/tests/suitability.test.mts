/**
 * Tests for CachedResponseSuitabilityChecker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import {
  CachedResponseSuitabilityChecker,
  createSuitabilityChecker,
  getMaxStale,
} from '../src/suitability.mjs';
import { mergeCacheConfig } from '../src/config.mjs';
import { createCacheEntry, createCacheRequest } from '../src/entry.mjs';
import { formatHttpDate } from '../src/headers.mjs';
import type { CacheEntry, CacheRequest } from '../src/types.mjs';

const T = Date.UTC(2026, 0, 15, 12, 0, 0);
const secs = (n: number): number => n * 1000;
const URI = 'https://example.com/articles/7';

function entryWith(
  headers: Record<string, string | string[]>,
  body: string = 'x'.repeat(400)
): CacheEntry {
  return createCacheEntry({
    requestDate: T,
    responseDate: T,
    statusCode: 200,
    reasonPhrase: 'OK',
    headers: { Date: formatHttpDate(T), ...headers },
    body,
  });
}

function requestWith(headers: Record<string, string | string[]> = {}): CacheRequest {
  return createCacheRequest('GET', URI, headers);
}

describe('CachedResponseSuitabilityChecker', () => {
  let checker: CachedResponseSuitabilityChecker;

  beforeEach(() => {
    checker = new CachedResponseSuitabilityChecker(mergeCacheConfig({ sharedCache: false }));
  });

  describe('fresh entries', () => {
    const entry = entryWith({ 'Cache-Control': 'max-age=100', ETag: '"abc"' });

    it('should serve a full response to a plain request', () => {
      expect(checker.canServe(requestWith(), entry, T + secs(50))).toEqual({ kind: 'serve-full' });
    });

    it('should serve 304 when If-None-Match matches', () => {
      const request = requestWith({ 'If-None-Match': '"abc"' });
      expect(checker.canServe(request, entry, T + secs(10))).toEqual({ kind: 'serve-not-modified' });
    });

    it('should fetch when If-None-Match does not match', () => {
      const request = requestWith({ 'If-None-Match': '"xyz"' });
      expect(checker.canServe(request, entry, T + secs(10))).toEqual({
        kind: 'must-fetch',
        reason: 'validators-mismatch',
      });
    });

    it('should fetch when the request says no-cache or no-store', () => {
      expect(checker.canServe(requestWith({ 'Cache-Control': 'no-cache' }), entry, T)).toEqual({
        kind: 'must-fetch',
        reason: 'request-no-cache',
      });
      expect(checker.canServe(requestWith({ 'Cache-Control': 'no-store' }), entry, T)).toEqual({
        kind: 'must-fetch',
        reason: 'request-no-store',
      });
    });

    it('should serve in full when If-Modified-Since is not a date', () => {
      const request = requestWith({ 'If-Modified-Since': '1' });
      expect(checker.canServe(request, entry, T + secs(10))).toEqual({ kind: 'serve-full' });
    });

    it('should bypass the cache for unsupported conditionals', () => {
      const request = requestWith({ 'If-Match': '"abc"' });
      expect(checker.canServe(request, entry, T)).toEqual({
        kind: 'must-fetch',
        reason: 'unsupported-conditional',
      });
    });

    it('should return identical results for identical inputs', () => {
      const request = requestWith({ 'If-None-Match': '"abc"' });
      const first = checker.canServe(request, entry, T + secs(20));
      const second = checker.canServe(request, entry, T + secs(20));
      expect(second).toEqual(first);
    });
  });

  describe('entry consistency', () => {
    it('should fetch when Content-Length disagrees with the stored body', () => {
      const entry = entryWith({ 'Cache-Control': 'max-age=100', 'Content-Length': '500' });
      expect(checker.canServe(requestWith(), entry, T)).toEqual({
        kind: 'must-fetch',
        reason: 'content-length-mismatch',
      });
    });

    it('should serve when Content-Length matches', () => {
      const entry = entryWith({ 'Cache-Control': 'max-age=100', 'Content-Length': '400' });
      expect(checker.canServe(requestWith(), entry, T).kind).toBe('serve-full');
    });
  });

  describe('staleness', () => {
    const entry = entryWith({ 'Cache-Control': 'max-age=100' });

    it('should fetch a stale entry', () => {
      expect(checker.canServe(requestWith(), entry, T + secs(150))).toEqual({
        kind: 'must-fetch',
        reason: 'not-fresh-enough',
      });
    });

    it('should check unsupported conditionals before freshness', () => {
      const request = requestWith({ 'If-Range': '"abc"' });
      expect(checker.canServe(request, entry, T + secs(150))).toEqual({
        kind: 'must-fetch',
        reason: 'unsupported-conditional',
      });
    });

    it('should serve a stale entry within the request max-stale', () => {
      const request = requestWith({ 'Cache-Control': 'max-stale=100' });
      expect(checker.canServe(request, entry, T + secs(150)).kind).toBe('serve-full');
    });

    it('should fetch when staleness reaches max-stale', () => {
      const request = requestWith({ 'Cache-Control': 'max-stale=50' });
      expect(checker.canServe(request, entry, T + secs(150))).toEqual({
        kind: 'must-fetch',
        reason: 'not-fresh-enough',
      });
    });

    it('should accept any staleness for a bare max-stale', () => {
      const request = requestWith({ 'Cache-Control': 'max-stale' });
      expect(checker.canServe(request, entry, T + secs(100_000)).kind).toBe('serve-full');
    });

    it('should treat a malformed max-stale as zero', () => {
      const request = requestWith({ 'Cache-Control': 'max-stale=lots' });
      expect(checker.canServe(request, entry, T + secs(150))).toEqual({
        kind: 'must-fetch',
        reason: 'not-fresh-enough',
      });
    });

    it('should not let max-stale override must-revalidate', () => {
      const strict = entryWith({ 'Cache-Control': 'max-age=100, must-revalidate' });
      const request = requestWith({ 'Cache-Control': 'max-stale' });
      expect(checker.canServe(request, strict, T + secs(150))).toEqual({
        kind: 'must-fetch',
        reason: 'not-fresh-enough',
      });
    });

    it('should re-check max-stale against the freshness lifetime', () => {
      const longLived = entryWith({ 'Cache-Control': 'max-age=3600' });
      const request = requestWith({ 'Cache-Control': 'max-stale=60' });
      expect(checker.canServe(request, longLived, T + secs(10))).toEqual({
        kind: 'must-fetch',
        reason: 'request-max-stale',
      });
    });
  });

  describe('shared cache', () => {
    const shared = new CachedResponseSuitabilityChecker(mergeCacheConfig({ sharedCache: true }));
    const request = requestWith({ 'Cache-Control': 'max-stale=100' });

    it('should honour proxy-revalidate only when shared', () => {
      const entry = entryWith({ 'Cache-Control': 'max-age=100, proxy-revalidate' });
      expect(shared.canServe(request, entry, T + secs(150))).toEqual({
        kind: 'must-fetch',
        reason: 'not-fresh-enough',
      });
      expect(checker.canServe(request, entry, T + secs(150)).kind).toBe('serve-full');
    });

    it('should treat s-maxage as insisting on freshness', () => {
      const entry = entryWith({ 'Cache-Control': 's-maxage=100' });
      expect(shared.canServe(requestWith({ 'Cache-Control': 'max-stale' }), entry, T + secs(150))).toEqual({
        kind: 'must-fetch',
        reason: 'not-fresh-enough',
      });
    });

    it('should use s-maxage as the lifetime', () => {
      const entry = entryWith({ 'Cache-Control': 'max-age=10, s-maxage=100' });
      expect(shared.canServe(requestWith(), entry, T + secs(50)).kind).toBe('serve-full');
      expect(checker.canServe(requestWith(), entry, T + secs(50)).kind).toBe('must-fetch');
    });
  });

  describe('heuristic freshness', () => {
    const entry = entryWith({ 'Last-Modified': formatHttpDate(T - secs(1000)) });

    it('should serve a heuristically fresh entry when enabled', () => {
      const heuristic = new CachedResponseSuitabilityChecker(
        mergeCacheConfig({ sharedCache: false, heuristicCachingEnabled: true, heuristicCoefficient: 0.1 })
      );
      expect(heuristic.canServe(requestWith(), entry, T + secs(50)).kind).toBe('serve-full');
      expect(heuristic.canServe(requestWith(), entry, T + secs(120)).kind).toBe('must-fetch');
    });

    it('should not use heuristics when disabled', () => {
      expect(checker.canServe(requestWith(), entry, T + secs(50))).toEqual({
        kind: 'must-fetch',
        reason: 'not-fresh-enough',
      });
    });

    it('should fall back to the default heuristic lifetime', () => {
      const heuristic = createSuitabilityChecker(
        mergeCacheConfig({ heuristicCachingEnabled: true, heuristicDefaultLifetimeSecs: 30 })
      );
      const withoutLastModified = entryWith({});
      expect(heuristic.canServe(requestWith(), withoutLastModified, T + secs(20)).kind).toBe('serve-full');
      expect(heuristic.canServe(requestWith(), withoutLastModified, T + secs(40)).kind).toBe('must-fetch');
    });
  });

  describe('request directives', () => {
    const entry = entryWith({ 'Cache-Control': 'max-age=100' });

    it('should enforce max-age', () => {
      expect(checker.canServe(requestWith({ 'Cache-Control': 'max-age=5' }), entry, T + secs(10))).toEqual({
        kind: 'must-fetch',
        reason: 'request-max-age',
      });
      expect(checker.canServe(requestWith({ 'Cache-Control': 'max-age=20' }), entry, T + secs(10)).kind).toBe(
        'serve-full'
      );
    });

    it('should enforce min-fresh', () => {
      expect(checker.canServe(requestWith({ 'Cache-Control': 'min-fresh=60' }), entry, T + secs(50))).toEqual({
        kind: 'must-fetch',
        reason: 'request-min-fresh',
      });
      expect(
        checker.canServe(requestWith({ 'Cache-Control': 'min-fresh=30' }), entry, T + secs(50)).kind
      ).toBe('serve-full');
    });

    it('should fail closed on negative min-fresh', () => {
      expect(checker.canServe(requestWith({ 'Cache-Control': 'min-fresh=-1' }), entry, T)).toEqual({
        kind: 'must-fetch',
        reason: 'malformed-directive',
      });
    });

    it('should fail closed on malformed numeric arguments', () => {
      expect(checker.canServe(requestWith({ 'Cache-Control': 'max-age=ten' }), entry, T)).toEqual({
        kind: 'must-fetch',
        reason: 'malformed-directive',
      });
      expect(checker.canServe(requestWith({ 'Cache-Control': 'max-age' }), entry, T)).toEqual({
        kind: 'must-fetch',
        reason: 'malformed-directive',
      });
    });

    it('should merge directives from repeated Cache-Control headers', () => {
      const request = requestWith({ 'Cache-Control': ['max-age=200', 'no-cache'] });
      expect(checker.canServe(request, entry, T)).toEqual({
        kind: 'must-fetch',
        reason: 'request-no-cache',
      });
    });

    it('should apply overrides to conditional requests too', () => {
      const tagged = entryWith({ 'Cache-Control': 'max-age=100', ETag: '"abc"' });
      const request = requestWith({ 'If-None-Match': '"abc"', 'Cache-Control': 'no-cache' });
      expect(checker.canServe(request, tagged, T)).toEqual({
        kind: 'must-fetch',
        reason: 'request-no-cache',
      });
    });
  });

  describe('conditional helpers', () => {
    it('should expose isConditional and allConditionalsMatch', () => {
      const entry = entryWith({ 'Cache-Control': 'max-age=100', ETag: '"abc"' });
      const request = requestWith({ 'If-None-Match': '"abc"' });
      expect(checker.isConditional(request)).toBe(true);
      expect(checker.allConditionalsMatch(request, entry, T)).toBe(true);
      expect(checker.isConditional(requestWith())).toBe(false);
    });
  });

  describe('logging', () => {
    it('should log the miss reason at debug level', () => {
      const lines: string[] = [];
      const log = pino({ level: 'debug' }, { write: (msg: string) => lines.push(msg) });
      const logged = new CachedResponseSuitabilityChecker(mergeCacheConfig({ sharedCache: false }), {
        logger: log,
      });

      logged.canServe(requestWith({ 'Cache-Control': 'no-store' }), entryWith({ 'Cache-Control': 'max-age=100' }), T);

      expect(lines).toHaveLength(1);
      const record: unknown = JSON.parse(lines[0]);
      expect(record).toMatchObject({ level: 20, reason: 'request-no-store', uri: URI });
    });
  });
});

describe('getMaxStale', () => {
  it('should be undefined without max-stale', () => {
    expect(getMaxStale(requestWith())).toBeUndefined();
  });

  it('should be unbounded for a bare max-stale', () => {
    expect(getMaxStale(requestWith({ 'Cache-Control': 'max-stale' }))).toBe(Infinity);
  });

  it('should take the smallest value', () => {
    expect(getMaxStale(requestWith({ 'Cache-Control': ['max-stale=90', 'max-stale=30'] }))).toBe(30);
    expect(getMaxStale(requestWith({ 'Cache-Control': 'max-stale, max-stale=45' }))).toBe(45);
  });

  it('should clamp negative values and zero malformed ones', () => {
    expect(getMaxStale(requestWith({ 'Cache-Control': 'max-stale=-5' }))).toBe(0);
    expect(getMaxStale(requestWith({ 'Cache-Control': 'max-stale=abc' }))).toBe(0);
  });
});
