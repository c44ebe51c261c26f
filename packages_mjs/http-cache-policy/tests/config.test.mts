/**
 * Tests for configuration defaults, merging and environment loading
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CACHE_CONFIG, mergeCacheConfig, loadCacheConfigFromEnv } from '../src/config.mjs';
import { CacheConfigError } from '../src/errors.mjs';

describe('mergeCacheConfig', () => {
  it('should return defaults when no config provided', () => {
    expect(mergeCacheConfig()).toEqual(DEFAULT_CACHE_CONFIG);
    expect(DEFAULT_CACHE_CONFIG).toEqual({
      sharedCache: true,
      heuristicCachingEnabled: false,
      heuristicCoefficient: 0.1,
      heuristicDefaultLifetimeSecs: 0,
    });
  });

  it('should override only the given values', () => {
    expect(mergeCacheConfig({ sharedCache: false, heuristicCoefficient: 0.25 })).toEqual({
      sharedCache: false,
      heuristicCachingEnabled: false,
      heuristicCoefficient: 0.25,
      heuristicDefaultLifetimeSecs: 0,
    });
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(mergeCacheConfig({ heuristicCachingEnabled: true }))).toBe(true);
  });

  it('should reject a coefficient outside [0, 1]', () => {
    expect(() => mergeCacheConfig({ heuristicCoefficient: 1.5 })).toThrow(CacheConfigError);
    expect(() => mergeCacheConfig({ heuristicCoefficient: -0.1 })).toThrow(
      /^Invalid cache configuration: heuristicCoefficient: /
    );
  });

  it('should reject a fractional or negative default lifetime', () => {
    expect(() => mergeCacheConfig({ heuristicDefaultLifetimeSecs: 1.5 })).toThrow(CacheConfigError);
    expect(() => mergeCacheConfig({ heuristicDefaultLifetimeSecs: -1 })).toThrow(CacheConfigError);
  });

  it('should expose an error code', () => {
    try {
      mergeCacheConfig({ heuristicCoefficient: 2 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CacheConfigError);
      expect(error).toMatchObject({ code: 'INVALID_CACHE_CONFIG', name: 'CacheConfigError' });
    }
  });
});

describe('loadCacheConfigFromEnv', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadCacheConfigFromEnv({})).toEqual(DEFAULT_CACHE_CONFIG);
  });

  it('should read every variable', () => {
    expect(
      loadCacheConfigFromEnv({
        HTTP_CACHE_SHARED: '0',
        HTTP_CACHE_HEURISTIC_ENABLED: 'true',
        HTTP_CACHE_HEURISTIC_COEFFICIENT: '0.25',
        HTTP_CACHE_HEURISTIC_DEFAULT_LIFETIME: '120',
        UNRELATED: 'ignored',
      })
    ).toEqual({
      sharedCache: false,
      heuristicCachingEnabled: true,
      heuristicCoefficient: 0.25,
      heuristicDefaultLifetimeSecs: 120,
    });
  });

  it('should reject an unknown boolean spelling', () => {
    expect(() => loadCacheConfigFromEnv({ HTTP_CACHE_SHARED: 'yes' })).toThrow(
      /^Invalid cache environment: HTTP_CACHE_SHARED: /
    );
  });

  it('should reject a non-numeric coefficient', () => {
    expect(() => loadCacheConfigFromEnv({ HTTP_CACHE_HEURISTIC_COEFFICIENT: 'high' })).toThrow(
      CacheConfigError
    );
  });

  it('should validate the merged values', () => {
    expect(() => loadCacheConfigFromEnv({ HTTP_CACHE_HEURISTIC_COEFFICIENT: '3' })).toThrow(
      /^Invalid cache configuration: /
    );
  });
});
