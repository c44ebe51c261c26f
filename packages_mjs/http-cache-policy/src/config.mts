/**
 * Configuration utilities for http-cache-policy
 */

import { z } from 'zod';
import type { CacheConfig } from './types.mjs';
import { CacheConfigError } from './errors.mjs';

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = Object.freeze({
  sharedCache: true,
  heuristicCachingEnabled: false,
  heuristicCoefficient: 0.1,
  heuristicDefaultLifetimeSecs: 0,
});

const cacheConfigSchema = z
  .object({
    sharedCache: z.boolean(),
    heuristicCachingEnabled: z.boolean(),
    heuristicCoefficient: z.number().min(0).max(1),
    heuristicDefaultLifetimeSecs: z.number().int().nonnegative(),
  })
  .strict();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  HTTP_CACHE_SHARED: booleanFlag.optional(),
  HTTP_CACHE_HEURISTIC_ENABLED: booleanFlag.optional(),
  HTTP_CACHE_HEURISTIC_COEFFICIENT: z.coerce.number().optional(),
  HTTP_CACHE_HEURISTIC_DEFAULT_LIFETIME: z.coerce.number().optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Merge user config with defaults, validate and freeze the result
 *
 * @throws CacheConfigError when a value is out of range
 */
export function mergeCacheConfig(config?: Partial<CacheConfig>): CacheConfig {
  const merged = {
    sharedCache: config?.sharedCache ?? DEFAULT_CACHE_CONFIG.sharedCache,
    heuristicCachingEnabled:
      config?.heuristicCachingEnabled ?? DEFAULT_CACHE_CONFIG.heuristicCachingEnabled,
    heuristicCoefficient: config?.heuristicCoefficient ?? DEFAULT_CACHE_CONFIG.heuristicCoefficient,
    heuristicDefaultLifetimeSecs:
      config?.heuristicDefaultLifetimeSecs ?? DEFAULT_CACHE_CONFIG.heuristicDefaultLifetimeSecs,
  };

  const result = cacheConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new CacheConfigError(`Invalid cache configuration: ${formatIssues(result.error)}`);
  }

  return Object.freeze(result.data);
}

/**
 * Build a configuration from environment variables
 *
 * - HTTP_CACHE_SHARED: true/false/1/0
 * - HTTP_CACHE_HEURISTIC_ENABLED: true/false/1/0
 * - HTTP_CACHE_HEURISTIC_COEFFICIENT: number in [0, 1]
 * - HTTP_CACHE_HEURISTIC_DEFAULT_LIFETIME: seconds
 */
export function loadCacheConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new CacheConfigError(`Invalid cache environment: ${formatIssues(result.error)}`);
  }

  const vars = result.data;
  return mergeCacheConfig({
    sharedCache: vars.HTTP_CACHE_SHARED,
    heuristicCachingEnabled: vars.HTTP_CACHE_HEURISTIC_ENABLED,
    heuristicCoefficient: vars.HTTP_CACHE_HEURISTIC_COEFFICIENT,
    heuristicDefaultLifetimeSecs: vars.HTTP_CACHE_HEURISTIC_DEFAULT_LIFETIME,
  });
}
