/**
 * Errors raised while building configuration or cache entries.
 * Decision functions never throw; these only surface at construction time.
 */

/**
 * Error thrown when a cache configuration fails validation
 */
export class CacheConfigError extends Error {
  readonly code = 'INVALID_CACHE_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'CacheConfigError';
  }
}

/**
 * Error thrown when a cache entry cannot be created or updated
 */
export class CacheEntryError extends Error {
  readonly code = 'INVALID_CACHE_ENTRY';

  constructor(message: string) {
    super(message);
    this.name = 'CacheEntryError';
  }
}
