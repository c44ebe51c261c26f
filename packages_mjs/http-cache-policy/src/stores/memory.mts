/**
 * In-memory cache entry store with LRU eviction
 */

import type { CacheEntry, CacheEntryStore } from '../types.mjs';

interface LruEntry {
  entry: CacheEntry;
  size: number;
}

/**
 * In-memory cache store with LRU eviction by entry count and total size
 */
export class MemoryEntryStore implements CacheEntryStore {
  private cache: Map<string, LruEntry> = new Map();
  private currentSize: number = 0;

  private readonly maxSize: number;
  private readonly maxEntries: number;
  private readonly maxEntrySize: number;

  constructor(options: MemoryEntryStoreOptions = {}) {
    this.maxSize = options.maxSize ?? 100 * 1024 * 1024; // 100MB default
    this.maxEntries = options.maxEntries ?? 1000;
    this.maxEntrySize = options.maxEntrySize ?? 5 * 1024 * 1024; // 5MB default
  }

  private deleteEntry(key: string): boolean {
    const lru = this.cache.get(key);
    if (lru) {
      this.currentSize -= lru.size;
      this.cache.delete(key);
      return true;
    }
    return false;
  }

  private calculateEntrySize(entry: CacheEntry): number {
    let size = entry.body.length;
    for (const { name, value } of entry.headers) {
      size += name.length + value.length;
    }
    return size;
  }

  private evictIfNeeded(requiredSize: number): void {
    while (this.currentSize + requiredSize > this.maxSize && this.cache.size > 0) {
      this.evictOldest();
    }

    while (this.cache.size >= this.maxEntries && this.cache.size > 0) {
      this.evictOldest();
    }
  }

  private evictOldest(): void {
    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.deleteEntry(oldest.value);
    }
  }

  async get(key: string): Promise<CacheEntry | null> {
    const lru = this.cache.get(key);
    if (!lru) {
      return null;
    }

    // Move to end for LRU
    this.cache.delete(key);
    this.cache.set(key, lru);

    return lru.entry;
  }

  async put(key: string, entry: CacheEntry): Promise<boolean> {
    const size = this.calculateEntrySize(entry);

    if (size > this.maxEntrySize || size > this.maxSize) {
      return false;
    }

    this.deleteEntry(key);
    this.evictIfNeeded(size);

    this.cache.set(key, { entry, size });
    this.currentSize += size;
    return true;
  }

  async delete(key: string): Promise<boolean> {
    return this.deleteEntry(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
    this.currentSize = 0;
  }

  async size(): Promise<number> {
    return this.cache.size;
  }

  async keys(): Promise<string[]> {
    return Array.from(this.cache.keys());
  }

  async close(): Promise<void> {
    this.cache.clear();
    this.currentSize = 0;
  }

  /**
   * Get cache statistics
   */
  getStats(): MemoryEntryStoreStats {
    return {
      entries: this.cache.size,
      sizeBytes: this.currentSize,
      maxSizeBytes: this.maxSize,
      maxEntries: this.maxEntries,
      utilizationPercent: (this.currentSize / this.maxSize) * 100,
    };
  }
}

/**
 * Options for memory entry store
 */
export interface MemoryEntryStoreOptions {
  /** Maximum total size in bytes. Default: 100MB */
  maxSize?: number;
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Maximum size per entry in bytes. Default: 5MB */
  maxEntrySize?: number;
}

export interface MemoryEntryStoreStats {
  entries: number;
  sizeBytes: number;
  maxSizeBytes: number;
  maxEntries: number;
  utilizationPercent: number;
}

/**
 * Create a memory entry store
 */
export function createMemoryEntryStore(options?: MemoryEntryStoreOptions): MemoryEntryStore {
  return new MemoryEntryStore(options);
}
