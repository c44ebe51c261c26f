/**
 * Cache entry store implementations
 */

export {
  MemoryEntryStore,
  createMemoryEntryStore,
  type MemoryEntryStoreOptions,
  type MemoryEntryStoreStats,
} from './memory.mjs';
