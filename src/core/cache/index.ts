/**
 * @arch fmtkit.core.barrel
 */
export { HashCache, type HashCacheOptions } from './hash-cache.js';
export {
  CACHE_FILENAME,
  CACHE_VERSION,
  CacheStoreSchema,
  type CacheStore,
  type CacheStats,
} from './types.js';
