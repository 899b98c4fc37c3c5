/**
 * Cache Module
 *
 * Content-addressed, TTL'd cache of LLM parse results.
 */

export { FilesystemCache, type FilesystemCacheOptions } from './filesystem'
export {
  generateCacheKey,
  generateParseCacheKey,
  normalizeSourceText,
  type ParseCacheKeyInput,
  type ParseKind
} from './key'
export {
  type CachedResponseMeta,
  type CacheEntry,
  type CacheKeyComponents,
  type CacheStats,
  DAY_MS,
  DEFAULT_CACHE_TTL_DAYS,
  type ResponseCache
} from './types'
