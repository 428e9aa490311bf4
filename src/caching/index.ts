/**
 * Cache Module
 *
 * Pluggable API response caching to avoid repeated geocoding calls.
 */

export { FilesystemCache } from './filesystem'
export { generateCacheKey, generateGeocodeCacheKey } from './key'
export type { CachedResponse, CacheKeyComponents, ResponseCache } from './types'
