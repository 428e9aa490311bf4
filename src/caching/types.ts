/**
 * API Response Caching Types
 *
 * Pluggable caching interface so repeated runs over the same messages do not
 * re-query the geocoding service.
 */

/**
 * Cached response wrapper with metadata. `data` is untyped on the way out:
 * readers validate it before use.
 */
export interface CachedResponse<T = unknown> {
  readonly data: T
  readonly cachedAt: number
}

export interface ResponseCache {
  /**
   * Get cached response by key
   * @returns Cached response or null if not found
   */
  get(key: string): Promise<CachedResponse | null>

  set<T>(key: string, response: CachedResponse<T>): Promise<void>
}

/**
 * Cache key components for generating deterministic hash
 */
export interface CacheKeyComponents {
  /** Service name, e.g. 'mapbox' */
  readonly service: string
  /** Endpoint, e.g. 'mapbox.places' */
  readonly model: string
  /** Request payload (will be JSON stringified with sorted keys) */
  readonly payload: unknown
}
