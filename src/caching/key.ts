/**
 * Cache Key Generation
 *
 * Generates deterministic SHA256 hash keys for API request caching.
 */

import { createHash } from 'node:crypto'
import type { CacheKeyComponents } from './types'

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value
  }

  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }

  const sorted: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(value).sort(([a], [b]) => a.localeCompare(b))) {
    sorted[key] = sortKeys(entry)
  }
  return sorted
}

/**
 * Generate a deterministic cache key from request components.
 *
 * The key is a SHA256 hash of: service:model:normalized_payload
 */
export function generateCacheKey(components: CacheKeyComponents): string {
  const { service, model, payload } = components
  const normalized = JSON.stringify(sortKeys(payload))
  const input = `${service}:${model}:${normalized}`

  return createHash('sha256').update(input).digest('hex')
}

/**
 * Generate cache key for geocoding requests.
 * Path: geo/mapbox/<hash>.json
 */
export function generateGeocodeCacheKey(query: string, countryHint?: string): string {
  const hash = generateCacheKey({
    service: 'mapbox',
    model: 'mapbox.places',
    payload: { query, countryHint: countryHint ?? null }
  })
  return `geo/mapbox/${hash}`
}
