/**
 * Geocoder Types
 *
 * Types for the remote place-name resolver and its matches.
 */

import type { ApiError } from './common'

export interface GeocodeMatch {
  readonly lat: number
  readonly lon: number
  readonly placeName: string
  /** Upstream relevance score (0-1) */
  readonly relevance: number
  readonly placeType: string
}

/**
 * Resolves a free-text query to its best match.
 *
 * Implementations never throw for upstream failures: a failed or empty
 * lookup is `null` and callers treat it as "no match".
 */
export interface Geocoder {
  geocode(query: string, countryHint?: string): Promise<GeocodeMatch | null>
}

export interface GeocoderConfig {
  readonly accessToken: string
  /** Minimum delay between upstream calls in ms (default 100) */
  readonly rateLimitMs?: number | undefined
  /** Called for every failed lookup (network, HTTP status, malformed body) */
  readonly onError?: ((query: string, error: ApiError) => void) | undefined
}
