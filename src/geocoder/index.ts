/**
 * Geocoder Module
 *
 * Resolve place-name queries to coordinates using the Mapbox Geocoding API.
 */

import countries from 'i18n-iso-countries'
import { generateGeocodeCacheKey } from '../caching/key'
import type { ResponseCache } from '../caching/types'
import { isValidCoordinate } from '../extraction/coordinates'
import { handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { GeocodeMatch, Geocoder, GeocoderConfig, Result } from '../types'
import { RateLimiter, type Sleep } from './rate-limiter'

export {
  type CandidateGeocode,
  ENTITY_ACCEPT_THRESHOLD,
  geocodeCandidates,
  selectBestCandidate
} from './candidates'
export { RateLimiter, type Sleep, sleep } from './rate-limiter'

const MAPBOX_PLACES_URL = 'https://api.mapbox.com/geocoding/v5/mapbox.places'
const PLACE_TYPES = 'place,locality,neighborhood,address'

export const DEFAULT_RATE_LIMIT_MS = 100

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Convert a country hint to the lowercase alpha-2 code Mapbox expects.
 * Accepts alpha-3 ("UKR") or alpha-2 ("UA") input.
 */
export function toMapboxCountry(countryHint: string): string | null {
  const hint = countryHint.trim().toUpperCase()
  if (hint.length === 2) return hint.toLowerCase()
  if (hint.length === 3) return countries.alpha3ToAlpha2(hint)?.toLowerCase() ?? null
  return null
}

function parseFeature(query: string, feature: unknown): GeocodeMatch | null {
  if (!isRecord(feature) || !isRecord(feature.geometry)) return null

  const coordinates: unknown = feature.geometry.coordinates
  if (!Array.isArray(coordinates)) return null

  // GeoJSON order: [lon, lat]
  const [lon, lat]: unknown[] = coordinates
  if (typeof lat !== 'number' || typeof lon !== 'number') return null
  if (!isValidCoordinate(lat, lon)) return null

  const relevance = typeof feature.relevance === 'number' ? feature.relevance : 0
  const placeTypes: unknown = feature.place_type
  const placeType =
    Array.isArray(placeTypes) && typeof placeTypes[0] === 'string' ? placeTypes[0] : 'unknown'

  return {
    lat,
    lon,
    placeName: typeof feature.place_name === 'string' ? feature.place_name : query,
    relevance: Math.min(Math.max(relevance, 0), 1),
    placeType
  }
}

/**
 * Parse a Mapbox forward-geocoding response body.
 * An empty feature list is a successful "no match" (null).
 */
export function parseGeocodingResponse(
  query: string,
  data: unknown
): Result<GeocodeMatch | null> {
  if (!isRecord(data) || !Array.isArray(data.features)) {
    return {
      ok: false,
      error: { type: 'invalid_response', message: `Malformed geocoding response for: ${query}` }
    }
  }

  const features: unknown[] = data.features
  if (features.length === 0) {
    return { ok: true, value: null }
  }

  const match = parseFeature(query, features[0])
  if (!match) {
    return {
      ok: false,
      error: { type: 'invalid_response', message: `Malformed geocoding feature for: ${query}` }
    }
  }

  return { ok: true, value: match }
}

function isGeocodeMatch(value: unknown): value is GeocodeMatch {
  return (
    isRecord(value) &&
    typeof value.lat === 'number' &&
    typeof value.lon === 'number' &&
    typeof value.placeName === 'string' &&
    typeof value.relevance === 'number' &&
    typeof value.placeType === 'string'
  )
}

export interface MapboxGeocoderOptions {
  /** Successful matches are cached; cache hits skip the upstream call and its delay */
  readonly cache?: ResponseCache | undefined
  /** Injected for tests */
  readonly sleep?: Sleep | undefined
  /** Cache write failures; the match is still returned */
  readonly onWarning?: ((message: string) => void) | undefined
}

/**
 * Rate-limited Mapbox forward geocoder.
 *
 * Every upstream call goes through one RateLimiter, so concurrent callers
 * sharing an instance still respect the minimum gap. Failures are reported
 * through `config.onError` and surface as `null`; nothing is retried.
 */
export class MapboxGeocoder implements Geocoder {
  private readonly limiter: RateLimiter

  constructor(
    private readonly config: GeocoderConfig,
    private readonly options: MapboxGeocoderOptions = {}
  ) {
    this.limiter = new RateLimiter(config.rateLimitMs ?? DEFAULT_RATE_LIMIT_MS, options.sleep)
  }

  async geocode(query: string, countryHint?: string): Promise<GeocodeMatch | null> {
    const { cache } = this.options
    const cacheKey = generateGeocodeCacheKey(query, countryHint)

    if (cache) {
      const cached = await cache.get(cacheKey)
      if (cached && isGeocodeMatch(cached.data)) {
        return cached.data
      }
    }

    const result = await this.limiter.schedule(() => this.lookup(query, countryHint))

    if (!result.ok) {
      this.config.onError?.(query, result.error)
      return null
    }

    if (result.value && cache) {
      try {
        await cache.set(cacheKey, { data: result.value, cachedAt: Date.now() })
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        this.options.onWarning?.(`Could not cache geocoding result for "${query}": ${message}`)
      }
    }

    return result.value
  }

  /**
   * Resolves once every pending upstream call and its trailing delay are done.
   */
  idle(): Promise<void> {
    return this.limiter.idle()
  }

  private async lookup(
    query: string,
    countryHint?: string
  ): Promise<Result<GeocodeMatch | null>> {
    const params = new URLSearchParams({
      access_token: this.config.accessToken,
      types: PLACE_TYPES,
      limit: '1'
    })

    const country = countryHint ? toMapboxCountry(countryHint) : null
    if (country) {
      params.set('country', country)
    }

    try {
      const response = await httpFetch(
        `${MAPBOX_PLACES_URL}/${encodeURIComponent(query)}.json?${params.toString()}`
      )

      if (!response.ok) {
        return handleHttpError(response)
      }

      return parseGeocodingResponse(query, await response.json())
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}
