/**
 * Test Support Module
 *
 * Builders and fakes shared by unit tests. Nothing here touches the network.
 */

import { DEFAULT_CHANNEL_COUNTRIES } from '../reference/index'
import type {
  Coordinates,
  GeocodeMatch,
  Geocoder,
  MessageRecord,
  ReferenceData
} from '../types'

export const UKRAINE_FLAG = '🇺🇦'
export const RUSSIA_FLAG = '🇷🇺'
export const ISRAEL_FLAG = '🇮🇱'

/**
 * Create ReferenceData with a small Ukraine/Russia/Israel table.
 */
export function createReferenceData(
  overrides: {
    flags?: Record<string, string>
    centroids?: Record<string, Coordinates>
    channels?: Record<string, string>
  } = {}
): ReferenceData {
  const flags = overrides.flags ?? {
    [UKRAINE_FLAG]: 'UKR',
    [RUSSIA_FLAG]: 'RUS',
    [ISRAEL_FLAG]: 'ISR'
  }
  const centroids = overrides.centroids ?? {
    UKR: { lat: 49.0, lon: 32.0 },
    RUS: { lat: 61.5, lon: 105.3 },
    ISR: { lat: 31.0, lon: 34.9 }
  }
  return {
    flagToCountry: new Map(Object.entries(flags)),
    countryCentroids: new Map(Object.entries(centroids)),
    channelToCountry: new Map(Object.entries(overrides.channels ?? DEFAULT_CHANNEL_COUNTRIES))
  }
}

/**
 * Create a MessageRecord with default values for testing.
 */
export function createMessage(
  overrides: Partial<MessageRecord> & { text: string }
): MessageRecord {
  return {
    channel: 'test_channel',
    link: 'https://t.me/test_channel/1',
    timestamp: '2025-06-28T19:31:17+00:00',
    id: 1,
    ...overrides
  }
}

/**
 * Create a GeocodeMatch with default values for testing.
 */
export function createMatch(overrides: Partial<GeocodeMatch> = {}): GeocodeMatch {
  return {
    lat: 50.45,
    lon: 30.52,
    placeName: 'Kyiv, Ukraine',
    relevance: 1,
    placeType: 'place',
    ...overrides
  }
}

/**
 * Deterministic in-memory Geocoder. Unknown queries resolve to null.
 */
export class FakeGeocoder implements Geocoder {
  readonly calls: Array<{ query: string; countryHint: string | undefined }> = []

  constructor(private readonly matches: Record<string, GeocodeMatch> = {}) {}

  async geocode(query: string, countryHint?: string): Promise<GeocodeMatch | null> {
    this.calls.push({ query, countryHint })
    return this.matches[query] ?? null
  }
}
