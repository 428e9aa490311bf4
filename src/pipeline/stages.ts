/**
 * Geolocation Stages
 *
 * One class per strategy in the cascade. A stage never throws for "nothing
 * found": it returns `match: null` plus the diagnostic lines explaining why.
 */

import { extractCoordinates } from '../extraction/coordinates'
import { extractLocationEntities } from '../extraction/entities'
import { getCountryCentroid, resolveFlag } from '../extraction/flags'
import { extractPlaceNames } from '../extraction/place-names'
import {
  ENTITY_ACCEPT_THRESHOLD,
  geocodeCandidates,
  selectBestCandidate
} from '../geocoder/candidates'
import { resolveChannel } from '../reference/index'
import { scoreConfidence } from '../scoring/index'
import type {
  Geocoder,
  GeolocationStage,
  MessageText,
  ReferenceData,
  StageName,
  StageOutcome
} from '../types'

export const COORDINATES_CONFIDENCE = 0.95
export const FLAG_CONFIDENCE = 0.85
export const PLACE_NAME_CONFIDENCE = 0.4
export const CHANNEL_FALLBACK_CONFIDENCE = 0.2

/** Entity extraction only runs on text longer than this many characters */
export const MIN_ENTITY_TEXT_LENGTH = 10

/** Length in code points, so an emoji counts once */
function characterCount(text: string): number {
  return Array.from(text).length
}

function miss(...attempts: string[]): StageOutcome {
  return { match: null, attempts }
}

function geocodingDisabled(stage: StageName): StageOutcome {
  return miss(`${stage}: geocoding disabled`)
}

export class CoordinatesStage implements GeolocationStage {
  readonly name: StageName = 'coordinates'

  async attempt({ text }: MessageText): Promise<StageOutcome> {
    const coords = extractCoordinates(text)
    if (!coords) return miss('No coordinates found')

    return {
      match: { ...coords, confidence: COORDINATES_CONFIDENCE, source: 'coordinates_regex' },
      attempts: [`Found coordinates: (${coords.lat}, ${coords.lon})`]
    }
  }
}

export class FlagStage implements GeolocationStage {
  readonly name: StageName = 'flag'

  constructor(private readonly reference: ReferenceData) {}

  async attempt({ text }: MessageText): Promise<StageOutcome> {
    const flag = resolveFlag(text, this.reference)
    if (!flag) return miss('No flag found')
    if (!flag.centroid) return miss(`Found flag: ${flag.countryCode} but no centroid`)

    return {
      match: {
        ...flag.centroid,
        countryCode: flag.countryCode,
        confidence: FLAG_CONFIDENCE,
        source: 'flag_emoji'
      },
      attempts: [`Found flag: ${flag.countryCode}`]
    }
  }
}

/**
 * Extract location entities, geocode all of them and keep the best one.
 * The accepted confidence goes through the scorer.
 */
export class EntityStage implements GeolocationStage {
  readonly name: StageName = 'entities'

  constructor(private readonly geocoder: Geocoder | null) {}

  async attempt({ text }: MessageText): Promise<StageOutcome> {
    if (!this.geocoder) return geocodingDisabled(this.name)
    if (characterCount(text) <= MIN_ENTITY_TEXT_LENGTH) {
      return miss('Text too short for entity extraction')
    }

    const candidates = extractLocationEntities(text)
    if (candidates.length === 0) return miss('No location entities extracted')

    const results = await geocodeCandidates(candidates, this.geocoder)
    const attempts = results.flatMap((result) => result.attempts)

    const best = selectBestCandidate(results)
    if (!best?.match) {
      return miss(...attempts, `No candidate above ${ENTITY_ACCEPT_THRESHOLD} confidence`)
    }

    return {
      match: { ...best.match, confidence: scoreConfidence(best.match) },
      attempts
    }
  }
}

/**
 * Geocode the first capitalized phrase. Confidence is fixed, not scaled by
 * relevance.
 */
export class PlaceNameStage implements GeolocationStage {
  readonly name: StageName = 'place_name'

  constructor(private readonly geocoder: Geocoder | null) {}

  async attempt({ text }: MessageText): Promise<StageOutcome> {
    if (!this.geocoder) return geocodingDisabled(this.name)

    const [placeName] = extractPlaceNames(text)
    if (!placeName) return miss('No place names extracted')

    const geocoded = await this.geocoder.geocode(placeName)
    if (!geocoded) return miss(`Place name not geocoded: ${placeName}`)

    return {
      match: {
        lat: geocoded.lat,
        lon: geocoded.lon,
        placeName: geocoded.placeName,
        confidence: PLACE_NAME_CONFIDENCE,
        source: 'place_name_geocoding'
      },
      attempts: [`Geocoded place: ${placeName}`]
    }
  }
}

export class ChannelFallbackStage implements GeolocationStage {
  readonly name: StageName = 'channel'

  constructor(private readonly reference: ReferenceData) {}

  async attempt({ channel }: MessageText): Promise<StageOutcome> {
    const countryCode = resolveChannel(channel, this.reference)
    if (!countryCode) return miss(`No channel mapping for ${channel}`)

    const centroid = getCountryCentroid(countryCode, this.reference)
    if (!centroid) return miss(`Channel fallback: ${countryCode} has no centroid`)

    return {
      match: {
        ...centroid,
        countryCode,
        confidence: CHANNEL_FALLBACK_CONFIDENCE,
        source: 'channel_fallback'
      },
      attempts: [`Channel fallback: ${countryCode}`]
    }
  }
}
