/**
 * Geolocation Pipeline
 *
 * Runs the stages in priority order and stops at the first match. Every
 * stage's diagnostic lines are accumulated into one attempts log, and the
 * result is built once at the end.
 */

import type {
  Geocoder,
  GeolocationResult,
  GeolocationStage,
  MessageRecord,
  MessageText,
  ProcessedMessage,
  ReferenceData,
  SerializedGeolocation,
  StageMatch
} from '../types'
import {
  ChannelFallbackStage,
  CoordinatesStage,
  EntityStage,
  FlagStage,
  PlaceNameStage
} from './stages'

export * from './stages'

export const PROCESSING_VERSION = 'enhanced_v1'

export interface PipelineOptions {
  readonly reference: ReferenceData
  /** Without a geocoder the entity and place-name stages are skipped */
  readonly geocoder?: Geocoder | null | undefined
}

/**
 * The default cascade: coordinates, flag, entities, place name, channel.
 */
export function createStages(options: PipelineOptions): GeolocationStage[] {
  const geocoder = options.geocoder ?? null
  return [
    new CoordinatesStage(),
    new FlagStage(options.reference),
    new EntityStage(geocoder),
    new PlaceNameStage(geocoder),
    new ChannelFallbackStage(options.reference)
  ]
}

function toResult(match: StageMatch, attempts: readonly string[]): GeolocationResult {
  return {
    lat: match.lat,
    lon: match.lon,
    countryCode: match.countryCode,
    confidence: match.confidence,
    source: match.source,
    placeName: match.placeName,
    geocodingAttempts: attempts
  }
}

export class GeolocationPipeline {
  constructor(private readonly stages: readonly GeolocationStage[]) {}

  static create(options: PipelineOptions): GeolocationPipeline {
    return new GeolocationPipeline(createStages(options))
  }

  async locate(message: MessageText): Promise<GeolocationResult> {
    const attempts: string[] = []

    for (const stage of this.stages) {
      const outcome = await stage.attempt(message)
      attempts.push(...outcome.attempts)
      if (outcome.match) {
        return toResult(outcome.match, attempts)
      }
    }

    attempts.push('No geolocation found')
    return { confidence: 0, source: 'none', geocodingAttempts: attempts }
  }
}

/**
 * Wire form: snake_case keys, absent values as null.
 */
export function serializeGeolocation(result: GeolocationResult): SerializedGeolocation {
  return {
    lat: result.lat ?? null,
    lon: result.lon ?? null,
    country_code: result.countryCode ?? null,
    confidence: result.confidence,
    source: result.source,
    place_name: result.placeName ?? null,
    geocoding_attempts: result.geocodingAttempts
  }
}

/**
 * Geolocate one message and attach the result. Original fields, including
 * unknown ones, are kept as they are.
 */
export async function processMessage(
  message: MessageRecord,
  pipeline: GeolocationPipeline,
  now: () => Date = () => new Date()
): Promise<ProcessedMessage> {
  const result = await pipeline.locate({ text: message.text, channel: message.channel })
  return {
    ...message,
    geolocation: serializeGeolocation(result),
    processed_at: now().toISOString(),
    processing_version: PROCESSING_VERSION
  }
}
