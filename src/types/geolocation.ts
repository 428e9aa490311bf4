/**
 * Geolocation Types
 *
 * Results, candidates and stage contracts for the inference pipeline.
 */

export interface Coordinates {
  readonly lat: number
  readonly lon: number
}

export type CandidateType = 'city_country' | 'city_in_country' | 'city_only'

export type GeolocationSource =
  | 'coordinates_regex'
  | 'flag_emoji'
  | `llm_geocoding_${CandidateType}`
  | 'place_name_geocoding'
  | 'channel_fallback'
  | 'none'

/**
 * A place-name phrase surfaced from message text.
 */
export interface LocationCandidate {
  readonly type: CandidateType
  readonly city: string
  readonly country: string | null
  /** Text sent to the geocoder */
  readonly query: string
  /** Pattern weight (0-1) */
  readonly confidence: number
}

export interface GeolocationResult {
  readonly lat?: number | undefined
  readonly lon?: number | undefined
  /** ISO 3166-1 alpha-3 */
  readonly countryCode?: string | undefined
  readonly confidence: number
  readonly source: GeolocationSource
  readonly placeName?: string | undefined
  readonly geocodingAttempts: readonly string[]
}

/**
 * Wire form of a GeolocationResult; absent values are written as null.
 */
export interface SerializedGeolocation {
  readonly lat: number | null
  readonly lon: number | null
  readonly country_code: string | null
  readonly confidence: number
  readonly source: GeolocationSource
  readonly place_name: string | null
  readonly geocoding_attempts: readonly string[]
}

/**
 * What a single stage found, before attempts are attached.
 */
export interface StageMatch {
  readonly lat: number
  readonly lon: number
  readonly countryCode?: string | undefined
  readonly placeName?: string | undefined
  readonly confidence: number
  readonly source: Exclude<GeolocationSource, 'none'>
}

export interface StageOutcome {
  readonly match: StageMatch | null
  /** Diagnostic lines this stage appends to the attempts log */
  readonly attempts: readonly string[]
}

export type StageName = 'coordinates' | 'flag' | 'entities' | 'place_name' | 'channel'

/**
 * One strategy in the cascade.
 */
export interface GeolocationStage {
  readonly name: StageName
  attempt(message: MessageText): Promise<StageOutcome>
}

export interface MessageText {
  readonly text: string
  readonly channel: string
}
