/**
 * Candidate Geocoding
 *
 * Geocode every extracted location candidate and pick the strongest match.
 */

import type { Geocoder, LocationCandidate, StageMatch } from '../types'

/** A best candidate must score strictly above this to be accepted */
export const ENTITY_ACCEPT_THRESHOLD = 0.3

export interface CandidateGeocode {
  readonly candidate: LocationCandidate
  readonly match: StageMatch | null
  /** Pattern weight × upstream relevance; 0 when geocoding failed */
  readonly confidence: number
  readonly attempts: readonly string[]
}

/**
 * Geocode candidates one at a time, in order.
 */
export async function geocodeCandidates(
  candidates: readonly LocationCandidate[],
  geocoder: Geocoder
): Promise<CandidateGeocode[]> {
  const results: CandidateGeocode[] = []

  for (const candidate of candidates) {
    const attempts = [`LLM extracted: ${candidate.query}`]
    const geocoded = await geocoder.geocode(candidate.query)

    if (!geocoded) {
      attempts.push('Geocoding failed')
      results.push({ candidate, match: null, confidence: 0, attempts })
      continue
    }

    const confidence = candidate.confidence * geocoded.relevance
    attempts.push(`Geocoded successfully: ${geocoded.placeName}`)
    results.push({
      candidate,
      match: {
        lat: geocoded.lat,
        lon: geocoded.lon,
        placeName: geocoded.placeName,
        confidence,
        source: `llm_geocoding_${candidate.type}`
      },
      confidence,
      attempts
    })
  }

  return results
}

/**
 * Highest-confidence result (first wins ties), or null when none clears
 * ENTITY_ACCEPT_THRESHOLD.
 */
export function selectBestCandidate(
  results: readonly CandidateGeocode[]
): CandidateGeocode | null {
  let best: CandidateGeocode | null = null
  for (const result of results) {
    if (!best || result.confidence > best.confidence) {
      best = result
    }
  }

  if (!best || !best.match || best.confidence <= ENTITY_ACCEPT_THRESHOLD) {
    return null
  }
  return best
}
