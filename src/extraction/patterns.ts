/**
 * Extraction Patterns
 *
 * Regex patterns for literal coordinates and capitalized place-name phrases.
 */

import type { CandidateType } from '../types'

interface CoordinatePattern {
  readonly name: 'decimal' | 'dms' | 'labeled'
  readonly pattern: RegExp
  readonly description: string
}

/**
 * Coordinate notations, in priority order.
 */
export const COORDINATE_PATTERNS: readonly CoordinatePattern[] = [
  {
    name: 'decimal',
    pattern: /(-?\d+\.\d+),\s*(-?\d+\.\d+)/,
    description: 'Decimal degrees: 40.7128, -74.0060'
  },
  {
    name: 'dms',
    pattern:
      /(\d+)°(\d+)['′](\d+\.?\d*)["″]([NS]),\s*(\d+)°(\d+)['′](\d+\.?\d*)["″]([EW])/,
    description: `Degrees minutes seconds: 40°42'51"N, 74°00'21"W`
  },
  {
    name: 'labeled',
    pattern: /lat:\s*(-?\d+\.\d+).*?lon:\s*(-?\d+\.\d+)/,
    description: 'Labeled: lat: 40.7128, lon: -74.0060'
  }
]

/** One or more capitalized words, e.g. "New York" */
const CAPITALIZED_PHRASE = '[A-Z][a-z]+(?:\\s+[A-Z][a-z]+)*'

interface EntityPattern {
  readonly type: CandidateType
  readonly pattern: RegExp
  /** Weight carried by every candidate this pattern produces */
  readonly confidence: number
}

/**
 * Location entity patterns, evaluated in order and never short-circuited.
 */
export const ENTITY_PATTERNS: readonly EntityPattern[] = [
  {
    type: 'city_country',
    pattern: new RegExp(`(${CAPITALIZED_PHRASE}),\\s*(${CAPITALIZED_PHRASE})`, 'g'),
    confidence: 0.8
  },
  {
    type: 'city_in_country',
    pattern: new RegExp(`(${CAPITALIZED_PHRASE})\\s+in\\s+(${CAPITALIZED_PHRASE})`, 'g'),
    confidence: 0.7
  },
  {
    type: 'city_only',
    pattern: new RegExp(`\\b(${CAPITALIZED_PHRASE})\\b`, 'g'),
    confidence: 0.4
  }
]

/** Capitalized words that are almost never place names */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the',
  'and',
  'for',
  'with',
  'from',
  'this',
  'that'
])

/**
 * Place-name fallback patterns. The second yields "City, Country" pairs.
 */
export const PLACE_NAME_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b(${CAPITALIZED_PHRASE})\\b`, 'g'),
  new RegExp(`\\b(${CAPITALIZED_PHRASE}),\\s*([A-Z][a-z]+)\\b`, 'g')
]
