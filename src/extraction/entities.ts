/**
 * Location Entity Extractor
 *
 * Surfaces candidate place names from capitalization patterns. Every pattern
 * class runs, so the same phrase can appear once per class it matches.
 */

import type { LocationCandidate } from '../types'
import { ENTITY_PATTERNS, STOP_WORDS } from './patterns'

function isLikelyPlace(phrase: string): boolean {
  return phrase.length > 2 && !STOP_WORDS.has(phrase.toLowerCase())
}

export function extractLocationEntities(text: string): LocationCandidate[] {
  const candidates: LocationCandidate[] = []

  for (const { type, pattern, confidence } of ENTITY_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const city = match[1]?.trim()
      if (!city) continue

      if (type === 'city_only') {
        if (!isLikelyPlace(city)) continue
        candidates.push({ type, city, country: null, query: city, confidence })
        continue
      }

      const country = match[2]?.trim()
      if (!country) continue
      candidates.push({ type, city, country, query: `${city}, ${country}`, confidence })
    }
  }

  return candidates
}
