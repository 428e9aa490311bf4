/**
 * Place Name Extractor
 *
 * Low-precision fallback: every capitalized phrase, plus "City, Country"
 * pairs, deduplicated. Callers must not rely on the order of the result.
 */

import { PLACE_NAME_PATTERNS } from './patterns'

export function extractPlaceNames(text: string): string[] {
  const places = new Set<string>()

  for (const pattern of PLACE_NAME_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const parts = match.slice(1).filter((part): part is string => part !== undefined)
      if (parts.length > 0) {
        places.add(parts.join(', '))
      }
    }
  }

  return [...places]
}
