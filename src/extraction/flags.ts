/**
 * Flag Symbol Resolver
 *
 * Maps flag emoji in message text to country codes and centroids.
 */

import type { Coordinates, ReferenceData } from '../types'

/**
 * Every country whose flag appears in the text, in mapping order.
 *
 * Mapping order, not the order flags appear in the text, decides which
 * country comes first.
 */
export function findFlagCountries(text: string, reference: ReferenceData): string[] {
  const countries: string[] = []
  for (const [flag, countryCode] of reference.flagToCountry) {
    if (text.includes(flag)) {
      countries.push(countryCode)
    }
  }
  return countries
}

export function getCountryCentroid(
  countryCode: string,
  reference: ReferenceData
): Coordinates | null {
  return reference.countryCentroids.get(countryCode) ?? null
}

export interface FlagResolution {
  readonly countryCode: string
  /** null when the country has no registered centroid */
  readonly centroid: Coordinates | null
}

/**
 * Resolve the authoritative (first by mapping order) flag in the text.
 */
export function resolveFlag(text: string, reference: ReferenceData): FlagResolution | null {
  const [countryCode] = findFlagCountries(text, reference)
  if (!countryCode) return null
  return { countryCode, centroid: getCountryCentroid(countryCode, reference) }
}
