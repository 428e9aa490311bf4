/**
 * Reference Data
 *
 * Loads the flag → country, country → centroid and channel → country tables
 * from a YAML file (JSON is valid YAML too).
 *
 * A missing or malformed file never throws: the affected tables come back
 * empty, so flag and channel lookups simply never match, and the problem is
 * reported through `onWarning`.
 */

import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import { isValidCoordinate } from '../extraction/coordinates'
import type { Coordinates, ReferenceData } from '../types'

export const DEFAULT_REFERENCE_PATH = './countries.yml'

/**
 * Channels with a well-known regional focus. Used when the reference file
 * has no `channel_to_country` section.
 */
export const DEFAULT_CHANNEL_COUNTRIES: Readonly<Record<string, string>> = {
  militarysummary: 'UKR',
  ClashReport: 'UKR',
  ukraine_world: 'UKR',
  russia_news: 'RUS',
  middle_east_news: 'ISR'
}

export interface ReferenceLoadOptions {
  readonly onWarning?: ((message: string) => void) | undefined
}

type Warn = (message: string) => void

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toCoordinates(value: unknown): Coordinates | null {
  if (!isRecord(value)) return null
  const { lat, lon } = value
  if (typeof lat !== 'number' || typeof lon !== 'number') return null
  if (!isValidCoordinate(lat, lon)) return null
  return { lat, lon }
}

function readStringTable(section: string, value: unknown, warn: Warn): Map<string, string> {
  const table = new Map<string, string>()
  if (!isRecord(value)) {
    warn(`Reference data: "${section}" is missing or not a mapping`)
    return table
  }

  for (const [key, code] of Object.entries(value)) {
    if (typeof code === 'string' && code.trim()) {
      table.set(key, code.trim())
    } else {
      warn(`Reference data: skipping ${section} entry "${key}" (expected a country code)`)
    }
  }
  return table
}

function readCentroids(value: unknown, warn: Warn): Map<string, Coordinates> {
  const centroids = new Map<string, Coordinates>()
  if (!isRecord(value)) {
    warn('Reference data: "country_centroids" is missing or not a mapping')
    return centroids
  }

  for (const [code, raw] of Object.entries(value)) {
    const coords = toCoordinates(raw)
    if (coords) {
      centroids.set(code, coords)
    } else {
      warn(`Reference data: skipping centroid "${code}" (expected valid {lat, lon})`)
    }
  }
  return centroids
}

export function emptyReferenceData(): ReferenceData {
  return {
    flagToCountry: new Map(),
    countryCentroids: new Map(),
    channelToCountry: new Map(Object.entries(DEFAULT_CHANNEL_COUNTRIES))
  }
}

/**
 * Parse reference data from YAML text.
 */
export function parseReferenceData(
  content: string,
  options: ReferenceLoadOptions = {}
): ReferenceData {
  const warn: Warn = options.onWarning ?? (() => undefined)

  let data: unknown
  try {
    data = parseYaml(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    warn(`Reference data is not valid YAML: ${message}`)
    return emptyReferenceData()
  }

  if (!isRecord(data)) {
    warn('Reference data must be a mapping with flag_to_country and country_centroids')
    return emptyReferenceData()
  }

  const channelToCountry =
    data.channel_to_country === undefined
      ? new Map(Object.entries(DEFAULT_CHANNEL_COUNTRIES))
      : readStringTable('channel_to_country', data.channel_to_country, warn)

  return {
    flagToCountry: readStringTable('flag_to_country', data.flag_to_country, warn),
    countryCentroids: readCentroids(data.country_centroids, warn),
    channelToCountry
  }
}

/**
 * Load reference data from a file.
 */
export async function loadReferenceData(
  path: string = DEFAULT_REFERENCE_PATH,
  options: ReferenceLoadOptions = {}
): Promise<ReferenceData> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    options.onWarning?.(`Could not read reference data ${path}: ${message}`)
    return emptyReferenceData()
  }

  return parseReferenceData(content, options)
}

/**
 * Country code for a channel, or null for channels without a known focus.
 */
export function resolveChannel(channel: string, reference: ReferenceData): string | null {
  return reference.channelToCountry.get(channel) ?? null
}
