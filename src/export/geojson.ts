/**
 * GeoJSON Export
 *
 * Convert processed message records into Point FeatureCollections for map
 * rendering. Only records whose geolocation has both coordinates become
 * features.
 */

import { isValidCoordinate } from '../extraction/coordinates'

export const MAX_FEATURE_TEXT_LENGTH = 300
export const COMBINED_GEOJSON_FILENAME = 'combined_telegram_data.geojson'

export interface FeatureGeolocation {
  readonly confidence: number
  readonly source: string
  readonly place_name: string | null
  readonly country_code: string | null
  readonly geocoding_attempts: readonly string[]
}

export interface FeatureProperties {
  readonly id: number | null
  readonly timestamp: string | null
  readonly text: string
  readonly link: string | null
  readonly channel: string | null
  readonly geolocation: FeatureGeolocation
  readonly processed_at: string | null
  readonly processing_version: string | null
}

export interface PointFeature {
  readonly type: 'Feature'
  readonly geometry: {
    readonly type: 'Point'
    /** [lon, lat] */
    readonly coordinates: readonly [number, number]
  }
  readonly properties: FeatureProperties
}

interface CollectionStats {
  readonly processed_at: string
  readonly total_messages: number
  readonly geolocated_messages: number
  readonly geolocation_rate: string
}

export type CollectionProperties = CollectionStats &
  ({ readonly source_file: string } | { readonly source_files: readonly string[] })

export interface FeatureCollection {
  readonly type: 'FeatureCollection'
  readonly features: readonly PointFeature[]
  readonly properties: CollectionProperties
}

export interface ConvertedMessages {
  readonly features: PointFeature[]
  /** Every decodable record, geolocated or not */
  readonly totalMessages: number
  readonly geolocatedMessages: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null
}

function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text)
  return chars.length > maxLength ? chars.slice(0, maxLength).join('') : text
}

function readGeolocation(value: Record<string, unknown>): FeatureGeolocation {
  const attempts = value.geocoding_attempts
  return {
    confidence: typeof value.confidence === 'number' ? value.confidence : 0,
    source: typeof value.source === 'string' ? value.source : 'none',
    place_name: stringOrNull(value.place_name),
    country_code: stringOrNull(value.country_code),
    geocoding_attempts: Array.isArray(attempts)
      ? attempts.filter((line): line is string => typeof line === 'string')
      : []
  }
}

/**
 * Build a Point feature from a processed record, or null when it has no
 * usable coordinates.
 */
export function toPointFeature(record: unknown): PointFeature | null {
  if (!isRecord(record) || !isRecord(record.geolocation)) return null

  const { lat, lon } = record.geolocation
  if (typeof lat !== 'number' || typeof lon !== 'number') return null
  if (!isValidCoordinate(lat, lon)) return null

  return {
    type: 'Feature',
    geometry: { type: 'Point', coordinates: [lon, lat] },
    properties: {
      id: typeof record.id === 'number' ? record.id : null,
      timestamp: stringOrNull(record.timestamp),
      text: truncate(stringOrNull(record.text) ?? '', MAX_FEATURE_TEXT_LENGTH),
      link: stringOrNull(record.link),
      channel: stringOrNull(record.channel),
      geolocation: readGeolocation(record.geolocation),
      processed_at: stringOrNull(record.processed_at),
      processing_version: stringOrNull(record.processing_version)
    }
  }
}

/**
 * Geolocated share as a percentage with one decimal, e.g. "33.3%".
 */
export function formatGeolocationRate(geolocated: number, total: number): string {
  if (total === 0) return '0%'
  return `${((geolocated / total) * 100).toFixed(1)}%`
}

/**
 * Read processed JSONL lines. Blank lines are ignored; lines that are not
 * valid JSON are reported and not counted.
 */
export async function convertProcessedLines(
  lines: AsyncIterable<string>,
  onInvalidLine?: (lineNumber: number, message: string) => void
): Promise<ConvertedMessages> {
  const features: PointFeature[] = []
  let totalMessages = 0
  let lineNumber = 0

  for await (const line of lines) {
    lineNumber++
    const trimmed = line.trim()
    if (!trimmed) continue

    let record: unknown
    try {
      record = JSON.parse(trimmed)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      onInvalidLine?.(lineNumber, `Invalid JSON: ${message}`)
      continue
    }

    totalMessages++
    const feature = toPointFeature(record)
    if (feature) {
      features.push(feature)
    }
  }

  return { features, totalMessages, geolocatedMessages: features.length }
}

function collectionStats(
  totalMessages: number,
  geolocatedMessages: number,
  processedAt: Date
): CollectionStats {
  return {
    processed_at: processedAt.toISOString(),
    total_messages: totalMessages,
    geolocated_messages: geolocatedMessages,
    geolocation_rate: formatGeolocationRate(geolocatedMessages, totalMessages)
  }
}

/**
 * FeatureCollection for a single processed file.
 */
export function createFileCollection(
  sourceFile: string,
  converted: ConvertedMessages,
  processedAt: Date = new Date()
): FeatureCollection {
  const { processed_at, ...stats } = collectionStats(
    converted.totalMessages,
    converted.geolocatedMessages,
    processedAt
  )
  return {
    type: 'FeatureCollection',
    features: converted.features,
    properties: { processed_at, source_file: sourceFile, ...stats }
  }
}

/**
 * FeatureCollection merging several files, in the order given.
 */
export function createCombinedCollection(
  parts: ReadonlyArray<{ readonly sourceFile: string; readonly converted: ConvertedMessages }>,
  processedAt: Date = new Date()
): FeatureCollection {
  const features = parts.flatMap((part) => part.converted.features)
  const total = parts.reduce((sum, part) => sum + part.converted.totalMessages, 0)
  return {
    type: 'FeatureCollection',
    features,
    properties: {
      ...collectionStats(total, features.length, processedAt),
      source_files: parts.map((part) => part.sourceFile)
    }
  }
}

export function exportToGeoJSON(collection: FeatureCollection): string {
  return JSON.stringify(collection, null, 2)
}
