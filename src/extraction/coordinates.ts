/**
 * Coordinate Extractor
 *
 * Recognizes literal coordinates written into message text.
 */

import type { Coordinates } from '../types'
import { COORDINATE_PATTERNS } from './patterns'

export function isValidCoordinate(lat: number, lon: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lon) &&
    lat >= -90 &&
    lat <= 90 &&
    lon >= -180 &&
    lon <= 180
  )
}

function dmsToDecimal(degrees: string, minutes: string, seconds: string): number {
  return (
    Number.parseInt(degrees, 10) +
    Number.parseInt(minutes, 10) / 60 +
    Number.parseFloat(seconds) / 3600
  )
}

function parseMatch(name: string, match: RegExpMatchArray): Coordinates | null {
  if (name === 'dms') {
    const [, latDeg, latMin, latSec, latDir, lonDeg, lonMin, lonSec, lonDir] = match
    if (!latDeg || !latMin || !latSec || !lonDeg || !lonMin || !lonSec) return null

    const latMagnitude = dmsToDecimal(latDeg, latMin, latSec)
    const lonMagnitude = dmsToDecimal(lonDeg, lonMin, lonSec)
    return {
      lat: latDir === 'S' ? -latMagnitude : latMagnitude,
      lon: lonDir === 'W' ? -lonMagnitude : lonMagnitude
    }
  }

  const [, lat, lon] = match
  if (!lat || !lon) return null
  return { lat: Number.parseFloat(lat), lon: Number.parseFloat(lon) }
}

/**
 * Extract the first valid coordinate pair from text.
 *
 * Notations are tried in priority order (decimal, DMS, labeled). Only the
 * first occurrence of each notation is considered; if it is out of range the
 * next notation is tried.
 */
export function extractCoordinates(text: string): Coordinates | null {
  for (const { name, pattern } of COORDINATE_PATTERNS) {
    const match = text.match(pattern)
    if (!match) continue

    const coords = parseMatch(name, match)
    if (coords && isValidCoordinate(coords.lat, coords.lon)) {
      return coords
    }
  }

  return null
}
