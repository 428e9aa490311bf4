/**
 * CLI Pipeline Setup
 *
 * Builds the reference data, geocoder and pipeline for a run, with every
 * library callback wired to the logger.
 */

import { FilesystemCache } from '../caching/filesystem'
import { MapboxGeocoder } from '../geocoder/index'
import { GeolocationPipeline } from '../pipeline/index'
import { loadReferenceData } from '../reference/index'
import type { Geocoder } from '../types'
import type { Env, RuntimeConfig } from './config'
import type { Logger } from './logger'

export function createGeocoder(config: RuntimeConfig, logger: Logger): MapboxGeocoder | null {
  if (config.skipGeocoding || !config.accessToken) return null

  if (config.cacheDir) {
    logger.verbose(`Caching geocoding responses in ${config.cacheDir}`)
  }

  return new MapboxGeocoder(
    {
      accessToken: config.accessToken,
      rateLimitMs: config.rateLimitMs,
      onError: (query, error) => logger.warn(`Geocoding "${query}" failed: ${error.message}`)
    },
    {
      cache: config.cacheDir ? new FilesystemCache(config.cacheDir) : undefined,
      onWarning: (message) => logger.warn(message)
    }
  )
}

/**
 * Load reference data once and build the pipeline shared by every file.
 * Tests pass their own geocoder.
 */
export async function createPipeline(
  config: RuntimeConfig,
  logger: Logger,
  geocoder: Geocoder | null = createGeocoder(config, logger)
): Promise<GeolocationPipeline> {
  const reference = await loadReferenceData(config.referencePath, {
    onWarning: (message) => logger.warn(message)
  })
  logger.verbose(
    `Reference data: ${reference.flagToCountry.size} flags, ` +
      `${reference.countryCentroids.size} centroids, ${reference.channelToCountry.size} channels`
  )

  if (config.skipGeocoding) {
    logger.verbose('Geocoding disabled')
  }

  return GeolocationPipeline.create({ reference, geocoder: config.skipGeocoding ? null : geocoder })
}

/**
 * Injection points for tests; commands use the real environment otherwise.
 */
export interface CommandOverrides {
  readonly env?: Env | undefined
  /** Replaces the Mapbox geocoder */
  readonly geocoder?: Geocoder | undefined
  readonly now?: (() => Date) | undefined
}
