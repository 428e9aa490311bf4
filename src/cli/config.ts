/**
 * CLI Configuration
 *
 * Merges command-line flags, environment variables and defaults into the
 * runtime settings for a run. Flags win over the environment, which wins
 * over defaults.
 */

import { DEFAULT_RATE_LIMIT_MS } from '../geocoder/index'
import { DEFAULT_REFERENCE_PATH } from '../reference/index'
import type { CLIArgs } from './args'

export const ENV_ACCESS_TOKEN = 'MAPBOX_ACCESS_TOKEN'
export const ENV_REFERENCE = 'TG_GEOLOCATE_REFERENCE'
export const ENV_CACHE_DIR = 'TG_GEOLOCATE_CACHE_DIR'
export const ENV_RATE_LIMIT_MS = 'TG_GEOLOCATE_RATE_LIMIT_MS'

export type Env = Readonly<Record<string, string | undefined>>

export interface RuntimeConfig {
  /** null when geocoding is skipped */
  readonly accessToken: string | null
  readonly referencePath: string
  /** null disables response caching */
  readonly cacheDir: string | null
  readonly rateLimitMs: number
  readonly concurrency: number
  readonly skipGeocoding: boolean
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function parseInteger(label: string, value: string, min: number): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`Invalid ${label}: "${value}" (expected an integer >= ${min})`)
  }
  return parsed
}

/**
 * Resolve settings for a command.
 *
 * @throws Error when geocoding is enabled without an access token, or a
 *   numeric setting is malformed
 */
export function resolveRuntimeConfig(args: CLIArgs, env: Env = process.env): RuntimeConfig {
  const skipGeocoding = args.skipGeocoding || args.command === 'geojson'

  const accessToken = nonEmpty(env[ENV_ACCESS_TOKEN]) ?? null
  if (!skipGeocoding && !accessToken) {
    throw new Error(
      `${ENV_ACCESS_TOKEN} environment variable not set (use --skip-geocoding to run without it)`
    )
  }

  const rateLimit = args.rateLimit ?? nonEmpty(env[ENV_RATE_LIMIT_MS])

  return {
    accessToken: skipGeocoding ? null : accessToken,
    referencePath: args.referencePath ?? nonEmpty(env[ENV_REFERENCE]) ?? DEFAULT_REFERENCE_PATH,
    cacheDir: args.cacheDir ?? nonEmpty(env[ENV_CACHE_DIR]) ?? null,
    rateLimitMs:
      rateLimit === undefined ? DEFAULT_RATE_LIMIT_MS : parseInteger('rate limit', rateLimit, 0),
    concurrency:
      args.concurrency === undefined ? 1 : parseInteger('concurrency', args.concurrency, 1),
    skipGeocoding
  }
}
