import { describe, expect, it } from 'vitest'
import { type CLIArgs, parseArgs } from './args'
import { resolveRuntimeConfig } from './config'

function args(overrides: Partial<CLIArgs> = {}): CLIArgs {
  return { ...parseArgs(['transform'], false), ...overrides }
}

const TOKEN_ENV = { MAPBOX_ACCESS_TOKEN: 'test-token' }

describe('resolveRuntimeConfig', () => {
  it('uses defaults', () => {
    expect(resolveRuntimeConfig(args(), TOKEN_ENV)).toEqual({
      accessToken: 'test-token',
      referencePath: './countries.yml',
      cacheDir: null,
      rateLimitMs: 100,
      concurrency: 1,
      skipGeocoding: false
    })
  })

  it('reads settings from the environment', () => {
    const config = resolveRuntimeConfig(args(), {
      ...TOKEN_ENV,
      TG_GEOLOCATE_REFERENCE: '/etc/countries.yml',
      TG_GEOLOCATE_CACHE_DIR: '/tmp/geo-cache',
      TG_GEOLOCATE_RATE_LIMIT_MS: '500'
    })

    expect(config.referencePath).toBe('/etc/countries.yml')
    expect(config.cacheDir).toBe('/tmp/geo-cache')
    expect(config.rateLimitMs).toBe(500)
  })

  it('prefers flags over the environment', () => {
    const config = resolveRuntimeConfig(
      args({ referencePath: './ref.yml', cacheDir: './cache', rateLimit: '0' }),
      {
        ...TOKEN_ENV,
        TG_GEOLOCATE_REFERENCE: '/etc/countries.yml',
        TG_GEOLOCATE_CACHE_DIR: '/tmp/geo-cache',
        TG_GEOLOCATE_RATE_LIMIT_MS: '500'
      }
    )

    expect(config.referencePath).toBe('./ref.yml')
    expect(config.cacheDir).toBe('./cache')
    expect(config.rateLimitMs).toBe(0)
  })

  it('requires a token when geocoding is enabled', () => {
    expect(() => resolveRuntimeConfig(args(), {})).toThrow(
      'MAPBOX_ACCESS_TOKEN environment variable not set'
    )
    expect(() => resolveRuntimeConfig(args(), { MAPBOX_ACCESS_TOKEN: '  ' })).toThrow(
      'MAPBOX_ACCESS_TOKEN'
    )
  })

  it('does not need a token when geocoding is skipped', () => {
    const config = resolveRuntimeConfig(args({ skipGeocoding: true }), TOKEN_ENV)

    expect(config.skipGeocoding).toBe(true)
    expect(config.accessToken).toBeNull()
  })

  it('never geocodes for the geojson command', () => {
    const config = resolveRuntimeConfig(args({ command: 'geojson' }), {})

    expect(config.skipGeocoding).toBe(true)
  })

  it('rejects malformed numbers', () => {
    expect(() => resolveRuntimeConfig(args({ concurrency: '0' }), TOKEN_ENV)).toThrow(
      'Invalid concurrency: "0" (expected an integer >= 1)'
    )
    expect(() =>
      resolveRuntimeConfig(args(), { ...TOKEN_ENV, TG_GEOLOCATE_RATE_LIMIT_MS: 'fast' })
    ).toThrow('Invalid rate limit: "fast" (expected an integer >= 0)')
  })
})
