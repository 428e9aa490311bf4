/**
 * Filesystem-based Response Cache for CLI
 *
 * Stores cached API responses as JSON files. Entries never expire.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import type { CachedResponse, ResponseCache } from './types'

function isCachedResponse(value: unknown): value is CachedResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'data' in value &&
    'cachedAt' in value &&
    typeof value.cachedAt === 'number'
  )
}

/**
 * Directory structure:
 * ```
 * <cacheDir>/requests/
 * ├── geo/mapbox/
 * │   └── 3a7bd3e2...json
 * ├── ab/
 * │   └── abcd1234...json
 * ```
 *
 * Keys containing '/' map to subdirectories; other keys use their first
 * 2 chars as a prefix directory.
 */
export class FilesystemCache implements ResponseCache {
  constructor(private readonly cacheDir: string) {}

  async get(key: string): Promise<CachedResponse | null> {
    const path = this.getCachePath(key)

    if (!existsSync(path)) {
      return null
    }

    try {
      const entry: unknown = JSON.parse(readFileSync(path, 'utf-8'))
      if (typeof entry === 'object' && entry !== null && 'response' in entry) {
        return isCachedResponse(entry.response) ? entry.response : null
      }
      return null
    } catch {
      // Corrupt entries behave as misses and are overwritten on the next set()
      return null
    }
  }

  async set<T>(key: string, response: CachedResponse<T>): Promise<void> {
    const path = this.getCachePath(key)

    const dir = dirname(path)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }

    const entry = { response, cachedAt: Date.now() }
    writeFileSync(path, JSON.stringify(entry, null, 2))
  }

  private getCachePath(key: string): string {
    if (key.includes('/')) {
      return join(this.cacheDir, 'requests', `${key}.json`)
    }
    const prefix = key.slice(0, 2)
    return join(this.cacheDir, 'requests', prefix, `${key}.json`)
  }
}
