/**
 * HTTP Utilities
 *
 * Typed fetch wrapper and uniform error mapping for the geocoding client.
 */

import type { Result } from './types'

function isCI(): boolean {
  return process.env.CI === 'true'
}

function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Error thrown when a real HTTP request is made from a CI test run.
 */
class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Tests must mock httpFetch or use a fake Geocoder.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Minimal response surface used by API modules.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when running tests in CI
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (isCI() && isTestMode()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    const retryAfter = response.headers.get('retry-after')
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
      }
    }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}
