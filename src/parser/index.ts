/**
 * Parser Module
 *
 * Parse JSON Lines channel dumps into message records.
 */

import type { MessageRecord, ParseLineResult } from '../types'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function invalid(message: string): ParseLineResult {
  return { ok: false, reason: 'invalid_schema', message }
}

/**
 * Validate a decoded line. Unknown fields are kept as they are.
 */
export function toMessageRecord(value: unknown): ParseLineResult {
  if (!isRecord(value)) return invalid('Expected a JSON object')

  const { channel, link, text, timestamp, id } = value
  if (typeof channel !== 'string') return invalid('Field "channel" must be a string')
  if (typeof text !== 'string') return invalid('Field "text" must be a string')
  if (typeof timestamp !== 'string') return invalid('Field "timestamp" must be a string')
  if (typeof id !== 'number' || !Number.isInteger(id)) {
    return invalid('Field "id" must be an integer')
  }
  if (link !== null && typeof link !== 'string') {
    return invalid('Field "link" must be a string or null')
  }

  return { ok: true, message: { ...value, channel, link, text, timestamp, id } }
}

/**
 * Parse a single JSONL line.
 */
export function parseMessageLine(line: string): ParseLineResult {
  const trimmed = line.trim()
  if (!trimmed) {
    return { ok: false, reason: 'empty', message: 'Empty line' }
  }

  let value: unknown
  try {
    value = JSON.parse(trimmed)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return { ok: false, reason: 'invalid_json', message: `Invalid JSON: ${message}` }
  }

  return toMessageRecord(value)
}

export interface ParsedLine {
  /** 1-based */
  readonly lineNumber: number
  readonly result: ParseLineResult
}

/**
 * Parse a JSONL stream line by line. Blank lines are skipped silently;
 * every other line is yielded with its parse result.
 */
export async function* parseMessageStream(
  lines: AsyncIterable<string>
): AsyncIterable<ParsedLine> {
  let lineNumber = 0
  for await (const line of lines) {
    lineNumber++
    const result = parseMessageLine(line)
    if (!result.ok && result.reason === 'empty') continue
    yield { lineNumber, result }
  }
}
