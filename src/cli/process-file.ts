/**
 * File Processing
 *
 * Geolocate every message in one JSONL file and write the augmented records
 * to a new JSONL file, one message at a time.
 */

import { open } from 'node:fs/promises'
import { parseMessageStream } from '../parser/index'
import { type GeolocationPipeline, processMessage } from '../pipeline/index'
import { readLines } from './io'

export interface FileStats {
  readonly processed: number
  readonly geolocated: number
  /** Malformed lines and messages that failed unexpectedly */
  readonly skipped: number
}

export interface ProcessFileOptions {
  /** Malformed input line */
  readonly onWarning?: ((lineNumber: number, message: string) => void) | undefined
  /** Unexpected failure while geolocating a message */
  readonly onError?: ((lineNumber: number, error: Error) => void) | undefined
  /** Clock for `processed_at` */
  readonly now?: (() => Date) | undefined
}

export async function processFile(
  inputPath: string,
  outputPath: string,
  pipeline: GeolocationPipeline,
  options: ProcessFileOptions = {}
): Promise<FileStats> {
  let processed = 0
  let geolocated = 0
  let skipped = 0

  const output = await open(outputPath, 'w')
  try {
    for await (const { lineNumber, result } of parseMessageStream(readLines(inputPath))) {
      if (!result.ok) {
        skipped++
        options.onWarning?.(lineNumber, result.message)
        continue
      }

      try {
        const message = await processMessage(result.message, pipeline, options.now)
        await output.write(`${JSON.stringify(message)}\n`)
        processed++
        if (message.geolocation.lat !== null && message.geolocation.lon !== null) {
          geolocated++
        }
      } catch (e) {
        skipped++
        options.onError?.(lineNumber, e instanceof Error ? e : new Error(String(e)))
      }
    }
  } finally {
    await output.close()
  }

  return { processed, geolocated, skipped }
}

export function outputNameFor(inputName: string): string {
  return `enhanced_${inputName}`
}
