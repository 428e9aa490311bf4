/**
 * GeoJSON Command
 *
 * Converts enhanced_*.jsonl files into per-file GeoJSON plus one combined
 * FeatureCollection.
 */

import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  COMBINED_GEOJSON_FILENAME,
  type ConvertedMessages,
  convertProcessedLines,
  createCombinedCollection,
  createFileCollection,
  exportToGeoJSON,
  formatGeolocationRate
} from '../../export/geojson'
import type { CLIArgs } from '../args'
import { assertDirectory, ensureDir, listFiles, readLines } from '../io'
import type { Logger } from '../logger'
import type { CommandOverrides } from '../pipeline'

export function geojsonNameFor(inputName: string): string {
  return inputName.replace(/^enhanced_/, '').replace(/\.jsonl$/, '.geojson')
}

export async function cmdGeojson(
  args: CLIArgs,
  logger: Logger,
  overrides: CommandOverrides = {}
): Promise<void> {
  await assertDirectory(args.input)

  const files = await listFiles(
    args.input,
    (name) => name.startsWith('enhanced_') && name.endsWith('.jsonl')
  )
  if (files.length === 0) {
    logger.log(`No enhanced JSONL files found in ${args.input}`)
    return
  }

  await ensureDir(args.outputDir)
  const processedAt = overrides.now?.() ?? new Date()
  logger.log(`Converting ${files.length} file(s) to GeoJSON...`)

  const parts: Array<{ sourceFile: string; converted: ConvertedMessages }> = []
  for (const file of files) {
    const converted = await convertProcessedLines(
      readLines(join(args.input, file)),
      (line, message) => logger.warn(`${file}:${line}: ${message}`)
    )
    const outputPath = join(args.outputDir, geojsonNameFor(file))
    await writeFile(
      outputPath,
      exportToGeoJSON(createFileCollection(join(args.input, file), converted, processedAt))
    )
    parts.push({ sourceFile: file, converted })

    const rate = formatGeolocationRate(converted.geolocatedMessages, converted.totalMessages)
    logger.success(
      `${file}: ${converted.totalMessages} messages, ${converted.geolocatedMessages} geolocated ` +
        `(${rate}) → ${outputPath}`
    )
  }

  const combined = createCombinedCollection(parts, processedAt)
  const combinedPath = join(args.outputDir, COMBINED_GEOJSON_FILENAME)
  await writeFile(combinedPath, exportToGeoJSON(combined))

  const { total_messages, geolocated_messages, geolocation_rate } = combined.properties
  logger.log(
    `\nTotal: ${total_messages} messages, ${geolocated_messages} geolocated (${geolocation_rate})`
  )
  logger.log(`Combined GeoJSON: ${combinedPath}`)
}
