/**
 * Transform Command
 *
 * Geolocates every *.jsonl dump in the input directory and writes
 * enhanced_<name>.jsonl files to the output directory.
 */

import { join } from 'node:path'
import { VERSION } from '../../index'
import type { CLIArgs } from '../args'
import { resolveRuntimeConfig } from '../config'
import { assertDirectory, ensureDir, listFiles } from '../io'
import type { Logger } from '../logger'
import { type CommandOverrides, createPipeline } from '../pipeline'
import { type FileStats, outputNameFor, processFile } from '../process-file'
import { runWorkerPool } from '../worker-pool'

function formatStats(stats: FileStats): string {
  const rate = stats.processed > 0 ? (stats.geolocated / stats.processed) * 100 : 0
  const skipped = stats.skipped > 0 ? `, skipped ${stats.skipped}` : ''
  return (
    `Processed ${stats.processed} messages, ` +
    `geolocated ${stats.geolocated} (${rate.toFixed(1)}%)${skipped}`
  )
}

export async function cmdTransform(
  args: CLIArgs,
  logger: Logger,
  overrides: CommandOverrides = {}
): Promise<FileStats> {
  const config = resolveRuntimeConfig(args, overrides.env)
  await assertDirectory(args.input)

  logger.log(`\ntg-geolocate v${VERSION}`)

  const files = await listFiles(args.input, (name) => name.endsWith('.jsonl'))
  if (files.length === 0) {
    logger.log('No unprocessed files found')
    return { processed: 0, geolocated: 0, skipped: 0 }
  }

  await ensureDir(args.outputDir)
  const pipeline = await createPipeline(config, logger, overrides.geocoder)

  logger.log(`Processing ${files.length} file(s) from ${args.input}`)

  const { results } = await runWorkerPool(
    files,
    async (file) => {
      logger.verbose(`Processing ${file}...`)
      const stats = await processFile(
        join(args.input, file),
        join(args.outputDir, outputNameFor(file)),
        pipeline,
        {
          onWarning: (line, message) => logger.warn(`${file}:${line}: ${message}`),
          onError: (line, error) => logger.error(`${file}:${line}: ${error.message}`),
          now: overrides.now
        }
      )
      logger.success(`${file}: ${formatStats(stats)}`)
      return stats
    },
    {
      concurrency: config.concurrency,
      onError: ({ task, error }) => {
        logger.error(`Failed to process ${task}: ${error.message}`)
        return true
      }
    }
  )

  const total = results.reduce<FileStats>(
    (sum, stats) => ({
      processed: sum.processed + (stats?.processed ?? 0),
      geolocated: sum.geolocated + (stats?.geolocated ?? 0),
      skipped: sum.skipped + (stats?.skipped ?? 0)
    }),
    { processed: 0, geolocated: 0, skipped: 0 }
  )

  logger.log(`\nTotal: ${formatStats(total)}`)
  logger.log(`Output: ${args.outputDir}`)
  return total
}
