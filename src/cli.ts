#!/usr/bin/env node
/**
 * tg-geolocate CLI
 *
 * Local orchestrator for the core library.
 * Handles file I/O, parallel file processing and per-file reporting.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdGeojson } from './cli/commands/geojson'
import { cmdLocate } from './cli/commands/locate'
import { cmdTransform } from './cli/commands/transform'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'transform':
        await cmdTransform(args, logger)
        break

      case 'geojson':
        await cmdGeojson(args, logger)
        break

      case 'locate':
        await cmdLocate(args, logger)
        break

      default:
        logger.error("Unknown command. Run 'tg-geolocate --help' for usage.")
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
