/**
 * Locate Command
 *
 * Runs the pipeline on one message and prints the serialized result.
 */

import { serializeGeolocation } from '../../pipeline/index'
import type { SerializedGeolocation } from '../../types'
import type { CLIArgs } from '../args'
import { resolveRuntimeConfig } from '../config'
import type { Logger } from '../logger'
import { type CommandOverrides, createPipeline } from '../pipeline'

export async function cmdLocate(
  args: CLIArgs,
  logger: Logger,
  overrides: CommandOverrides = {}
): Promise<SerializedGeolocation> {
  if (!args.input) {
    throw new Error('No message text specified')
  }

  const config = resolveRuntimeConfig(args, overrides.env)
  const pipeline = await createPipeline(config, logger, overrides.geocoder)

  const result = serializeGeolocation(
    await pipeline.locate({ text: args.input, channel: args.channel })
  )
  console.log(JSON.stringify(result, null, 2))
  return result
}
