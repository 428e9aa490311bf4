/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'

export type CommandName = 'transform' | 'geojson' | 'locate' | 'help'

export interface CLIArgs {
  command: CommandName
  /** Input directory, or the message text for `locate` */
  input: string
  outputDir: string
  referencePath: string | undefined
  skipGeocoding: boolean
  concurrency: string | undefined
  rateLimit: string | undefined
  channel: string
  quiet: boolean
  verbose: boolean
  cacheDir: string | undefined
}

export const DEFAULT_UNPROCESSED_DIR = 'data/unprocessed'
export const DEFAULT_PROCESSED_DIR = 'data/processed'
export const DEFAULT_GEOJSON_DIR = 'data/geojson'

const DESCRIPTION = `Geolocate channel messages and export them for map rendering.

Each message goes through a cascade of strategies: literal coordinates, flag
emoji, geocoded place names and a per-channel country fallback.

Environment:
  MAPBOX_ACCESS_TOKEN          Required unless --skip-geocoding is set
  TG_GEOLOCATE_REFERENCE       Reference data file (default ./countries.yml)
  TG_GEOLOCATE_CACHE_DIR       Cache geocoding responses in this directory
  TG_GEOLOCATE_RATE_LIMIT_MS   Minimum delay between geocoding calls (default 100)

Examples:
  $ tg-geolocate transform data/unprocessed -o data/processed
  $ tg-geolocate geojson data/processed -o data/geojson
  $ tg-geolocate locate "Explosion reported at 50.4501, 30.5234 in Kyiv"`

function createProgram(): Command {
  const program = new Command()
    .name('tg-geolocate')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--cache-dir <dir>', 'Cache geocoding responses (or set TG_GEOLOCATE_CACHE_DIR)')

  // ============ TRANSFORM ============
  program
    .command('transform')
    .description('Geolocate every *.jsonl file in a directory')
    .argument('[inputDir]', 'Directory of raw JSONL dumps', DEFAULT_UNPROCESSED_DIR)
    .option('-o, --output-dir <dir>', 'Output directory', DEFAULT_PROCESSED_DIR)
    .option('-r, --reference <path>', 'Reference data file (or set TG_GEOLOCATE_REFERENCE)')
    .option('--skip-geocoding', 'Only use coordinates, flags and channel fallback')
    .option('--concurrency <num>', 'Files processed in parallel', '1')
    .option('--rate-limit <ms>', 'Minimum delay between geocoding calls')

  // ============ GEOJSON ============
  program
    .command('geojson')
    .description('Convert enhanced_*.jsonl files to GeoJSON')
    .argument('[inputDir]', 'Directory of processed JSONL files', DEFAULT_PROCESSED_DIR)
    .option('-o, --output-dir <dir>', 'Output directory', DEFAULT_GEOJSON_DIR)

  // ============ LOCATE ============
  program
    .command('locate')
    .description('Geolocate a single message and print the result as JSON')
    .argument('<text>', 'Message text')
    .option('--channel <name>', 'Channel the message came from', '')
    .option('-r, --reference <path>', 'Reference data file (or set TG_GEOLOCATE_REFERENCE)')
    .option('--skip-geocoding', 'Only use coordinates, flags and channel fallback')

  return program
}

function isCommandName(name: string): name is CommandName {
  return name === 'transform' || name === 'geojson' || name === 'locate'
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: isCommandName(commandName) ? commandName : 'help',
    input,
    outputDir: typeof opts.outputDir === 'string' ? opts.outputDir : DEFAULT_PROCESSED_DIR,
    referencePath: optionalString(opts.reference),
    skipGeocoding: opts.skipGeocoding === true,
    concurrency: optionalString(opts.concurrency),
    rateLimit: optionalString(opts.rateLimit),
    channel: typeof opts.channel === 'string' ? opts.channel : '',
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    cacheDir: optionalString(opts.cacheDir)
  }
}

interface ParsedHolder {
  args: CLIArgs | null
}

function attachActions(program: Command, parsed: ParsedHolder): void {
  // optsWithGlobals() includes global options from the parent program
  for (const cmd of program.commands) {
    cmd.action((input: string) => {
      parsed.args = buildCLIArgs(cmd.name(), input, cmd.optsWithGlobals())
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()
  const parsed: ParsedHolder = { args: null }
  attachActions(program, parsed)

  program.parse()

  if (!parsed.args) {
    program.help()
  }

  return parsed.args ?? buildCLIArgs('help', '', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()
  const parsed: ParsedHolder = { args: null }
  attachActions(program, parsed)

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    for (const cmd of program.commands) {
      cmd.exitOverride()
      cmd.configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    }
  }

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help, version and usage errors
    if (!parsed.args) {
      return buildCLIArgs('help', '', {})
    }
  }

  return parsed.args ?? buildCLIArgs('help', '', {})
}
