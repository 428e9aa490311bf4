/**
 * CLI Logger
 *
 * Leveled console output for the CLI. Warnings and errors go to stderr and
 * are never silenced by --quiet.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
}

export interface LogOutput {
  readonly stdout: (line: string) => void
  readonly stderr: (line: string) => void
}

const consoleOutput: LogOutput = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line)
}

export function createLogger(
  quiet: boolean,
  verbose: boolean,
  output: LogOutput = consoleOutput
): Logger {
  const info = (line: string): void => {
    if (!quiet) output.stdout(line)
  }

  return {
    log: info,
    verbose: (msg: string) => {
      if (verbose) output.stdout(`  [debug] ${msg}`)
    },
    success: (msg: string) => info(`  ✓ ${msg}`),
    warn: (msg: string) => output.stderr(`  ⚠ ${msg}`),
    error: (msg: string) => output.stderr(`  ✗ ${msg}`)
  }
}
