/**
 * CLI File I/O
 *
 * Directory listing, line streaming and output helpers for the CLI.
 */

import { createReadStream } from 'node:fs'
import { mkdir, readdir, stat } from 'node:fs/promises'
import { createInterface } from 'node:readline'

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * @throws Error when the path does not exist or is not a directory
 */
export async function assertDirectory(dir: string): Promise<void> {
  const info = await stat(dir).catch(() => null)
  if (!info?.isDirectory()) {
    throw new Error(`Input directory not found: ${dir}`)
  }
}

/**
 * File names in a directory matching a predicate, sorted by name.
 */
export async function listFiles(
  dir: string,
  matches: (name: string) => boolean
): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && matches(entry.name))
    .map((entry) => entry.name)
    .sort()
}

/**
 * Stream a UTF-8 file line by line.
 */
export function readLines(path: string): AsyncIterable<string> {
  return createInterface({
    input: createReadStream(path, { encoding: 'utf-8' }),
    crlfDelay: Number.POSITIVE_INFINITY
  })
}
