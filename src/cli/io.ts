/**
 * CLI File I/O
 *
 * File reading and writing utilities for the CLI.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

/**
 * Read a UTF-8 text input, stripping a leading byte order mark.
 */
export async function readInputFile(path: string): Promise<string> {
  const content = await readFile(path, 'utf-8')
  return content.startsWith('\uFEFF') ? content.slice(1) : content
}

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * Write pretty-printed JSON to a file, or to stdout when target is 'stdout'.
 */
export async function writeJsonOutput(target: string, value: unknown): Promise<void> {
  const json = JSON.stringify(value, null, 2)
  if (target === 'stdout') {
    console.log(json)
    return
  }
  await ensureDir(dirname(target))
  await writeFile(target, `${json}\n`)
}
