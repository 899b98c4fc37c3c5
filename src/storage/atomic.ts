/**
 * Atomic JSON Files
 *
 * Writes go to a sibling temp file which is then renamed over the target, so
 * readers see either the old or the new document.
 */

import { randomBytes } from 'node:crypto'
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { z } from 'zod'
import { isErrnoCode, StorageError } from './errors'

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const tmpPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(tmpPath, JSON.stringify(value, null, 2))
    await rename(tmpPath, path)
  } catch (error) {
    await rm(tmpPath, { force: true })
    throw new StorageError('write_failed', path, error)
  }
}

/**
 * Read raw text. Missing file → null.
 */
export async function readTextFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) return null
    throw new StorageError('read_failed', path, error)
  }
}

/**
 * Parse a stored document against its schema.
 * Bad JSON or a schema mismatch → StorageError('corrupted').
 */
export function parseStoredJson<T>(
  text: string,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new StorageError('corrupted', path, error)
  }
  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    throw new StorageError('corrupted', path, parsed.error)
  }
  return parsed.data
}

/**
 * Read and validate a JSON document. Missing file → null.
 */
export async function readJsonFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | null> {
  const text = await readTextFile(path)
  if (text === null) return null
  return parseStoredJson(text, path, schema)
}

/**
 * Delete a file. Returns false when it was already gone.
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await rm(path)
    return true
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) return false
    throw new StorageError('write_failed', path, error)
  }
}
