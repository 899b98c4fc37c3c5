/**
 * Filesystem-based Parse Cache
 *
 * Stores parse results as JSON files organized by hash prefix. Entries expire
 * lazily: reads ignore entries older than the TTL, cleanup() deletes them.
 */

import { randomBytes } from 'node:crypto'
import type { Dirent } from 'node:fs'
import { link, readdir, rename, rm, stat } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { parseStoredJson, readTextFile, removeFile, writeJsonAtomic } from '../storage/atomic'
import { isErrnoCode, StorageError } from '../storage/errors'
import {
  type CachedResponseMeta,
  type CacheEntry,
  type CacheStats,
  DAY_MS,
  DEFAULT_CACHE_TTL_DAYS,
  type ResponseCache
} from './types'

const ENTRY_VERSION = 1
const VALID_KEY = /^[A-Za-z0-9_-]{2,}$/

const ResponseMetaSchema = z.object({
  model: z.string(),
  provider: z.string(),
  finishReason: z.string().nullable(),
  usage: z.object({
    promptTokens: z.number(),
    completionTokens: z.number(),
    totalTokens: z.number()
  }),
  latencyMs: z.number()
})

const EnvelopeSchema = z.object({
  version: z.literal(ENTRY_VERSION),
  key: z.string(),
  createdAt: z.number().int().nonnegative(),
  response: ResponseMetaSchema.optional(),
  data: z.unknown()
})

type Envelope = z.infer<typeof EnvelopeSchema>

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(cacheDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = join(homedir(), '.cache', 'job-match')
  if (cacheDir.startsWith(realCacheDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${cacheDir}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/job-match/`
    )
  }
}

export interface FilesystemCacheOptions {
  /** Entries older than this are treated as absent */
  readonly ttlMs?: number | undefined
  readonly now?: (() => number) | undefined
}

interface StoredFile {
  readonly path: string
  readonly sizeBytes: number
}

type Inspection =
  | { readonly state: 'missing' }
  | { readonly state: 'corrupted' }
  | { readonly state: 'ok'; readonly envelope: Envelope }

/**
 * Filesystem-based cache implementation for CLI usage.
 *
 * Directory structure:
 * ```
 * ~/.cache/job-match/requests/
 * ├── ab/
 * │   └── abcd1234...json
 * ├── cd/
 * │   └── cdef5678...json
 * ```
 *
 * Uses first 2 chars of the key as subdirectory to avoid too many files in one dir.
 */
export class FilesystemCache implements ResponseCache {
  readonly ttlMs: number
  private readonly now: () => number

  constructor(
    private readonly cacheDir: string,
    options: FilesystemCacheOptions = {}
  ) {
    guardAgainstUserCache(cacheDir)
    const ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_DAYS * DAY_MS
    if (!(ttlMs >= 0)) {
      throw new RangeError(`Cache TTL must be >= 0, got ${ttlMs}`)
    }
    this.ttlMs = ttlMs
    this.now = options.now ?? Date.now
  }

  get directory(): string {
    return this.cacheDir
  }

  async get<T>(
    key: string,
    dataSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<CacheEntry<T> | null> {
    const path = this.getCachePath(key)
    const text = await readTextFile(path)
    if (text === null) return null

    const envelope = parseStoredJson(text, path, EnvelopeSchema)
    if (envelope.key !== key) {
      throw new StorageError('corrupted', path, `entry belongs to key ${envelope.key}`)
    }
    if (this.isExpired(envelope.createdAt)) return null

    const data = dataSchema.safeParse(envelope.data)
    if (!data.success) {
      throw new StorageError('corrupted', path, data.error)
    }
    return {
      key,
      data: data.data,
      response: envelope.response,
      createdAt: envelope.createdAt
    }
  }

  async put<T>(key: string, data: T, response?: CachedResponseMeta): Promise<CacheEntry<T>> {
    const path = this.getCachePath(key)
    const createdAt = this.now()
    const envelope = {
      version: ENTRY_VERSION,
      key,
      createdAt,
      ...(response && { response }),
      data
    }
    await writeJsonAtomic(path, envelope)
    return { key, data, response, createdAt }
  }

  async stats(): Promise<CacheStats> {
    let entryCount = 0
    let totalSizeBytes = 0
    let expiredCount = 0
    let corruptedCount = 0

    for (const file of await this.listFiles()) {
      const inspection = await this.inspect(file.path)
      if (inspection.state === 'missing') continue

      entryCount++
      totalSizeBytes += file.sizeBytes
      if (inspection.state === 'corrupted') {
        corruptedCount++
      } else if (this.isExpired(inspection.envelope.createdAt)) {
        expiredCount++
      }
    }

    return { entryCount, totalSizeBytes, expiredCount, corruptedCount }
  }

  /**
   * Two phases: collect expired and corrupted entries, then move each one
   * aside and check it again. Only the moved-aside copy is ever deleted, so a
   * put() racing with cleanup keeps its entry.
   */
  async cleanup(): Promise<number> {
    const doomed: string[] = []
    for (const file of await this.listFiles()) {
      if (this.isStale(await this.inspect(file.path))) {
        doomed.push(file.path)
      }
    }

    let removed = 0
    for (const path of doomed) {
      if (await this.removeIfStale(path)) {
        removed++
      }
    }
    return removed
  }

  private async removeIfStale(path: string): Promise<boolean> {
    const held = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.deleting`
    try {
      await rename(path, held)
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return false
      throw new StorageError('write_failed', path, error)
    }

    if (this.isStale(await this.inspect(held))) {
      return removeFile(held)
    }

    // Restore it, unless a newer entry has been written in the meantime
    try {
      await link(held, path)
    } catch (error) {
      if (!isErrnoCode(error, 'EEXIST')) {
        throw new StorageError('write_failed', path, error)
      }
    }
    await removeFile(held)
    return false
  }

  private isStale(inspection: Inspection): boolean {
    return (
      inspection.state === 'corrupted' ||
      (inspection.state === 'ok' && this.isExpired(inspection.envelope.createdAt))
    )
  }

  async clear(): Promise<number> {
    const files = await this.listFiles()
    const requestsDir = join(this.cacheDir, 'requests')
    try {
      await rm(requestsDir, { recursive: true, force: true })
    } catch (error) {
      throw new StorageError('write_failed', requestsDir, error)
    }
    return files.length
  }

  private isExpired(createdAt: number): boolean {
    return this.now() - createdAt > this.ttlMs
  }

  private async inspect(path: string): Promise<Inspection> {
    const text = await readTextFile(path)
    if (text === null) return { state: 'missing' }
    try {
      return { state: 'ok', envelope: parseStoredJson(text, path, EnvelopeSchema) }
    } catch (error) {
      if (error instanceof StorageError && error.kind === 'corrupted') {
        return { state: 'corrupted' }
      }
      throw error
    }
  }

  private async listFiles(): Promise<StoredFile[]> {
    const requestsDir = join(this.cacheDir, 'requests')
    const files: StoredFile[] = []

    for (const prefix of await readDirectory(requestsDir)) {
      if (!prefix.isDirectory()) continue
      const prefixDir = join(requestsDir, prefix.name)
      for (const entry of await readDirectory(prefixDir)) {
        if (!entry.isFile() || !entry.name.endsWith('.json')) continue
        const path = join(prefixDir, entry.name)
        const size = await fileSize(path)
        if (size !== null) files.push({ path, sizeBytes: size })
      }
    }
    return files
  }

  /**
   * Get the file path for a cache entry, using the first 2 chars as prefix.
   */
  private getCachePath(key: string): string {
    if (!VALID_KEY.test(key)) {
      throw new RangeError(`Invalid cache key: "${key}"`)
    }
    const prefix = key.slice(0, 2)
    return join(this.cacheDir, 'requests', prefix, `${key}.json`)
  }
}

async function readDirectory(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true })
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) return []
    throw new StorageError('read_failed', dir, error)
  }
}

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) return null
    throw new StorageError('read_failed', path, error)
  }
}
