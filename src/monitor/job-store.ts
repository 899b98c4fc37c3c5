/**
 * Filesystem Job Store
 *
 * One JSON file per job record under `<dataDir>/jobs/`, named by the SHA256 of
 * the external id. Writes are atomic renames, so concurrent processes are
 * last-write-wins per record.
 */

import { createHash } from 'node:crypto'
import type { Dirent } from 'node:fs'
import { access, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import {
  parseStoredJson,
  readJsonFile,
  readTextFile,
  removeFile,
  writeJsonAtomic
} from '../storage/atomic'
import { isErrnoCode, StorageError } from '../storage/errors'
import { JobRecordSchema } from './schema'
import type { JobRecord, JobStore, UpsertResult } from './types'

export interface FilesystemJobStoreOptions {
  /**
   * Called for each unreadable record met while listing. Without it, listing
   * throws on the first one.
   */
  readonly onCorrupted?: ((error: StorageError) => void) | undefined
}

export class FilesystemJobStore implements JobStore {
  private readonly jobsDir: string

  constructor(
    dataDir: string,
    private readonly options: FilesystemJobStoreOptions = {}
  ) {
    this.jobsDir = join(dataDir, 'jobs')
  }

  get directory(): string {
    return this.jobsDir
  }

  async exists(externalId: string): Promise<boolean> {
    const path = this.recordPath(externalId)
    try {
      await access(path)
      return true
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return false
      throw new StorageError('read_failed', path, error)
    }
  }

  async get(externalId: string): Promise<JobRecord | null> {
    return readJsonFile(this.recordPath(externalId), JobRecordSchema)
  }

  async upsert(record: JobRecord): Promise<UpsertResult> {
    const existing = await this.get(record.externalId)
    const stored = existing ? mergeRecords(existing, record) : record
    await writeJsonAtomic(this.recordPath(record.externalId), stored)
    return { status: existing ? 'updated' : 'created', record: stored }
  }

  async listAll(): Promise<JobRecord[]> {
    const records: JobRecord[] = []
    for (const entry of await this.readJobsDir()) {
      if (!entry.isFile() || !entry.name.endsWith('.json')) continue
      const record = await this.readListed(join(this.jobsDir, entry.name))
      if (record) records.push(record)
    }
    return records.sort((a, b) => b.firstSeenAt - a.firstSeenAt)
  }

  async listSince(timestamp: number): Promise<JobRecord[]> {
    return (await this.listAll()).filter((record) => record.firstSeenAt >= timestamp)
  }

  async remove(externalId: string): Promise<boolean> {
    return removeFile(this.recordPath(externalId))
  }

  async removeOlderThan(cutoff: number): Promise<number> {
    let removed = 0
    for (const record of await this.listAll()) {
      if (record.firstSeenAt < cutoff && (await this.remove(record.externalId))) {
        removed++
      }
    }
    return removed
  }

  private recordPath(externalId: string): string {
    const hash = createHash('sha256').update(externalId).digest('hex')
    return join(this.jobsDir, `${hash}.json`)
  }

  private async readListed(path: string): Promise<JobRecord | null> {
    const text = await readTextFile(path)
    if (text === null) return null
    try {
      return parseStoredJson(text, path, JobRecordSchema)
    } catch (error) {
      if (error instanceof StorageError && error.kind === 'corrupted' && this.options.onCorrupted) {
        this.options.onCorrupted(error)
        return null
      }
      throw error
    }
  }

  private async readJobsDir(): Promise<Dirent[]> {
    try {
      return await readdir(this.jobsDir, { withFileTypes: true })
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return []
      throw new StorageError('read_failed', this.jobsDir, error)
    }
  }
}

/**
 * Incoming fields win where defined; firstSeenAt always stays the original.
 */
export function mergeRecords(existing: JobRecord, incoming: JobRecord): JobRecord {
  return {
    externalId: existing.externalId,
    title: incoming.title,
    company: incoming.company,
    description: incoming.description ?? existing.description,
    salary: incoming.salary ?? existing.salary,
    city: incoming.city ?? existing.city,
    district: incoming.district ?? existing.district,
    companySize: incoming.companySize ?? existing.companySize,
    industry: incoming.industry ?? existing.industry,
    experience: incoming.experience ?? existing.experience,
    education: incoming.education ?? existing.education,
    skillTags: incoming.skillTags ?? existing.skillTags,
    url: incoming.url ?? existing.url,
    publishedAt: incoming.publishedAt ?? existing.publishedAt,
    firstSeenAt: existing.firstSeenAt,
    lastUpdatedAt: incoming.lastUpdatedAt,
    status: incoming.status
  }
}
