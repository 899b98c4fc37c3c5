/**
 * Job Monitor
 *
 * Crawl cycle over a JobCrawler and the dedup store: known postings are
 * refreshed, new ones are enriched, saved, and handed to `analyze`.
 */

import { DAY_MS } from '../caching/types'
import { classifyError, type LlmError } from '../llm/errors'
import type {
  AnalyzeFn,
  CrawlCycleOptions,
  CrawlCycleResult,
  JobPosting,
  JobRecord,
  JobStore,
  MonitorStats
} from './types'

export { DEFAULT_PAGE_SIZE, JsonFeedCrawler, type JsonFeedCrawlerOptions } from './feed'
export { FilesystemJobStore, type FilesystemJobStoreOptions, mergeRecords } from './job-store'
export type {
  AnalyzeFn,
  CrawlCycleOptions,
  CrawlCycleResult,
  JobCrawler,
  JobPosting,
  JobRecord,
  JobStatus,
  JobStore,
  MonitorEvent,
  MonitorStats,
  UpsertResult
} from './types'

export const DEFAULT_RETENTION_DAYS = 30
export const DEFAULT_PAGE_LIMIT = 3

export function toJobRecord(posting: JobPosting, now: number): JobRecord {
  return { ...posting, firstSeenAt: now, lastUpdatedAt: now, status: 'active' }
}

/**
 * Run one crawl cycle.
 *
 * Postings are processed in crawl order. A posting seen earlier in the same
 * cycle counts as an update.
 */
export async function runCrawlCycle(options: CrawlCycleOptions): Promise<CrawlCycleResult> {
  const { crawler, store, onEvent } = options
  const now = options.now ?? Date.now

  const postings = await crawler.crawlJobs(options.keywords, options.location, options.pageLimit)
  onEvent?.({ type: 'crawled', count: postings.length })

  let updated = 0
  let filteredByDate = 0
  let analyzeFailed = 0
  const newJobs: JobRecord[] = []

  for (const posting of postings) {
    if (await store.exists(posting.externalId)) {
      const result = await store.upsert(toJobRecord(posting, now()))
      updated++
      onEvent?.({ type: 'job_updated', record: result.record })
      continue
    }

    const enriched = await crawler.enrichJobDetails(posting)
    const seenAt = now()
    if (
      options.onlyToday &&
      enriched.publishedAt !== undefined &&
      !isSameLocalDay(enriched.publishedAt, seenAt)
    ) {
      filteredByDate++
      onEvent?.({ type: 'filtered_by_date', posting: enriched })
      continue
    }

    const { record } = await store.upsert(toJobRecord(enriched, seenAt))
    newJobs.push(record)
    onEvent?.({ type: 'job_created', record })

    if (options.analyze) {
      const failure = await analyzeRecord(options.analyze, record)
      if (failure) {
        analyzeFailed++
        onEvent?.({ type: 'analyze_failed', record, error: failure })
      }
    }
  }

  return {
    crawled: postings.length,
    created: newJobs.length,
    updated,
    filteredByDate,
    analyzeFailed,
    newJobs
  }
}

/** A throw from `analyze` is a failure of that record only. */
async function analyzeRecord(
  analyze: AnalyzeFn,
  record: JobRecord
): Promise<LlmError | undefined> {
  try {
    const analysis = await analyze(record)
    return analysis.ok ? undefined : analysis.error
  } catch (error) {
    return classifyError(error)
  }
}

/**
 * Remove records first seen more than `retentionDays` ago.
 */
export async function cleanupOldJobs(
  store: JobStore,
  retentionDays: number = DEFAULT_RETENTION_DAYS,
  now: number = Date.now()
): Promise<number> {
  if (!(retentionDays >= 0)) {
    throw new RangeError(`Retention must be >= 0 days, got ${retentionDays}`)
  }
  return store.removeOlderThan(now - retentionDays * DAY_MS)
}

export async function getMonitorStats(
  store: JobStore,
  now: number = Date.now()
): Promise<MonitorStats> {
  const all = await store.listAll()
  const weekStart = startOfLocalWeek(now)
  return {
    total: all.length,
    thisWeek: all.filter((record) => record.firstSeenAt >= weekStart).length
  }
}

/**
 * Monday 00:00 local time of the week containing `timestamp`.
 */
export function startOfLocalWeek(timestamp: number): number {
  const date = new Date(timestamp)
  const daysSinceMonday = (date.getDay() + 6) % 7
  date.setHours(0, 0, 0, 0)
  date.setDate(date.getDate() - daysSinceMonday)
  return date.getTime()
}

function isSameLocalDay(a: number, b: number): boolean {
  const da = new Date(a)
  const db = new Date(b)
  return (
    da.getFullYear() === db.getFullYear() &&
    da.getMonth() === db.getMonth() &&
    da.getDate() === db.getDate()
  )
}
