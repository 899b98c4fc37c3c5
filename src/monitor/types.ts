/**
 * Monitor Types
 *
 * Job postings as a crawler reports them, and the records the dedup store keeps.
 */

import type { LlmError } from '../llm/errors'
import type { Result } from '../types/common'

export type JobStatus = 'active' | 'closed' | 'expired'

/**
 * A posting as observed on the job board.
 */
export interface JobPosting {
  /** Board-assigned identifier, unique per posting */
  readonly externalId: string
  readonly title: string
  readonly company: string
  /** Full description, usually only present after enrichment */
  readonly description?: string | undefined
  /** Salary as displayed, e.g. "25-40K·14薪" */
  readonly salary?: string | undefined
  readonly city?: string | undefined
  readonly district?: string | undefined
  readonly companySize?: string | undefined
  readonly industry?: string | undefined
  readonly experience?: string | undefined
  readonly education?: string | undefined
  readonly skillTags?: readonly string[] | undefined
  readonly url?: string | undefined
  /** Epoch ms */
  readonly publishedAt?: number | undefined
}

/**
 * A posting as stored, with its observation history.
 */
export interface JobRecord extends JobPosting {
  /** Epoch ms of the first observation; never changes after creation */
  readonly firstSeenAt: number
  /** Epoch ms of the most recent observation */
  readonly lastUpdatedAt: number
  readonly status: JobStatus
}

export interface UpsertResult {
  readonly status: 'created' | 'updated'
  readonly record: JobRecord
}

/**
 * Dedup store: at most one record per externalId.
 */
export interface JobStore {
  exists(externalId: string): Promise<boolean>
  get(externalId: string): Promise<JobRecord | null>
  /** Create, or merge into the existing record keeping its firstSeenAt */
  upsert(record: JobRecord): Promise<UpsertResult>
  /** Newest firstSeenAt first */
  listAll(): Promise<JobRecord[]>
  /** Records with firstSeenAt >= timestamp */
  listSince(timestamp: number): Promise<JobRecord[]>
  remove(externalId: string): Promise<boolean>
  /** Delete records first seen before `cutoff`; returns how many were removed */
  removeOlderThan(cutoff: number): Promise<number>
}

/**
 * Job board crawler. The browser-driven implementation lives outside this package.
 */
export interface JobCrawler {
  crawlJobs(keywords: string, location: string, pageLimit: number): Promise<readonly JobPosting[]>
  /** Fill in detail-page fields (description, publishedAt, ...) */
  enrichJobDetails(posting: JobPosting): Promise<JobPosting>
}

/** Cache-backed analysis run on each newly saved record */
export type AnalyzeFn = (record: JobRecord) => Promise<Result<unknown, LlmError>>

export type MonitorEvent =
  | { readonly type: 'crawled'; readonly count: number }
  | { readonly type: 'job_created'; readonly record: JobRecord }
  | { readonly type: 'job_updated'; readonly record: JobRecord }
  | { readonly type: 'filtered_by_date'; readonly posting: JobPosting }
  | { readonly type: 'analyze_failed'; readonly record: JobRecord; readonly error: LlmError }

export interface CrawlCycleOptions {
  readonly crawler: JobCrawler
  readonly store: JobStore
  readonly keywords: string
  readonly location: string
  readonly pageLimit: number
  /** Drop new postings not published on the same local day as `now` */
  readonly onlyToday?: boolean | undefined
  readonly now?: (() => number) | undefined
  readonly analyze?: AnalyzeFn | undefined
  readonly onEvent?: ((event: MonitorEvent) => void) | undefined
}

export interface CrawlCycleResult {
  readonly crawled: number
  readonly created: number
  readonly updated: number
  readonly filteredByDate: number
  readonly analyzeFailed: number
  readonly newJobs: readonly JobRecord[]
}

export interface MonitorStats {
  readonly total: number
  /** First seen since Monday 00:00 local time */
  readonly thisWeek: number
}
