/**
 * JSON Feed Crawler
 *
 * JobCrawler over a JSON export written by an external (browser-driven) crawler.
 * The file is read once per instance.
 */

import { readJsonFile } from '../storage/atomic'
import { StorageError } from '../storage/errors'
import { FeedSchema } from './schema'
import type { JobCrawler, JobPosting } from './types'

/** Postings per result page on the board */
export const DEFAULT_PAGE_SIZE = 30

/** Location values that mean "no location filter" */
const ANY_LOCATION = new Set(['', 'all', '全国'])

export interface JsonFeedCrawlerOptions {
  readonly pageSize?: number | undefined
}

export class JsonFeedCrawler implements JobCrawler {
  private postings: Promise<readonly JobPosting[]> | null = null
  private readonly pageSize: number

  constructor(
    private readonly feedPath: string,
    options: JsonFeedCrawlerOptions = {}
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
  }

  async crawlJobs(
    keywords: string,
    location: string,
    pageLimit: number
  ): Promise<readonly JobPosting[]> {
    const terms = splitKeywords(keywords)
    const matches = (await this.load()).filter(
      (posting) => matchesKeywords(posting, terms) && matchesLocation(posting, location)
    )
    return matches.slice(0, Math.max(0, pageLimit) * this.pageSize)
  }

  async enrichJobDetails(posting: JobPosting): Promise<JobPosting> {
    const detail = (await this.load()).find((p) => p.externalId === posting.externalId)
    return detail ? { ...posting, ...detail } : posting
  }

  private load(): Promise<readonly JobPosting[]> {
    this.postings ??= readJsonFile(this.feedPath, FeedSchema).then((feed) => {
      if (feed === null) {
        throw new StorageError('read_failed', this.feedPath, 'feed file not found')
      }
      return feed
    })
    return this.postings
  }
}

export function splitKeywords(keywords: string): string[] {
  return keywords
    .split(/[\s,，]+/)
    .map((term) => term.trim().toLowerCase())
    .filter((term) => term.length > 0)
}

/**
 * Every term must appear in the title, description, industry or skill tags.
 */
function matchesKeywords(posting: JobPosting, terms: readonly string[]): boolean {
  if (terms.length === 0) return true
  const haystack = [
    posting.title,
    posting.description ?? '',
    posting.industry ?? '',
    ...(posting.skillTags ?? [])
  ]
    .join('\n')
    .toLowerCase()
  return terms.every((term) => haystack.includes(term))
}

function matchesLocation(posting: JobPosting, location: string): boolean {
  const wanted = location.trim().toLowerCase()
  if (ANY_LOCATION.has(wanted)) return true
  return posting.city?.trim().toLowerCase() === wanted
}
