/**
 * Monitor Command
 *
 * Import crawled postings, detect new ones, and manage the job store.
 */

import { DAY_MS, type ResponseCache } from '../../caching/types'
import type { LlmClient } from '../../llm/types'
import {
  type AnalyzeFn,
  cleanupOldJobs,
  getMonitorStats,
  JsonFeedCrawler,
  type JobRecord,
  type MonitorEvent,
  runCrawlCycle
} from '../../monitor'
import { parseDocument } from '../../parsing/parse'
import type { CLIArgs } from '../args'
import {
  createCache,
  createClient,
  createJobStore,
  formatDate,
  formatLlmError,
  initSettings,
  truncate
} from '../helpers'
import { writeJsonOutput } from '../io'
import type { Logger } from '../logger'
import type { AppSettings } from '../settings'

export async function cmdMonitor(args: CLIArgs, logger: Logger): Promise<void> {
  const settings = await initSettings(args)

  switch (args.monitorAction) {
    case 'import':
      await importFeed(args, settings, logger)
      break
    case 'list':
      await listJobs(args, settings, logger)
      break
    case 'stats': {
      const stats = await getMonitorStats(createJobStore(settings, logger))
      logger.log(`\nJobs tracked: ${stats.total}`)
      logger.log(`New this week: ${stats.thisWeek}`)
      break
    }
    case 'cleanup': {
      const days = args.retentionDays ?? settings.monitor.retentionDays
      const removed = await cleanupOldJobs(createJobStore(settings, logger), days)
      logger.success(`Removed ${removed} jobs first seen more than ${days} days ago`)
      break
    }
  }
}

export function describeJob(record: JobRecord): string {
  const details = [record.company, record.city, record.salary].filter(Boolean).join(' · ')
  return `${truncate(record.title, 60)} (${details})`
}

function createAnalyzer(
  client: LlmClient,
  cache: ResponseCache | null,
  settings: AppSettings,
  logger: Logger
): AnalyzeFn {
  return async (record) => {
    const text = [record.title, record.company, record.description].filter(Boolean).join('\n\n')
    const result = await parseDocument('jd', text, {
      client,
      cache,
      onCacheError: (error) => logger.warn(`Ignoring unreadable cache entry: ${error.path}`),
      request: { temperature: settings.llm.temperature, maxTokens: settings.llm.maxTokens }
    })
    if (result.ok) {
      logger.verbose(`Analyzed ${record.externalId}`)
    }
    return result
  }
}

function reportEvent(event: MonitorEvent, logger: Logger): void {
  switch (event.type) {
    case 'crawled':
      logger.log(`\n🔎 ${event.count} postings matched`)
      break
    case 'job_created':
      logger.success(`New: ${describeJob(event.record)}`)
      break
    case 'job_updated':
      logger.verbose(`Seen again: ${event.record.externalId}`)
      break
    case 'filtered_by_date':
      logger.verbose(`Not published today: ${event.posting.externalId}`)
      break
    case 'analyze_failed':
      logger.warn(`Could not analyze ${event.record.externalId}: ${formatLlmError(event.error)}`)
      break
  }
}

async function importFeed(args: CLIArgs, settings: AppSettings, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No feed file specified. Usage: job-match monitor import <feed>')
  }

  let analyze: AnalyzeFn | undefined
  if (args.analyze) {
    const client = await createClient(settings, logger)
    if (!client.ok) {
      logger.error(formatLlmError(client.error))
      process.exit(1)
    }
    analyze = createAnalyzer(client.value, createCache(settings), settings, logger)
  }

  const keywords = args.keywords ?? settings.monitor.keywords
  const location = args.city ?? settings.monitor.city
  logger.log(`\nMonitoring "${keywords}" in ${location}`)

  const result = await runCrawlCycle({
    crawler: new JsonFeedCrawler(args.input),
    store: createJobStore(settings, logger),
    keywords,
    location,
    pageLimit: args.pageLimit ?? settings.monitor.pageLimit,
    onlyToday: args.onlyToday ?? settings.monitor.onlyToday,
    analyze,
    onEvent: (event) => reportEvent(event, logger)
  })

  logger.log(
    `\n${result.created} new, ${result.updated} updated` +
      (result.filteredByDate > 0 ? `, ${result.filteredByDate} not from today` : '')
  )
  if (result.analyzeFailed > 0) {
    logger.warn(`${result.analyzeFailed} of ${result.created} new jobs could not be analyzed`)
  }
}

async function listJobs(args: CLIArgs, settings: AppSettings, logger: Logger): Promise<void> {
  const store = createJobStore(settings, logger)
  const records =
    args.days !== undefined
      ? await store.listSince(Date.now() - args.days * DAY_MS)
      : await store.listAll()

  if (args.jsonOutput) {
    await writeJsonOutput(args.jsonOutput, records)
    return
  }

  if (records.length === 0) {
    logger.log('No jobs tracked yet. Run `job-match monitor import <feed>` first.')
    return
  }
  logger.log('')
  for (const record of records) {
    logger.log(`  ${formatDate(record.firstSeenAt)}  ${describeJob(record)}`)
  }
  logger.log(`\n${records.length} jobs`)
}
