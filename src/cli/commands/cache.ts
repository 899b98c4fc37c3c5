/**
 * Cache Command
 *
 * Inspect or prune the parse cache.
 */

import type { CLIArgs } from '../args'
import { createCache, formatBytes, initSettings } from '../helpers'
import type { Logger } from '../logger'

export async function cmdCache(args: CLIArgs, logger: Logger): Promise<void> {
  const settings = await initSettings(args)
  const cache = createCache(settings)
  if (!cache) {
    logger.log('Parse cache is disabled (cacheEnabled=false or --no-cache).')
    return
  }

  switch (args.cacheAction) {
    case 'status': {
      const stats = await cache.stats()
      logger.log(`\nCache directory: ${settings.cache.dir}\n`)
      logger.log(`  Entries:   ${stats.entryCount}`)
      logger.log(`  Size:      ${formatBytes(stats.totalSizeBytes)}`)
      logger.log(`  Expired:   ${stats.expiredCount}`)
      if (stats.corruptedCount > 0) {
        logger.warn(`${stats.corruptedCount} unreadable entries; run \`job-match cache cleanup\``)
      }
      break
    }
    case 'cleanup': {
      const removed = await cache.cleanup()
      logger.success(`Removed ${removed} expired or unreadable entries`)
      break
    }
    case 'clear': {
      const removed = await cache.clear()
      logger.success(`Removed ${removed} entries`)
      break
    }
  }
}
