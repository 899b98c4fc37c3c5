#!/usr/bin/env node
/**
 * job-match CLI
 *
 * Local front end for the core library.
 * Handles settings, file I/O, and progress reporting.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdCache } from './cli/commands/cache'
import { cmdConfig } from './cli/commands/config'
import { cmdLlm } from './cli/commands/llm'
import { cmdMonitor } from './cli/commands/monitor'
import { cmdParse } from './cli/commands/parse'
import { describeError } from './cli/helpers'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'parse':
        await cmdParse(args, logger)
        break

      case 'llm':
        await cmdLlm(args, logger)
        break

      case 'cache':
        await cmdCache(args, logger)
        break

      case 'monitor':
        await cmdMonitor(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'job-match --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    logger.error(describeError(error))
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
