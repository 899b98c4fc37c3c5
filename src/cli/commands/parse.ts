/**
 * Parse Command
 *
 * Extract structured data from a resume or job description.
 */

import { VERSION } from '../../index'
import { PARSE_PROMPTS } from '../../parsing/prompts'
import { parseDocument } from '../../parsing/parse'
import type { CLIArgs } from '../args'
import { createCache, createClient, formatLlmError, initSettings } from '../helpers'
import { readInputFile, writeJsonOutput } from '../io'
import type { Logger } from '../logger'

export async function cmdParse(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  const label = PARSE_PROMPTS[args.parseKind].label
  logger.log(`\njob-match v${VERSION}`)
  logger.log(`\n📄 ${label}: ${args.input}`)

  const settings = await initSettings(args)
  const text = await readInputFile(args.input)

  const client = await createClient(settings, logger, { fallback: args.fallback })
  if (!client.ok) {
    logger.error(formatLlmError(client.error))
    process.exit(1)
  }
  logger.verbose(`Provider: ${client.value.providerName} (${client.value.modelName})`)

  const cache = createCache(settings)
  if (!cache) {
    logger.verbose('Cache disabled')
  }

  const result = await parseDocument(args.parseKind, text, {
    client: client.value,
    cache,
    onCacheError: (error) => logger.warn(`Ignoring unreadable cache entry: ${error.path}`),
    request: { temperature: settings.llm.temperature, maxTokens: settings.llm.maxTokens }
  })
  if (!result.ok) {
    logger.error(formatLlmError(result.error))
    process.exit(1)
  }

  const { data, response, key } = result.value
  if (response.fromCache) {
    logger.success(`${label} parsed (cached ${key.slice(0, 12)})`)
  } else {
    logger.success(
      `${label} parsed by ${response.provider}/${response.model} in ${response.latencyMs}ms ` +
        `(${response.usage.totalTokens} tokens)`
    )
  }

  if (args.jsonOutput) {
    await writeJsonOutput(args.jsonOutput, data)
    if (args.jsonOutput !== 'stdout') {
      logger.success(`Saved to ${args.jsonOutput}`)
    }
    return
  }

  logger.log('')
  for (const [field, value] of Object.entries(data)) {
    logger.log(`  ${field}: ${JSON.stringify(value)}`)
  }
}
