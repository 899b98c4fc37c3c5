/**
 * LLM Command
 *
 * Report which providers are usable, or send a one-line test prompt.
 */

import { isCloudAvailable, isLocalAvailable } from '../../llm/factory'
import { promptRequest } from '../../llm/request'
import type { CLIArgs } from '../args'
import { createClient, formatLlmError, initSettings } from '../helpers'
import type { Logger } from '../logger'
import type { AppSettings } from '../settings'

export async function cmdLlm(args: CLIArgs, logger: Logger): Promise<void> {
  const settings = await initSettings(args)

  switch (args.llmAction) {
    case 'check':
      await checkProviders(settings, logger)
      break
    case 'ping':
      await pingProvider(settings, logger)
      break
  }
}

async function checkProviders(settings: AppSettings, logger: Logger): Promise<void> {
  const { local, cloud } = settings.llm
  logger.log(`\nConfigured provider: ${settings.llm.provider}\n`)

  if (await isLocalAvailable(settings.llm)) {
    logger.success(`local: ${local.model} at ${local.baseUrl}`)
  } else {
    logger.warn(`local: no response from ${local.baseUrl}`)
  }

  if (isCloudAvailable(settings.llm)) {
    logger.success(`cloud: ${cloud.model} at ${cloud.baseUrl}`)
  } else {
    logger.warn('cloud: no API key (set cloudApiKey or LLM_API_KEY)')
  }
}

async function pingProvider(settings: AppSettings, logger: Logger): Promise<void> {
  const client = await createClient(settings, logger)
  if (!client.ok) {
    logger.error(formatLlmError(client.error))
    process.exit(1)
  }

  logger.log(`\nPinging ${client.value.providerName} (${client.value.modelName})...`)
  const result = await client.value.invoke(promptRequest('Reply with the single word: pong'))
  if (!result.ok) {
    logger.error(formatLlmError(result.error))
    process.exit(1)
  }

  logger.success(`${result.value.content.trim()} (${result.value.latencyMs}ms)`)
}
