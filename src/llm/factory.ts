/**
 * LLM Client Factory
 *
 * Builds the configured provider client, wrapped in RetryingLlmClient when
 * retries are enabled.
 */

import { err, type FetchFn, ok, type Result } from '../types/common'
import type { SleepFn } from './backoff'
import { createLlmError, type LlmError } from './errors'
import { OllamaClient } from './ollama'
import { OpenAiClient } from './openai'
import { type RetryInfo, RetryingLlmClient } from './retrying'
import type { LlmClient } from './types'

export type ProviderKind = 'local' | 'cloud'

export interface LocalProviderSettings {
  readonly baseUrl: string
  readonly model: string
  readonly timeoutSeconds: number
}

export interface CloudProviderSettings {
  readonly baseUrl: string
  readonly apiKey: string | undefined
  readonly model: string
  readonly timeoutSeconds: number
}

export interface RetrySettings {
  /** Extra attempts after the first; 0 disables the retry wrapper */
  readonly times: number
  readonly baseDelayMs: number
  readonly backoffMultiplier: number
  readonly jitterRatio: number
}

export interface LlmSettings {
  /** 'local' or 'cloud' (case-insensitive) */
  readonly provider: string
  readonly local: LocalProviderSettings
  readonly cloud: CloudProviderSettings
  readonly temperature: number
  readonly maxTokens: number
  readonly retry: RetrySettings
}

export interface LlmClientDeps {
  readonly fetch?: FetchFn | undefined
  readonly sleep?: SleepFn | undefined
  readonly random?: (() => number) | undefined
  readonly onRetry?: ((info: RetryInfo) => void) | undefined
  readonly onGiveUp?: ((error: LlmError) => void) | undefined
}

export function parseProviderKind(name: string): ProviderKind | null {
  const normalized = name.trim().toLowerCase()
  if (normalized === 'local' || normalized === 'cloud') return normalized
  return null
}

/**
 * Build the bare provider client for a kind, without retries.
 */
export function createProviderClient(
  kind: ProviderKind,
  settings: LlmSettings,
  deps: LlmClientDeps = {}
): LlmClient {
  if (kind === 'local') {
    return new OllamaClient({ ...settings.local, fetch: deps.fetch })
  }
  return new OpenAiClient({ ...settings.cloud, fetch: deps.fetch })
}

function withRetry(client: LlmClient, settings: LlmSettings, deps: LlmClientDeps): LlmClient {
  if (settings.retry.times <= 0) return client
  return new RetryingLlmClient(client, {
    maxRetries: settings.retry.times,
    baseDelayMs: settings.retry.baseDelayMs,
    backoffMultiplier: settings.retry.backoffMultiplier,
    jitterRatio: settings.retry.jitterRatio,
    sleep: deps.sleep,
    random: deps.random,
    onRetry: deps.onRetry,
    onGiveUp: deps.onGiveUp
  })
}

function unknownProvider(name: string): LlmError {
  return createLlmError(
    'invalid_config',
    `Unknown LLM provider: ${name}. Use 'local' or 'cloud'.`
  )
}

/**
 * Create the client for `settings.provider`.
 */
export function createLlmClient(
  settings: LlmSettings,
  deps: LlmClientDeps = {}
): Result<LlmClient, LlmError> {
  const kind = parseProviderKind(settings.provider)
  if (!kind) return err(unknownProvider(settings.provider))
  return ok(withRetry(createProviderClient(kind, settings, deps), settings, deps))
}

/**
 * Use the configured provider if it answers, otherwise the other one.
 */
export async function createLlmClientWithFallback(
  settings: LlmSettings,
  deps: LlmClientDeps = {}
): Promise<Result<LlmClient, LlmError>> {
  const primary = parseProviderKind(settings.provider)
  if (!primary) return err(unknownProvider(settings.provider))

  const order: ProviderKind[] = primary === 'local' ? ['local', 'cloud'] : ['cloud', 'local']
  for (const kind of order) {
    const client = createProviderClient(kind, settings, deps)
    if (await client.isAvailable()) {
      return ok(withRetry(client, settings, deps))
    }
  }

  return err(
    createLlmError(
      'connection_failed',
      `No LLM provider available: local (${settings.local.baseUrl}) did not respond ` +
        'and cloud is unreachable or has no API key'
    )
  )
}

/**
 * Probe the local model server.
 */
export function isLocalAvailable(
  settings: LlmSettings,
  deps: LlmClientDeps = {}
): Promise<boolean> {
  return createProviderClient('local', settings, deps).isAvailable()
}

/**
 * Whether a cloud credential is configured. Makes no network call.
 */
export function isCloudAvailable(settings: LlmSettings): boolean {
  return Boolean(settings.cloud.apiKey?.trim())
}
