/**
 * Runtime Settings
 *
 * Resolves the persisted config, environment and defaults into the settings
 * the commands run with.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { DAY_MS, DEFAULT_CACHE_TTL_DAYS } from '../caching/types'
import type { LlmSettings } from '../llm/factory'
import {
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_OLLAMA_TIMEOUT_SECONDS
} from '../llm/ollama'
import {
  DEFAULT_OPENAI_BASE_URL,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_OPENAI_TIMEOUT_SECONDS
} from '../llm/openai'
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from '../llm/request'
import { DEFAULT_BACKOFF_MULTIPLIER, DEFAULT_RETRY_BASE_DELAY_MS } from '../llm/retrying'
import { DEFAULT_PAGE_LIMIT, DEFAULT_RETENTION_DAYS } from '../monitor'
import type { Config } from './config'

export const DEFAULT_RETRY_TIMES = 2
export const DEFAULT_CLOUD_API_KEY = '${LLM_API_KEY}'
export const DEFAULT_MONITOR_KEYWORDS = 'AI应用开发'
export const DEFAULT_MONITOR_CITY = '全国'

export interface CacheSettings {
  readonly enabled: boolean
  readonly dir: string
  readonly ttlMs: number
}

export interface MonitorSettings {
  readonly keywords: string
  readonly city: string
  readonly pageLimit: number
  readonly onlyToday: boolean
  readonly retentionDays: number
}

export interface AppSettings {
  readonly llm: LlmSettings
  readonly cache: CacheSettings
  readonly dataDir: string
  readonly monitor: MonitorSettings
}

/** Per-invocation overrides from CLI flags */
export interface SettingsOverrides {
  readonly provider?: string | undefined
  readonly cacheDir?: string | undefined
  readonly noCache?: boolean | undefined
  readonly dataDir?: string | undefined
}

type Env = Readonly<Record<string, string | undefined>>

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

/**
 * Replace `${NAME}` references with environment values; unset names become ''.
 */
export function expandEnv(value: string, env: Env = process.env): string {
  return value.replace(ENV_REFERENCE, (_match, name: string) => env[name] ?? '')
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home
  if (path.startsWith('~/')) return join(home, path.slice(2))
  return path
}

export function getDefaultCacheDir(home: string = homedir()): string {
  return join(home, '.cache', 'job-match')
}

export function getDefaultDataDir(home: string = homedir()): string {
  return join(home, '.local', 'share', 'job-match')
}

/**
 * Priority: CLI flag > environment variable > config file > default.
 */
export function resolveSettings(
  config: Config | null,
  overrides: SettingsOverrides = {},
  env: Env = process.env,
  home: string = homedir()
): AppSettings {
  const c = config ?? {}
  const path = (value: string): string => expandHome(expandEnv(value, env), home)
  const apiKey = expandEnv(c.cloudApiKey ?? DEFAULT_CLOUD_API_KEY, env).trim()

  return {
    llm: {
      provider: overrides.provider ?? c.llmProvider ?? 'local',
      local: {
        baseUrl: c.localBaseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        model: c.localModel ?? DEFAULT_OLLAMA_MODEL,
        timeoutSeconds: c.localTimeoutSeconds ?? DEFAULT_OLLAMA_TIMEOUT_SECONDS
      },
      cloud: {
        baseUrl: c.cloudBaseUrl ?? DEFAULT_OPENAI_BASE_URL,
        apiKey: apiKey || undefined,
        model: c.cloudModel ?? DEFAULT_OPENAI_MODEL,
        timeoutSeconds: c.cloudTimeoutSeconds ?? DEFAULT_OPENAI_TIMEOUT_SECONDS
      },
      temperature: c.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: c.maxTokens ?? DEFAULT_MAX_TOKENS,
      retry: {
        times: c.retryTimes ?? DEFAULT_RETRY_TIMES,
        baseDelayMs: c.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
        backoffMultiplier: c.retryBackoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER,
        jitterRatio: c.retryJitter ?? 0
      }
    },
    cache: {
      enabled: !overrides.noCache && (c.cacheEnabled ?? true),
      dir: path(
        overrides.cacheDir ?? env['JOB_MATCH_CACHE_DIR'] ?? c.cacheDir ?? getDefaultCacheDir(home)
      ),
      ttlMs: (c.cacheTtlDays ?? DEFAULT_CACHE_TTL_DAYS) * DAY_MS
    },
    dataDir: path(
      overrides.dataDir ?? env['JOB_MATCH_DATA_DIR'] ?? c.dataDir ?? getDefaultDataDir(home)
    ),
    monitor: {
      keywords: c.monitorKeywords ?? DEFAULT_MONITOR_KEYWORDS,
      city: c.monitorCity ?? DEFAULT_MONITOR_CITY,
      pageLimit: c.monitorPageLimit ?? DEFAULT_PAGE_LIMIT,
      onlyToday: c.monitorOnlyToday ?? false,
      retentionDays: c.monitorRetentionDays ?? DEFAULT_RETENTION_DAYS
    }
  }
}
