/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/job-match/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or JOB_MATCH_CONFIG env var.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { readTextFile, writeJsonAtomic } from '../storage/atomic'

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

const ProviderSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(['local', 'cloud'])
)

const ConfigSchema = z
  .object({
    llmProvider: ProviderSchema,
    localBaseUrl: z.string().url(),
    localModel: z.string().min(1),
    localTimeoutSeconds: z.number().positive(),
    cloudBaseUrl: z.string().url(),
    cloudApiKey: z.string(),
    cloudModel: z.string().min(1),
    cloudTimeoutSeconds: z.number().positive(),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    retryTimes: z.number().int().min(0).max(10),
    retryBaseDelayMs: z.number().min(0),
    retryBackoffMultiplier: z.number().min(1),
    retryJitter: z.number().min(0).max(1),
    cacheEnabled: z.boolean(),
    cacheDir: z.string().min(1),
    cacheTtlDays: z.number().positive(),
    dataDir: z.string().min(1),
    monitorKeywords: z.string(),
    monitorCity: z.string(),
    monitorPageLimit: z.number().int().positive(),
    monitorOnlyToday: z.boolean(),
    monitorRetentionDays: z.number().int().positive(),
    /** When settings were last updated */
    updatedAt: z.string()
  })
  .partial()

/**
 * All persistable CLI settings.
 */
export type Config = z.infer<typeof ConfigSchema>

/** Valid config keys for type-safe access */
export type ConfigKey = Exclude<keyof Config, 'updatedAt'>

export type ConfigValue = string | number | boolean

type ConfigValueType = 'string' | 'number' | 'boolean'

interface ConfigKeySpec {
  readonly type: ConfigValueType
  readonly description: string
}

const CONFIG_KEYS: Record<ConfigKey, ConfigKeySpec> = {
  // LLM
  llmProvider: { type: 'string', description: 'LLM provider: local or cloud (default: local)' },
  localBaseUrl: {
    type: 'string',
    description: 'Ollama base URL (default: http://localhost:11434)'
  },
  localModel: { type: 'string', description: 'Ollama model (default: qwen2.5:14b)' },
  localTimeoutSeconds: { type: 'number', description: 'Ollama request timeout (default: 120)' },
  cloudBaseUrl: {
    type: 'string',
    description: 'OpenAI-compatible base URL (default: https://api.openai.com/v1)'
  },
  cloudApiKey: {
    type: 'string',
    description: 'Cloud API key, or an env reference like ${LLM_API_KEY} (default)'
  },
  cloudModel: { type: 'string', description: 'Cloud model (default: gpt-4o-mini)' },
  cloudTimeoutSeconds: { type: 'number', description: 'Cloud request timeout (default: 60)' },
  temperature: { type: 'number', description: 'Sampling temperature, 0-2 (default: 0.1)' },
  maxTokens: { type: 'number', description: 'Max output tokens (default: 4096)' },
  retryTimes: { type: 'number', description: 'Retries after a failed call, 0-10 (default: 2)' },
  retryBaseDelayMs: { type: 'number', description: 'First retry delay in ms (default: 1000)' },
  retryBackoffMultiplier: { type: 'number', description: 'Backoff multiplier (default: 2)' },
  retryJitter: { type: 'number', description: 'Random extra delay ratio, 0-1 (default: 0)' },

  // Cache
  cacheEnabled: { type: 'boolean', description: 'Cache parse results (default: true)' },
  cacheDir: { type: 'string', description: 'Cache directory path (default: ~/.cache/job-match)' },
  cacheTtlDays: { type: 'number', description: 'Days before a cached parse expires (default: 7)' },

  // Storage
  dataDir: {
    type: 'string',
    description: 'Data directory for monitored jobs (default: ~/.local/share/job-match)'
  },

  // Monitor
  monitorKeywords: { type: 'string', description: 'Search keywords (default: AI应用开发)' },
  monitorCity: { type: 'string', description: 'Search city, 全国 for all (default: 全国)' },
  monitorPageLimit: { type: 'number', description: 'Result pages per crawl (default: 3)' },
  monitorOnlyToday: {
    type: 'boolean',
    description: 'Only keep postings published today (default: false)'
  },
  monitorRetentionDays: {
    type: 'number',
    description: 'Days to keep monitored jobs (default: 30)'
  }
}

/**
 * Get the type of a config key.
 */
export function getConfigType(key: ConfigKey): ConfigValueType {
  return CONFIG_KEYS[key].type
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_KEYS[key].description
}

/**
 * Get XDG config directory path for job-match.
 * Uses ~/.config/job-match on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'job-match')
}

/**
 * Get the config file path.
 * Priority: configFile arg > JOB_MATCH_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  const fromEnv = process.env['JOB_MATCH_CONFIG']
  if (fromEnv) {
    return fromEnv
  }
  return join(getDefaultConfigDir(), 'config.json')
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
    .join('; ')
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist; throws ConfigError if it is invalid.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  const content = await readTextFile(path)
  if (content === null) {
    return null
  }

  let json: unknown
  try {
    json = JSON.parse(content)
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file ${path}`, { cause: error })
  }

  const parsed = ConfigSchema.safeParse(json)
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeJsonAtomic(getConfigPath(configFile), withTimestamp)
}

/**
 * Parse a string value into the appropriate type for a config key.
 */
export function parseConfigValue(key: ConfigKey, value: string): ConfigValue {
  switch (getConfigType(key)) {
    case 'boolean': {
      const normalized = value.trim().toLowerCase()
      if (['true', '1', 'yes'].includes(normalized)) return true
      if (['false', '0', 'no'].includes(normalized)) return false
      throw new ConfigError(`Invalid boolean for ${key}: "${value}" (use true or false)`)
    }
    case 'number': {
      const parsed = Number(value)
      if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new ConfigError(`Invalid number for ${key}: "${value}"`)
      }
      return parsed
    }
    case 'string':
      return value
  }
}

/**
 * Format a config value for display. API keys are masked unless they are an
 * env reference.
 */
export function formatConfigValue(key: ConfigKey, value: ConfigValue | undefined): string {
  if (value === undefined) return ''
  if (key === 'cloudApiKey' && typeof value === 'string') {
    return maskSecret(value)
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  return String(value)
}

export function maskSecret(value: string): string {
  if (/^\$\{[A-Za-z_][A-Za-z0-9_]*\}$/.test(value)) return value
  if (value.length <= 8) return '********'
  return `${value.slice(0, 3)}…${value.slice(-2)}`
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(CONFIG_KEYS, key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return Object.keys(CONFIG_KEYS).filter(isValidConfigKey).sort()
}

function validated(config: Record<string, unknown>, key: ConfigKey): Config {
  const parsed = ConfigSchema.safeParse(config)
  if (!parsed.success) {
    throw new ConfigError(`Invalid value for ${key}: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: ConfigValue,
  configFile?: string
): Promise<Config> {
  const config = (await loadConfig(configFile)) ?? {}
  const next = validated({ ...config, [key]: value }, key)
  await saveConfig(next, configFile)
  return next
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<Config> {
  const config = (await loadConfig(configFile)) ?? {}
  const next = validated({ ...config, [key]: undefined }, key)
  await saveConfig(next, configFile)
  return next
}
