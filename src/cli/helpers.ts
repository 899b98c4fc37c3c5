/**
 * CLI Helpers
 *
 * Shared utilities for CLI commands.
 */

import { FilesystemCache } from '../caching/filesystem'
import type { ResponseCache } from '../caching/types'
import { isLlmError, type LlmError } from '../llm/errors'
import { createLlmClient, createLlmClientWithFallback, type LlmClientDeps } from '../llm/factory'
import type { LlmClient } from '../llm/types'
import { FilesystemJobStore } from '../monitor/job-store'
import { StorageError } from '../storage/errors'
import type { Result } from '../types/common'
import type { CLIArgs } from './args'
import { ConfigError, loadConfig } from './config'
import type { Logger } from './logger'
import { type AppSettings, resolveSettings } from './settings'

// ============================================================================
// Formatting
// ============================================================================

export function formatDate(timestamp: number): string {
  const d = new Date(timestamp)
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return `${text.slice(0, maxLength - 3)}...`
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

export function formatLlmError(error: LlmError): string {
  const status = error.status !== undefined ? ` (HTTP ${error.status})` : ''
  const attempts = error.attempts !== undefined && error.attempts > 1
    ? ` after ${error.attempts} attempts`
    : ''
  return `[${error.kind}] ${error.message}${status}${attempts}`
}

/**
 * One-line description of anything a command can throw.
 */
export function describeError(error: unknown): string {
  if (error instanceof StorageError) return `[storage:${error.kind}] ${error.message}`
  if (error instanceof ConfigError) return `[config] ${error.message}`
  if (isLlmError(error)) return formatLlmError(error)
  return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Command Initialization
// ============================================================================

/**
 * Load the config file and resolve it against flags and environment.
 */
export async function initSettings(args: CLIArgs): Promise<AppSettings> {
  const config = await loadConfig(args.configFile)
  return resolveSettings(config, {
    provider: args.provider,
    cacheDir: args.cacheDir,
    noCache: args.noCache,
    dataDir: args.dataDir
  })
}

export function createCache(settings: AppSettings): ResponseCache | null {
  if (!settings.cache.enabled) return null
  return new FilesystemCache(settings.cache.dir, { ttlMs: settings.cache.ttlMs })
}

export function createJobStore(settings: AppSettings, logger: Logger): FilesystemJobStore {
  return new FilesystemJobStore(settings.dataDir, {
    onCorrupted: (error) => logger.warn(`Skipping unreadable job record: ${error.path}`)
  })
}

/**
 * Build the LLM client with retry and give-up reporting routed to the logger.
 */
export function createClient(
  settings: AppSettings,
  logger: Logger,
  options: { fallback?: boolean | undefined } = {}
): Promise<Result<LlmClient, LlmError>> {
  const deps: LlmClientDeps = {
    onRetry: (info) =>
      logger.warn(
        `${formatLlmError(info.error)}; retrying in ${info.delayMs}ms ` +
          `(attempt ${info.attempt + 1}/${info.maxAttempts})`
      ),
    onGiveUp: (error) => logger.verbose(`Giving up: ${formatLlmError(error)}`)
  }
  if (options.fallback) {
    return createLlmClientWithFallback(settings.llm, deps)
  }
  return Promise.resolve(createLlmClient(settings.llm, deps))
}
