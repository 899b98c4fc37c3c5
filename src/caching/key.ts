/**
 * Cache Key Generation
 *
 * Generates deterministic SHA256 hash keys for parse results.
 */

import { createHash } from 'node:crypto'
import type { CacheKeyComponents } from './types'

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value
  }

  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }

  const sorted: Record<string, unknown> = {}
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  for (const [key, inner] of entries) {
    sorted[key] = sortKeys(inner)
  }
  return sorted
}

/**
 * Generate a deterministic cache key from request components.
 *
 * The key is a SHA256 hash of: service:model:normalized_payload
 *
 * @example
 * ```ts
 * const key = generateCacheKey({
 *   service: 'ollama',
 *   model: 'qwen2.5:14b',
 *   payload: { kind: 'jd', text: 'Senior Go engineer' }
 * })
 * // Returns: '9c1f...' (64 char hex string)
 * ```
 */
export function generateCacheKey(components: CacheKeyComponents): string {
  const { service, model, payload } = components
  const normalized = JSON.stringify(sortKeys(payload))
  const input = `${service}:${model}:${normalized}`

  return createHash('sha256').update(input).digest('hex')
}

/**
 * Whitespace-normalize extracted text so cosmetic differences (line endings,
 * indentation, trailing spaces, runs of blank lines) share a cache entry.
 */
export function normalizeSourceText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[\t\u00a0]/g, ' ')
    .split('\n')
    .map((line) => line.replace(/ {2,}/g, ' ').trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}

export type ParseKind = 'resume' | 'jd'

export interface ParseCacheKeyInput {
  readonly kind: ParseKind
  readonly text: string
  /** Version of the structured output shape */
  readonly schemaVersion: string
  /** Version of the prompt template */
  readonly promptVersion: string
  readonly provider: string
  readonly model: string
}

/**
 * Cache key for an LLM parse. Bumping either version invalidates old entries.
 */
export function generateParseCacheKey(input: ParseCacheKeyInput): string {
  return generateCacheKey({
    service: input.provider,
    model: input.model,
    payload: {
      kind: input.kind,
      schemaVersion: input.schemaVersion,
      promptVersion: input.promptVersion,
      text: normalizeSourceText(input.text)
    }
  })
}
