/**
 * Parse Cache Types
 */

import type { z } from 'zod'
import type { LlmUsage } from '../llm/types'

/**
 * Provider metadata of the response that produced a cached value.
 */
export interface CachedResponseMeta {
  readonly model: string
  readonly provider: string
  readonly finishReason: string | null
  readonly usage: LlmUsage
  readonly latencyMs: number
}

export interface CacheEntry<T = unknown> {
  readonly key: string
  readonly data: T
  readonly response?: CachedResponseMeta | undefined
  /** Epoch ms of the write that produced this entry */
  readonly createdAt: number
}

export interface CacheStats {
  readonly entryCount: number
  readonly totalSizeBytes: number
  readonly expiredCount: number
  readonly corruptedCount: number
}

/**
 * Durable key → value cache with lazy TTL expiry.
 */
export interface ResponseCache {
  /**
   * Entry for `key`, or null when missing or older than the TTL.
   * The stored value is validated with `dataSchema`.
   */
  get<T>(
    key: string,
    dataSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<CacheEntry<T> | null>

  /** Insert or replace the entry for `key`. */
  put<T>(key: string, data: T, response?: CachedResponseMeta): Promise<CacheEntry<T>>

  stats(): Promise<CacheStats>

  /** Remove expired and unreadable entries. Returns the number removed. */
  cleanup(): Promise<number>

  /** Remove every entry. Returns the number removed. */
  clear(): Promise<number>
}

/**
 * Cache key components for generating deterministic hash
 */
export interface CacheKeyComponents {
  /** Provider name: 'ollama', 'openai' */
  readonly service: string
  readonly model: string
  /** Request payload (will be JSON stringified with sorted keys) */
  readonly payload: unknown
}

export const DEFAULT_CACHE_TTL_DAYS = 7

export const DAY_MS = 24 * 60 * 60 * 1000
