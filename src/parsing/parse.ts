/**
 * Cached Parse
 *
 * Cache-first LLM parse: identical (normalized) text parsed with the same
 * prompt, schema and model is served from the cache without a provider call.
 */

import { z } from 'zod'
import { generateParseCacheKey, normalizeSourceText, type ParseKind } from '../caching/key'
import type { CachedResponseMeta, CacheEntry, ResponseCache } from '../caching/types'
import { createLlmError, type LlmError } from '../llm/errors'
import { emptyUsage } from '../llm/request'
import type { LlmClient, LlmRequest } from '../llm/types'
import { StorageError } from '../storage/errors'
import { err, ok, type Result } from '../types/common'
import { extractJsonBlock } from './json'
import {
  buildParseRequest,
  PARSE_PROMPTS,
  PARSE_SCHEMA_VERSION,
  type ParseRequestOptions
} from './prompts'

export class EmptyInputError extends Error {
  constructor(readonly kind: ParseKind) {
    super(`${PARSE_PROMPTS[kind].label} text is empty`)
    this.name = 'EmptyInputError'
  }
}

export interface ParseResponseMeta extends CachedResponseMeta {
  readonly fromCache: boolean
}

export interface ParseOutcome<T> {
  readonly key: string
  readonly data: T
  readonly response: ParseResponseMeta
}

export interface ParseWithCacheOptions<T> {
  readonly client: LlmClient
  /** null disables caching */
  readonly cache: ResponseCache | null
  readonly kind: ParseKind
  readonly text: string
  readonly schemaVersion: string
  readonly promptVersion: string
  /** Receives the normalized text */
  readonly buildRequest: (text: string) => LlmRequest
  /** Validates cached values, and decoded replies when `decode` is omitted */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  readonly decode?: ((json: string) => T) | undefined
  readonly signal?: AbortSignal | undefined
  readonly onCacheError?: ((error: StorageError) => void) | undefined
}

export async function parseWithCache<T>(
  options: ParseWithCacheOptions<T>
): Promise<Result<ParseOutcome<T>, LlmError>> {
  const { client, cache, kind, schema } = options
  const text = normalizeSourceText(options.text)
  if (!text) {
    throw new EmptyInputError(kind)
  }

  const key = generateParseCacheKey({
    kind,
    text,
    schemaVersion: options.schemaVersion,
    promptVersion: options.promptVersion,
    provider: client.providerName,
    model: client.modelName
  })

  if (cache) {
    const cached = await readCache(cache, key, schema, options.onCacheError)
    if (cached) {
      const meta = cached.response ?? {
        model: client.modelName,
        provider: client.providerName,
        finishReason: null,
        usage: emptyUsage(),
        latencyMs: 0
      }
      return ok({ key, data: cached.data, response: { ...meta, fromCache: true } })
    }
  }

  const result = await client.invoke(options.buildRequest(text), { signal: options.signal })
  if (!result.ok) return err(result.error)

  const decode = options.decode ?? ((json: string) => schema.parse(JSON.parse(json)))
  let data: T
  try {
    data = decode(extractJsonBlock(result.value.content))
  } catch (error) {
    return err(
      createLlmError('invalid_response', `Could not decode ${kind} parse: ${describe(error)}`, {
        cause: error
      })
    )
  }

  const { model, provider, finishReason, usage, latencyMs } = result.value
  const meta: CachedResponseMeta = { model, provider, finishReason, usage, latencyMs }
  if (cache) {
    await cache.put(key, data, meta)
  }
  return ok({ key, data, response: { ...meta, fromCache: false } })
}

async function readCache<T>(
  cache: ResponseCache,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  onCacheError: ((error: StorageError) => void) | undefined
): Promise<CacheEntry<T> | null> {
  try {
    return await cache.get(key, schema)
  } catch (error) {
    if (error instanceof StorageError && error.kind === 'corrupted') {
      onCacheError?.(error)
      return null
    }
    throw error
  }
}

function describe(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
  }
  return error instanceof Error ? error.message : String(error)
}

/** Parsed documents are open JSON objects; field-level validation happens downstream. */
export const ParsedDocumentSchema = z.record(z.unknown())

export type ParsedDocument = z.infer<typeof ParsedDocumentSchema>

export interface ParseDocumentOptions {
  readonly client: LlmClient
  readonly cache: ResponseCache | null
  readonly signal?: AbortSignal | undefined
  readonly onCacheError?: ((error: StorageError) => void) | undefined
  /** Sampling settings; defaults are DEFAULT_TEMPERATURE and DEFAULT_MAX_TOKENS */
  readonly request?: ParseRequestOptions | undefined
}

/**
 * Parse a resume or job description with the built-in prompts.
 */
export function parseDocument(
  kind: ParseKind,
  text: string,
  options: ParseDocumentOptions
): Promise<Result<ParseOutcome<ParsedDocument>, LlmError>> {
  const { request, ...rest } = options
  return parseWithCache({
    ...rest,
    kind,
    text,
    schemaVersion: PARSE_SCHEMA_VERSION,
    promptVersion: PARSE_PROMPTS[kind].version,
    buildRequest: (normalized) => buildParseRequest(kind, normalized, request),
    schema: ParsedDocumentSchema
  })
}
