/**
 * HTTP Utilities
 *
 * Guarded fetch, per-attempt timeouts and error-body extraction shared by the
 * provider clients.
 */

import { z } from 'zod'
import type { FetchFn } from './types/common'

function isCI(): boolean {
  return process.env.CI === 'true'
}

function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Tests running in CI must inject a fetch; real network calls are refused.
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

export class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Inject a fetch implementation instead of using the network.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input
  if (input instanceof URL) return input.href
  return input.url
}

/**
 * Default fetch for provider clients. Throws when HTTP requests are blocked.
 */
export const guardedFetch: FetchFn = async (input, init) => {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(requestUrl(input))
  }
  return fetch(input, init)
}

/**
 * Abort reason used when a single attempt exceeds its time budget.
 */
export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`no response within ${timeoutMs}ms`)
    this.name = 'TimeoutError'
  }
}

export interface AttemptSignal {
  readonly signal: AbortSignal
  dispose(): void
}

/**
 * Combine a per-attempt timeout with the caller's signal.
 * Call dispose() once the attempt settles.
 */
export function createAttemptSignal(timeoutMs: number, parent?: AbortSignal): AttemptSignal {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs)
  const onParentAbort = (): void => controller.abort(parent?.reason)

  if (parent?.aborted) {
    controller.abort(parent.reason)
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true })
  }

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    }
  }
}

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() }).passthrough()])
})

const MAX_ERROR_DETAIL = 300

/**
 * Pull a human-readable message out of a provider error body.
 * Handles `{ error: "..." }` (Ollama) and `{ error: { message } }` (OpenAI).
 */
export function readErrorMessage(body: string): string {
  const trimmed = body.trim()
  if (!trimmed) return ''

  let json: unknown
  try {
    json = JSON.parse(trimmed)
  } catch {
    return trimmed.slice(0, MAX_ERROR_DETAIL)
  }

  const parsed = ErrorBodySchema.safeParse(json)
  if (!parsed.success) return trimmed.slice(0, MAX_ERROR_DETAIL)
  const { error } = parsed.data
  return typeof error === 'string' ? error : error.message
}

/**
 * Join a base URL and a path without doubling slashes.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
}
