/**
 * Test Support Module
 *
 * Stand-ins for provider clients and HTTP endpoints so tests never touch the network.
 */

import { createLlmError, type LlmErrorKind } from '../llm/errors'
import { createResponse } from '../llm/request'
import type { InvokeOptions, LlmClient, LlmRequest, LlmResponse, LlmResult } from '../llm/types'
import type { JobPosting } from '../monitor/types'
import { err, type FetchFn, ok } from '../types/common'

/**
 * Create an LlmResponse with default values for testing.
 */
export function createTestResponse(overrides: Partial<LlmResponse> = {}): LlmResponse {
  return createResponse({
    content: '{"ok":true}',
    model: 'test-model',
    provider: 'test',
    finishReason: 'stop',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    latencyMs: 12,
    ...overrides
  })
}

export function failure(kind: LlmErrorKind, message = `${kind} failure`): LlmResult {
  return err(createLlmError(kind, message))
}

export function success(content = '{"ok":true}'): LlmResult {
  return ok(createTestResponse({ content }))
}

/** A scripted step: a result to return, or a value to throw. */
export type ScriptStep = LlmResult | { readonly throws: unknown }

/**
 * LlmClient that plays back a fixed script, one step per invoke().
 * The last step repeats once the script runs out.
 */
export class ScriptedLlmClient implements LlmClient {
  readonly providerName = 'scripted'
  readonly modelName = 'scripted-model'
  readonly calls: { request: LlmRequest; signal: AbortSignal | undefined }[] = []
  available = true

  constructor(
    private readonly script: readonly ScriptStep[],
    private readonly onInvoke?: (callIndex: number) => void
  ) {}

  get callCount(): number {
    return this.calls.length
  }

  async invoke(request: LlmRequest, options: InvokeOptions = {}): Promise<LlmResult> {
    const index = this.calls.length
    this.calls.push({ request, signal: options.signal })
    this.onInvoke?.(index)

    const step = this.script[Math.min(index, this.script.length - 1)]
    if (!step) {
      throw new Error('ScriptedLlmClient has an empty script')
    }
    if ('throws' in step) {
      throw step.throws
    }
    return step
  }

  async isAvailable(): Promise<boolean> {
    return this.available
  }
}

export interface RecordedRequest {
  readonly url: string
  readonly method: string
  readonly headers: Record<string, string>
  readonly body: unknown
}

export type FetchHandler = (request: RecordedRequest) => Response | Promise<Response>

/**
 * Fetch stand-in that records every request and answers via `handler`.
 */
export function createMockFetch(handler: FetchHandler): {
  fetch: FetchFn
  requests: RecordedRequest[]
} {
  const requests: RecordedRequest[] = []
  const fetch: FetchFn = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    const headers: Record<string, string> = {}
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value
    })
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
    const recorded: RecordedRequest = { url, method: init?.method ?? 'GET', headers, body }
    requests.push(recorded)

    const signal = init?.signal
    if (signal?.aborted) {
      throw signal.reason
    }
    return handler(recorded)
  }
  return { fetch, requests }
}

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers }
  })
}

/**
 * Fetch stand-in that never answers until its signal aborts.
 */
export const hangingFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal
    if (!signal) return
    if (signal.aborted) {
      reject(signal.reason)
      return
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true })
  })

/**
 * Create a JobPosting with default values for testing.
 */
export function createPosting(
  overrides: Partial<JobPosting> & { readonly externalId: string }
): JobPosting {
  return {
    title: 'Backend Engineer',
    company: 'Acme Robotics',
    ...overrides
  }
}
