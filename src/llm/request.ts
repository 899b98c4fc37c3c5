/**
 * Request Builders
 *
 * Requests are frozen once built so a retry always resends the same payload.
 */

import type { ChatMessage, LlmRequest, LlmResponse, LlmUsage } from './types'

export const DEFAULT_TEMPERATURE = 0.1
export const DEFAULT_MAX_TOKENS = 4096

export interface RequestOptions {
  readonly temperature?: number | undefined
  readonly maxTokens?: number | undefined
  readonly jsonMode?: boolean | undefined
}

export function createRequest(
  messages: readonly ChatMessage[],
  options: RequestOptions = {}
): LlmRequest {
  if (messages.length === 0) {
    throw new Error('LLM request needs at least one message')
  }
  return Object.freeze({
    messages: Object.freeze(
      messages.map((m) => Object.freeze({ role: m.role, content: m.content }))
    ),
    temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    jsonMode: options.jsonMode ?? false
  })
}

export function promptRequest(prompt: string, options?: RequestOptions): LlmRequest {
  return createRequest([{ role: 'user', content: prompt }], options)
}

export function systemPromptRequest(
  system: string,
  user: string,
  options?: RequestOptions
): LlmRequest {
  return createRequest(
    [
      { role: 'system', content: system },
      { role: 'user', content: user }
    ],
    options
  )
}

export function emptyUsage(): LlmUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
}

export function createResponse(
  fields: Omit<LlmResponse, 'fromCache'> & { readonly fromCache?: boolean }
): LlmResponse {
  return Object.freeze({
    content: fields.content,
    model: fields.model,
    provider: fields.provider,
    finishReason: fields.finishReason,
    usage: Object.freeze({ ...fields.usage }),
    latencyMs: fields.latencyMs,
    fromCache: fields.fromCache ?? false
  })
}
