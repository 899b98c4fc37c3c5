/**
 * OpenAI-compatible Client
 *
 * Cloud model behind a /chat/completions endpoint (OpenAI, DeepSeek, OpenRouter,
 * or any gateway speaking the same protocol).
 */

import { z } from 'zod'
import { createAttemptSignal, guardedFetch, joinUrl, readErrorMessage } from '../http'
import { err, type FetchFn, ok } from '../types/common'
import {
  classifyError,
  classifyHttpStatus,
  createLlmError,
  type LlmError,
  parseRetryAfter
} from './errors'
import { createResponse } from './request'
import type { InvokeOptions, LlmClient, LlmRequest, LlmResult } from './types'

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1'
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini'
export const DEFAULT_OPENAI_TIMEOUT_SECONDS = 60

const AVAILABILITY_TIMEOUT_MS = 10_000

export interface OpenAiConfig {
  readonly baseUrl: string
  /** Resolved credential; undefined or empty means not configured */
  readonly apiKey: string | undefined
  readonly model: string
  readonly timeoutSeconds: number
  readonly fetch?: FetchFn | undefined
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional()
        }),
        finish_reason: z.string().nullable().optional()
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative(),
      completion_tokens: z.number().int().nonnegative(),
      total_tokens: z.number().int().nonnegative().optional()
    })
    .optional()
})

export class OpenAiClient implements LlmClient {
  readonly providerName = 'openai'
  private readonly fetchFn: FetchFn
  private readonly baseUrl: string

  constructor(private readonly config: OpenAiConfig) {
    this.fetchFn = config.fetch ?? guardedFetch
    this.baseUrl = config.baseUrl.replace(/\/+$/, '')
  }

  get modelName(): string {
    return this.config.model
  }

  async invoke(request: LlmRequest, options: InvokeOptions = {}): Promise<LlmResult> {
    const apiKey = this.config.apiKey
    if (!apiKey) {
      return err(
        createLlmError(
          'invalid_api_key',
          'Cloud API key not configured. ' +
            'Set LLM_API_KEY or run: job-match config set cloudApiKey <key>'
        )
      )
    }

    const started = Date.now()
    const attempt = createAttemptSignal(this.config.timeoutSeconds * 1000, options.signal)

    try {
      const response = await this.fetchFn(joinUrl(this.baseUrl, '/chat/completions'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${apiKey}` },
        body: JSON.stringify(this.buildBody(request)),
        signal: attempt.signal
      })
      const text = await response.text()

      if (!response.ok) {
        return err(
          classifyHttpStatus(response.status, readErrorMessage(text), {
            provider: this.providerName,
            model: this.config.model,
            retryAfterMs: parseRetryAfter(response.headers.get('retry-after'))
          })
        )
      }

      return this.parseBody(text, Date.now() - started)
    } catch (error) {
      if (options.signal?.aborted) {
        return err(createLlmError('cancelled', 'Request was cancelled', { cause: error }))
      }
      return err(classifyError(error))
    } finally {
      attempt.dispose()
    }
  }

  async isAvailable(): Promise<boolean> {
    if (!this.config.apiKey) return false

    const attempt = createAttemptSignal(AVAILABILITY_TIMEOUT_MS)
    try {
      const response = await this.fetchFn(joinUrl(this.baseUrl, '/models'), {
        method: 'GET',
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        signal: attempt.signal
      })
      return response.ok
    } catch {
      return false
    } finally {
      attempt.dispose()
    }
  }

  private buildBody(request: LlmRequest): Record<string, unknown> {
    return {
      model: this.config.model,
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      ...(request.jsonMode && { response_format: { type: 'json_object' } })
    }
  }

  private parseBody(text: string, latencyMs: number): LlmResult {
    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (error) {
      return err(invalidResponse(`Cloud API returned non-JSON body: ${text.slice(0, 120)}`, error))
    }

    const parsed = ChatCompletionSchema.safeParse(json)
    if (!parsed.success) {
      return err(invalidResponse(`Unexpected chat completion: ${parsed.error.message}`))
    }

    const data = parsed.data
    const [choice] = data.choices
    const content = choice?.message.content ?? ''
    const finishReason = choice?.finish_reason ?? null

    if (!content) {
      if (finishReason === 'content_filter') {
        return err(
          createLlmError('content_filtered', 'Response blocked by the provider content filter')
        )
      }
      return err(invalidResponse('Empty response from cloud API'))
    }

    const promptTokens = data.usage?.prompt_tokens ?? 0
    const completionTokens = data.usage?.completion_tokens ?? 0
    return ok(
      createResponse({
        content,
        model: data.model ?? this.config.model,
        provider: this.providerName,
        finishReason,
        usage: {
          promptTokens,
          completionTokens,
          totalTokens: data.usage?.total_tokens ?? promptTokens + completionTokens
        },
        latencyMs
      })
    )
  }
}

function invalidResponse(message: string, cause?: unknown): LlmError {
  return createLlmError('invalid_response', message, cause === undefined ? {} : { cause })
}
