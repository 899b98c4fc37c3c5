/**
 * Ollama Client
 *
 * Local model served by Ollama's /api/chat endpoint (non-streaming).
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

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434'
export const DEFAULT_OLLAMA_MODEL = 'qwen2.5:14b'
export const DEFAULT_OLLAMA_TIMEOUT_SECONDS = 120

const AVAILABILITY_TIMEOUT_MS = 5_000

export interface OllamaConfig {
  readonly baseUrl: string
  readonly model: string
  readonly timeoutSeconds: number
  readonly fetch?: FetchFn | undefined
}

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string()
  }),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
  eval_count: z.number().int().nonnegative().optional()
})

export class OllamaClient implements LlmClient {
  readonly providerName = 'ollama'
  private readonly fetchFn: FetchFn

  constructor(private readonly config: OllamaConfig) {
    this.fetchFn = config.fetch ?? guardedFetch
  }

  get modelName(): string {
    return this.config.model
  }

  async invoke(request: LlmRequest, options: InvokeOptions = {}): Promise<LlmResult> {
    const started = Date.now()
    const attempt = createAttemptSignal(this.config.timeoutSeconds * 1000, options.signal)

    try {
      const response = await this.fetchFn(joinUrl(this.config.baseUrl, '/api/chat'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
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
    const attempt = createAttemptSignal(AVAILABILITY_TIMEOUT_MS)
    try {
      const response = await this.fetchFn(joinUrl(this.config.baseUrl, '/api/tags'), {
        method: 'GET',
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
      stream: false,
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      options: {
        temperature: request.temperature,
        num_predict: request.maxTokens
      },
      ...(request.jsonMode && { format: 'json' })
    }
  }

  private parseBody(text: string, latencyMs: number): LlmResult {
    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (error) {
      return err(invalidResponse(`Ollama returned non-JSON body: ${text.slice(0, 120)}`, error))
    }

    const parsed = OllamaChatResponseSchema.safeParse(json)
    if (!parsed.success) {
      return err(invalidResponse(`Unexpected Ollama response: ${parsed.error.message}`))
    }

    const data = parsed.data
    if (!data.message.content) {
      return err(invalidResponse('Empty response from Ollama'))
    }

    const promptTokens = data.prompt_eval_count ?? 0
    const completionTokens = data.eval_count ?? 0
    return ok(
      createResponse({
        content: data.message.content,
        model: data.model ?? this.config.model,
        provider: this.providerName,
        finishReason: data.done_reason ?? null,
        usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
        latencyMs
      })
    )
  }
}

function invalidResponse(message: string, cause?: unknown): LlmError {
  return createLlmError('invalid_response', message, cause === undefined ? {} : { cause })
}
