/**
 * LLM Client Types
 */

import type { Result } from '../types/common'
import type { LlmError } from './errors'

export type MessageRole = 'system' | 'user' | 'assistant'

export interface ChatMessage {
  readonly role: MessageRole
  readonly content: string
}

export interface LlmRequest {
  readonly messages: readonly ChatMessage[]
  readonly temperature: number
  readonly maxTokens: number
  /** Ask the provider to constrain output to a JSON object */
  readonly jsonMode: boolean
}

export interface LlmUsage {
  readonly promptTokens: number
  readonly completionTokens: number
  readonly totalTokens: number
}

export interface LlmResponse {
  readonly content: string
  readonly model: string
  readonly provider: string
  readonly finishReason: string | null
  readonly usage: LlmUsage
  readonly latencyMs: number
  readonly fromCache: boolean
}

export type LlmResult = Result<LlmResponse, LlmError>

export interface InvokeOptions {
  /** Cancels the in-flight attempt and any pending backoff */
  readonly signal?: AbortSignal | undefined
}

/**
 * A chat-completion client. Failures come back as values, never as rejections.
 */
export interface LlmClient {
  readonly providerName: string
  readonly modelName: string
  invoke(request: LlmRequest, options?: InvokeOptions): Promise<LlmResult>
  /** Cheap reachability probe; resolves false on any failure */
  isAvailable(): Promise<boolean>
}
