/**
 * LLM Module
 *
 * Provider clients, retry decorator and client factory.
 */

export { computeBackoffDelay, type BackoffPolicy, type SleepFn, sleep } from './backoff'
export {
  classifyError,
  classifyHttpStatus,
  createLlmError,
  isLlmError,
  isRetryable,
  type LlmError,
  type LlmErrorKind,
  parseRetryAfter
} from './errors'
export {
  createLlmClient,
  createLlmClientWithFallback,
  createProviderClient,
  isCloudAvailable,
  isLocalAvailable,
  type CloudProviderSettings,
  type LlmClientDeps,
  type LlmSettings,
  type LocalProviderSettings,
  type ProviderKind,
  parseProviderKind,
  type RetrySettings
} from './factory'
export {
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_OLLAMA_TIMEOUT_SECONDS,
  OllamaClient,
  type OllamaConfig
} from './ollama'
export {
  DEFAULT_OPENAI_BASE_URL,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_OPENAI_TIMEOUT_SECONDS,
  OpenAiClient,
  type OpenAiConfig
} from './openai'
export {
  createRequest,
  createResponse,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  emptyUsage,
  promptRequest,
  type RequestOptions,
  systemPromptRequest
} from './request'
export {
  DEFAULT_BACKOFF_MULTIPLIER,
  DEFAULT_RETRY_BASE_DELAY_MS,
  type RetryInfo,
  RetryingLlmClient,
  type RetryOptions
} from './retrying'
export type {
  ChatMessage,
  InvokeOptions,
  LlmClient,
  LlmRequest,
  LlmResponse,
  LlmResult,
  LlmUsage,
  MessageRole
} from './types'
