/**
 * job-match Core Library
 *
 * LLM-backed resume and job description parsing, and job board monitoring.
 *
 * Design principle: no logging and no process state. Core modules report
 * progress through callbacks; the CLI decides what to print.
 *
 * @license AGPL-3.0
 */

// Cache module
export {
  type CachedResponseMeta,
  type CacheEntry,
  type CacheKeyComponents,
  type CacheStats,
  DAY_MS,
  DEFAULT_CACHE_TTL_DAYS,
  FilesystemCache,
  type FilesystemCacheOptions,
  generateCacheKey,
  generateParseCacheKey,
  normalizeSourceText,
  type ParseCacheKeyInput,
  type ParseKind,
  type ResponseCache
} from './caching/index'
// LLM module
export {
  type ChatMessage,
  classifyError,
  type CloudProviderSettings,
  createLlmClient,
  createLlmClientWithFallback,
  createLlmError,
  createProviderClient,
  isCloudAvailable,
  isLlmError,
  isLocalAvailable,
  isRetryable,
  type LlmClient,
  type LlmError,
  type LlmErrorKind,
  type LlmRequest,
  type LlmResponse,
  type LlmResult,
  type LlmSettings,
  type LlmUsage,
  type LocalProviderSettings,
  OllamaClient,
  OpenAiClient,
  parseProviderKind,
  promptRequest,
  type RetryInfo,
  RetryingLlmClient,
  type RetrySettings,
  systemPromptRequest
} from './llm/index'
// Monitor module
export {
  type AnalyzeFn,
  cleanupOldJobs,
  type CrawlCycleOptions,
  type CrawlCycleResult,
  FilesystemJobStore,
  getMonitorStats,
  type JobCrawler,
  type JobPosting,
  type JobRecord,
  type JobStore,
  JsonFeedCrawler,
  type MonitorEvent,
  type MonitorStats,
  runCrawlCycle
} from './monitor/index'
// Parsing module
export {
  EmptyInputError,
  extractJsonBlock,
  parseDocument,
  type ParsedDocument,
  type ParseOutcome,
  parseWithCache
} from './parsing/index'
// Storage
export { StorageError, type StorageErrorKind } from './storage/index'
export { err, ok, type Result } from './types/common'

/**
 * Library version.
 */
export const VERSION = '0.1.0'
