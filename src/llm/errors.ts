/**
 * LLM Error Taxonomy
 *
 * Every provider failure is reported as an LlmError with a fixed kind.
 * Whether a failure is worth retrying is a property of its kind alone.
 */

export type LlmErrorKind =
  | 'connection_failed'
  | 'timeout'
  | 'invalid_response'
  | 'rate_limited'
  | 'service_error'
  | 'invalid_api_key'
  | 'model_not_found'
  | 'quota_exceeded'
  | 'content_filtered'
  | 'cancelled'
  | 'invalid_config'
  | 'unknown'

const RETRYABLE = {
  connection_failed: true,
  timeout: true,
  invalid_response: true,
  rate_limited: true,
  service_error: true,
  // Unrecognised failures get another attempt
  unknown: true,
  invalid_api_key: false,
  model_not_found: false,
  quota_exceeded: false,
  content_filtered: false,
  cancelled: false,
  invalid_config: false
} as const satisfies Record<LlmErrorKind, boolean>

export interface LlmError {
  readonly kind: LlmErrorKind
  readonly message: string
  /** HTTP status when the failure came from a provider response */
  readonly status?: number | undefined
  /** Provider-requested wait (Retry-After) */
  readonly retryAfterMs?: number | undefined
  /** Attempts made, set by RetryingLlmClient */
  readonly attempts?: number | undefined
  readonly cause?: unknown
}

type LlmErrorDetails = Omit<LlmError, 'kind' | 'message'>

export function isRetryable(kind: LlmErrorKind): boolean {
  return RETRYABLE[kind]
}

export function isLlmErrorKind(value: string): value is LlmErrorKind {
  return Object.hasOwn(RETRYABLE, value)
}

export function createLlmError(
  kind: LlmErrorKind,
  message: string,
  details: LlmErrorDetails = {}
): LlmError {
  return { kind, message, ...details }
}

export function isLlmError(value: unknown): value is LlmError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    'message' in value &&
    typeof value.kind === 'string' &&
    isLlmErrorKind(value.kind) &&
    typeof value.message === 'string'
  )
}

export interface HttpErrorContext {
  readonly provider: string
  readonly model: string
  /** Parsed Retry-After header */
  readonly retryAfterMs?: number | undefined
}

/**
 * Map a non-2xx provider response to an error kind.
 * `detail` is the provider's error message (or raw body).
 */
export function classifyHttpStatus(
  status: number,
  detail: string,
  context: HttpErrorContext
): LlmError {
  const suffix = detail ? `: ${detail}` : ''
  const base = { status }

  if (status === 401 || status === 403) {
    return createLlmError(
      'invalid_api_key',
      `${context.provider} rejected the API key${suffix}`,
      base
    )
  }
  if (status === 404) {
    const hint = context.provider === 'ollama' ? ` (run: ollama pull ${context.model})` : ''
    return createLlmError(
      'model_not_found',
      `Model not found: ${context.model}${hint}${suffix}`,
      base
    )
  }
  if (status === 408 || status === 504) {
    return createLlmError(
      'timeout',
      `${context.provider} timed out (HTTP ${status})${suffix}`,
      base
    )
  }
  if (status === 429) {
    if (/insufficient_quota|quota/i.test(detail)) {
      return createLlmError('quota_exceeded', `${context.provider} quota exceeded${suffix}`, base)
    }
    return createLlmError('rate_limited', `${context.provider} rate limit exceeded${suffix}`, {
      ...base,
      retryAfterMs: context.retryAfterMs
    })
  }
  if (status >= 500) {
    return createLlmError(
      'service_error',
      `${context.provider} service error (HTTP ${status})${suffix}`,
      base
    )
  }
  return createLlmError('unknown', `${context.provider} API error (HTTP ${status})${suffix}`, base)
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(
  value: string | null,
  now: number = Date.now()
): number | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number.parseFloat(trimmed) * 1000)
  }
  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - now)
}

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE'
])
const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT'
])

function readString(value: unknown, field: string): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined
  const raw: unknown = Reflect.get(value, field)
  return typeof raw === 'string' ? raw : undefined
}

/** Walk the `cause` chain looking for a socket error code. */
function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error
  for (let depth = 0; depth < 5 && current; depth++) {
    const code = readString(current, 'code')
    if (code) return code
    current =
      typeof current === 'object' && current !== null && 'cause' in current
        ? current.cause
        : undefined
  }
  return undefined
}

/**
 * Classify any thrown value. Never throws.
 */
export function classifyError(error: unknown): LlmError {
  if (isLlmError(error)) return error

  const name = readString(error, 'name')
  const message = readString(error, 'message') ?? String(error)

  if (name === 'AbortError') {
    return createLlmError('cancelled', 'Request was cancelled', { cause: error })
  }
  if (name === 'TimeoutError') {
    return createLlmError('timeout', `Request timed out: ${message}`, { cause: error })
  }

  const code = findErrorCode(error)
  if (code && CONNECTION_CODES.has(code)) {
    return createLlmError('connection_failed', `Connection failed (${code}): ${message}`, {
      cause: error
    })
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return createLlmError('timeout', `Request timed out (${code}): ${message}`, { cause: error })
  }

  if (error instanceof SyntaxError) {
    return createLlmError('invalid_response', `Malformed response: ${message}`, { cause: error })
  }
  if (error instanceof TypeError && message === 'fetch failed') {
    return createLlmError('connection_failed', `Connection failed: ${message}`, { cause: error })
  }

  return createLlmError('unknown', message, { cause: error })
}
