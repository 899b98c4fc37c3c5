import { describe, expect, it } from 'vitest'
import { RequestTimeoutError } from '../http'
import {
  classifyError,
  classifyHttpStatus,
  createLlmError,
  isLlmError,
  isRetryable,
  type LlmErrorKind,
  parseRetryAfter
} from './errors'

const ctx = { provider: 'openai', model: 'gpt-4o-mini' }

function errnoError(code: string, message = 'socket error'): Error {
  return Object.assign(new Error(message), { code })
}

describe('isRetryable', () => {
  it.each<[LlmErrorKind, boolean]>([
    ['connection_failed', true],
    ['timeout', true],
    ['invalid_response', true],
    ['rate_limited', true],
    ['service_error', true],
    ['unknown', true],
    ['invalid_api_key', false],
    ['model_not_found', false],
    ['quota_exceeded', false],
    ['content_filtered', false],
    ['cancelled', false],
    ['invalid_config', false]
  ])('%s → %s', (kind, expected) => {
    expect(isRetryable(kind)).toBe(expected)
  })
})

describe('classifyHttpStatus', () => {
  it.each<[number, LlmErrorKind]>([
    [401, 'invalid_api_key'],
    [403, 'invalid_api_key'],
    [404, 'model_not_found'],
    [408, 'timeout'],
    [429, 'rate_limited'],
    [500, 'service_error'],
    [502, 'service_error'],
    [503, 'service_error'],
    [504, 'timeout'],
    [400, 'unknown'],
    [418, 'unknown']
  ])('maps HTTP %i to %s', (status, kind) => {
    const error = classifyHttpStatus(status, '', ctx)
    expect(error.kind).toBe(kind)
    expect(error.status).toBe(status)
  })

  it('treats a quota body on 429 as quota_exceeded', () => {
    const error = classifyHttpStatus(429, 'You exceeded your current quota', ctx)
    expect(error.kind).toBe('quota_exceeded')
    expect(isRetryable(error.kind)).toBe(false)
  })

  it('carries Retry-After on rate limits', () => {
    const error = classifyHttpStatus(429, 'slow down', { ...ctx, retryAfterMs: 3000 })
    expect(error).toMatchObject({ kind: 'rate_limited', retryAfterMs: 3000 })
  })

  it('suggests pulling a missing Ollama model', () => {
    const error = classifyHttpStatus(404, '', { provider: 'ollama', model: 'qwen2.5:14b' })
    expect(error.message).toBe('Model not found: qwen2.5:14b (run: ollama pull qwen2.5:14b)')
  })

  it('includes the provider detail in the message', () => {
    expect(classifyHttpStatus(401, 'Incorrect API key provided', ctx).message).toBe(
      'openai rejected the API key: Incorrect API key provided'
    )
  })
})

describe('classifyError', () => {
  it('returns an existing LlmError unchanged', () => {
    const original = createLlmError('rate_limited', 'busy', { status: 429 })
    expect(classifyError(original)).toBe(original)
  })

  it('maps AbortError to cancelled', () => {
    const abort = new Error('This operation was aborted')
    abort.name = 'AbortError'
    expect(classifyError(abort).kind).toBe('cancelled')
  })

  it('maps the per-attempt timeout reason to timeout', () => {
    expect(classifyError(new RequestTimeoutError(50)).kind).toBe('timeout')
  })

  it.each(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN'])(
    'maps %s to connection_failed',
    (code) => {
      expect(classifyError(errnoError(code)).kind).toBe('connection_failed')
    }
  )

  it('finds socket codes on the cause of a fetch failure', () => {
    const error = new TypeError('fetch failed', { cause: errnoError('ECONNREFUSED') })
    const classified = classifyError(error)
    expect(classified.kind).toBe('connection_failed')
    expect(classified.message).toBe('Connection failed (ECONNREFUSED): fetch failed')
  })

  it('reads name, message and code from plain objects', () => {
    expect(classifyError({ name: 'AbortError', message: 'stop' }).kind).toBe('cancelled')
    const classified = classifyError({ message: 'refused', cause: { code: 'ECONNREFUSED' } })
    expect(classified.kind).toBe('connection_failed')
    expect(classified.message).toBe('Connection failed (ECONNREFUSED): refused')
  })

  it('maps a bare fetch failure to connection_failed', () => {
    expect(classifyError(new TypeError('fetch failed')).kind).toBe('connection_failed')
  })

  it.each(['ETIMEDOUT', 'UND_ERR_HEADERS_TIMEOUT'])('maps %s to timeout', (code) => {
    expect(classifyError(errnoError(code)).kind).toBe('timeout')
  })

  it('maps SyntaxError to invalid_response', () => {
    expect(classifyError(new SyntaxError('Unexpected token')).kind).toBe('invalid_response')
  })

  it('maps anything else to unknown, keeping the cause', () => {
    const classified = classifyError('boom')
    expect(classified).toMatchObject({ kind: 'unknown', message: 'boom', cause: 'boom' })
  })
})

describe('isLlmError', () => {
  it('recognises error values by shape', () => {
    expect(isLlmError(createLlmError('timeout', 'slow'))).toBe(true)
    expect(isLlmError({ kind: 'nope', message: 'x' })).toBe(false)
    expect(isLlmError(new Error('x'))).toBe(false)
  })
})

describe('parseRetryAfter', () => {
  it('parses delta seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000)
  })

  it('parses an HTTP date relative to now', () => {
    const now = Date.parse('2025-01-01T00:00:00Z')
    expect(parseRetryAfter('Wed, 01 Jan 2025 00:00:05 GMT', now)).toBe(5000)
  })

  it('ignores missing or malformed values', () => {
    expect(parseRetryAfter(null)).toBeUndefined()
    expect(parseRetryAfter('soon')).toBeUndefined()
  })
})
