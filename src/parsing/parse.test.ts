import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { FilesystemCache } from '../caching/filesystem'
import type { ResponseCache } from '../caching/types'
import { OllamaClient } from '../llm/ollama'
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, promptRequest } from '../llm/request'
import { StorageError } from '../storage/errors'
import {
  createMockFetch,
  failure,
  jsonResponse,
  ScriptedLlmClient,
  success
} from '../test-support'
import { EmptyInputError, parseDocument, parseWithCache } from './parse'

const Title = z.object({ title: z.string() })

describe('parseWithCache', () => {
  let testDir: string
  let cache: FilesystemCache

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'job-match-parse-test-'))
    cache = new FilesystemCache(testDir)
  })

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true })
  })

  function parse(client: ScriptedLlmClient, text: string, extra: { cache?: ResponseCache } = {}) {
    return parseWithCache({
      client,
      cache: extra.cache ?? cache,
      kind: 'jd',
      text,
      schemaVersion: 's1',
      promptVersion: 'p1',
      buildRequest: (normalized) => promptRequest(normalized, { jsonMode: true }),
      schema: Title
    })
  }

  it('invokes on a miss and serves the second parse from the cache', async () => {
    const client = new ScriptedLlmClient([success('{"title":"SRE"}')])

    const first = await parse(client, 'Senior SRE')
    const second = await parse(client, 'Senior SRE')

    expect(client.callCount).toBe(1)
    expect(first.ok && first.value.response.fromCache).toBe(false)
    expect(second.ok).toBe(true)
    if (second.ok) {
      expect(second.value.data).toEqual({ title: 'SRE' })
      expect(second.value.response).toEqual({
        model: 'test-model',
        provider: 'test',
        finishReason: 'stop',
        usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
        latencyMs: 12,
        fromCache: true
      })
    }
  })

  it('shares an entry between texts that differ only in whitespace', async () => {
    const client = new ScriptedLlmClient([success('{"title":"SRE"}')])

    await parse(client, 'Senior SRE\r\n\r\n\r\nOn call  ')
    const again = await parse(client, '  Senior  SRE\n\nOn call')

    expect(client.callCount).toBe(1)
    expect(again.ok && again.value.response.fromCache).toBe(true)
  })

  it('sends the normalized text to the provider', async () => {
    const client = new ScriptedLlmClient([success('{"title":"SRE"}')])
    await parse(client, '\tSenior   SRE  \n')
    expect(client.calls[0]?.request.messages[0]?.content).toBe('Senior SRE')
  })

  it('rejects blank text before touching the cache or provider', async () => {
    const client = new ScriptedLlmClient([success()])
    await expect(parse(client, ' \n\t ')).rejects.toThrow(new EmptyInputError('jd'))
    expect(client.callCount).toBe(0)
    expect((await cache.stats()).entryCount).toBe(0)
  })

  it('returns a provider failure as-is and caches nothing', async () => {
    const client = new ScriptedLlmClient([failure('rate_limited', 'slow down')])

    const result = await parse(client, 'Senior SRE')

    expect(result).toEqual({ ok: false, error: { kind: 'rate_limited', message: 'slow down' } })
    expect((await cache.stats()).entryCount).toBe(0)
  })

  it('maps an undecodable reply to invalid_response', async () => {
    const client = new ScriptedLlmClient([success('I cannot help with that')])
    const result = await parse(client, 'Senior SRE')
    expect(!result.ok && result.error.kind).toBe('invalid_response')
    expect((await cache.stats()).entryCount).toBe(0)
  })

  it('maps a schema mismatch to invalid_response with the issue path', async () => {
    const client = new ScriptedLlmClient([success('{"title": 42}')])
    const result = await parse(client, 'Senior SRE')
    expect(!result.ok && result.error.message).toBe(
      'Could not decode jd parse: title: Expected string, received number'
    )
  })

  it('reports a corrupted entry and reparses over it', async () => {
    const client = new ScriptedLlmClient([success('{"title":"SRE"}')])
    const first = await parse(client, 'Senior SRE')
    if (!first.ok) throw new Error('expected a parse')
    const key = first.value.key
    writeFileSync(join(testDir, 'requests', key.slice(0, 2), `${key}.json`), '{not json')

    const reported: StorageError[] = []
    const second = await parseWithCache({
      client,
      cache,
      kind: 'jd',
      text: 'Senior SRE',
      schemaVersion: 's1',
      promptVersion: 'p1',
      buildRequest: (normalized) => promptRequest(normalized),
      schema: Title,
      onCacheError: (error) => reported.push(error)
    })

    expect(reported.map((error) => error.kind)).toEqual(['corrupted'])
    expect(client.callCount).toBe(2)
    expect(second.ok && second.value.response.fromCache).toBe(false)

    const third = await parse(client, 'Senior SRE')
    expect(third.ok && third.value.response.fromCache).toBe(true)
  })

  it('propagates a failed cache write as a StorageError', async () => {
    const brokenCache: ResponseCache = {
      get: async () => null,
      put: async () => {
        throw new StorageError('write_failed', '/read-only/entry.json')
      },
      stats: async () => ({
        entryCount: 0,
        totalSizeBytes: 0,
        expiredCount: 0,
        corruptedCount: 0
      }),
      cleanup: async () => 0,
      clear: async () => 0
    }
    const client = new ScriptedLlmClient([success('{"title":"SRE"}')])

    await expect(parse(client, 'Senior SRE', { cache: brokenCache })).rejects.toBeInstanceOf(
      StorageError
    )
  })

  it('passes the caller signal to the provider', async () => {
    const client = new ScriptedLlmClient([success('{"title":"SRE"}')])
    const controller = new AbortController()
    await parseWithCache({
      client,
      cache: null,
      kind: 'resume',
      text: 'Alice',
      schemaVersion: 's1',
      promptVersion: 'p1',
      buildRequest: (normalized) => promptRequest(normalized),
      schema: Title,
      signal: controller.signal
    })
    expect(client.calls[0]?.signal).toBe(controller.signal)
  })

  it('invokes every time when caching is disabled', async () => {
    const client = new ScriptedLlmClient([success('{"title":"SRE"}')])
    const noCache = () =>
      parseWithCache({
        client,
        cache: null,
        kind: 'jd',
        text: 'Senior SRE',
        schemaVersion: 's1',
        promptVersion: 'p1',
        buildRequest: (normalized) => promptRequest(normalized),
        schema: Title
      })
    await noCache()
    await noCache()
    expect(client.callCount).toBe(2)
  })
})

describe('parseDocument', () => {
  it('sends a JSON-mode system prompt with the labelled document', async () => {
    const client = new ScriptedLlmClient([success('{"basic_info": {"name": "Alice"}}')])

    const result = await parseDocument('resume', 'Alice\n\n\n\nGo developer', {
      client,
      cache: null
    })

    const request = client.calls[0]?.request
    expect(request?.jsonMode).toBe(true)
    expect(request?.messages.map((m) => m.role)).toEqual(['system', 'user'])
    expect(request?.messages[1]?.content).toBe('Resume:\n\nAlice\n\nGo developer')
    expect(result.ok && result.value.data).toEqual({ basic_info: { name: 'Alice' } })
  })

  it('uses default sampling settings', async () => {
    const client = new ScriptedLlmClient([success('{}')])
    await parseDocument('jd', 'Senior SRE', { client, cache: null })
    expect(client.calls[0]?.request).toMatchObject({
      temperature: DEFAULT_TEMPERATURE,
      maxTokens: DEFAULT_MAX_TOKENS
    })
  })

  it('passes configured sampling settings to the provider', async () => {
    const { fetch, requests } = createMockFetch(() =>
      jsonResponse(200, {
        model: 'qwen2.5:14b',
        message: { role: 'assistant', content: '{"title": "SRE"}' },
        done: true
      })
    )
    const client = new OllamaClient({
      baseUrl: 'http://localhost:11434',
      model: 'qwen2.5:14b',
      timeoutSeconds: 120,
      fetch
    })

    const result = await parseDocument('jd', 'Senior SRE', {
      client,
      cache: null,
      request: { temperature: 0.7, maxTokens: 512 }
    })

    expect(result.ok).toBe(true)
    expect(requests[0]?.body).toMatchObject({
      options: { temperature: 0.7, num_predict: 512 },
      format: 'json'
    })
  })

  it('rejects a JSON array reply', async () => {
    const client = new ScriptedLlmClient([success('[1, 2]')])
    const result = await parseDocument('jd', 'Senior SRE', { client, cache: null })
    expect(!result.ok && result.error.message).toBe(
      'Could not decode jd parse: (root): Expected object, received array'
    )
  })
})
