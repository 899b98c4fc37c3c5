import { describe, expect, it } from 'vitest'
import { createMockFetch, hangingFetch, jsonResponse } from '../test-support'
import { OllamaClient } from './ollama'
import { promptRequest, systemPromptRequest } from './request'

const baseConfig = {
  baseUrl: 'http://localhost:11434',
  model: 'qwen2.5:14b',
  timeoutSeconds: 120
}

const chatReply = {
  model: 'qwen2.5:14b',
  message: { role: 'assistant', content: '{"skills":["go"]}' },
  done: true,
  done_reason: 'stop',
  prompt_eval_count: 120,
  eval_count: 30
}

describe('OllamaClient', () => {
  it('posts a non-streaming chat request', async () => {
    const { fetch, requests } = createMockFetch(() => jsonResponse(200, chatReply))
    const client = new OllamaClient({ ...baseConfig, fetch })

    await client.invoke(systemPromptRequest('You extract JSON.', 'Resume', { jsonMode: true }))

    expect(requests).toHaveLength(1)
    expect(requests[0]?.url).toBe('http://localhost:11434/api/chat')
    expect(requests[0]?.method).toBe('POST')
    expect(requests[0]?.body).toEqual({
      model: 'qwen2.5:14b',
      stream: false,
      messages: [
        { role: 'system', content: 'You extract JSON.' },
        { role: 'user', content: 'Resume' }
      ],
      options: { temperature: 0.1, num_predict: 4096 },
      format: 'json'
    })
  })

  it('omits the JSON format outside JSON mode', async () => {
    const { fetch, requests } = createMockFetch(() => jsonResponse(200, chatReply))
    await new OllamaClient({ ...baseConfig, fetch }).invoke(promptRequest('hi'))
    expect(requests[0]?.body).not.toHaveProperty('format')
  })

  it('maps the reply and token counts', async () => {
    const { fetch } = createMockFetch(() => jsonResponse(200, chatReply))
    const result = await new OllamaClient({ ...baseConfig, fetch }).invoke(promptRequest('hi'))

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value).toMatchObject({
        content: '{"skills":["go"]}',
        model: 'qwen2.5:14b',
        provider: 'ollama',
        finishReason: 'stop',
        usage: { promptTokens: 120, completionTokens: 30, totalTokens: 150 },
        fromCache: false
      })
    }
  })

  it('reports a missing model as model_not_found', async () => {
    const { fetch } = createMockFetch(() =>
      jsonResponse(404, { error: "model 'qwen2.5:14b' not found" })
    )
    const result = await new OllamaClient({ ...baseConfig, fetch }).invoke(promptRequest('hi'))

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('model_not_found')
      expect(result.error.message).toBe(
        "Model not found: qwen2.5:14b (run: ollama pull qwen2.5:14b): model 'qwen2.5:14b' not found"
      )
    }
  })

  it('reports a 503 as service_error', async () => {
    const { fetch } = createMockFetch(() => new Response('overloaded', { status: 503 }))
    const result = await new OllamaClient({ ...baseConfig, fetch }).invoke(promptRequest('hi'))
    expect(!result.ok && result.error.kind).toBe('service_error')
  })

  it('reports a non-JSON body as invalid_response', async () => {
    const { fetch } = createMockFetch(() => new Response('<html>proxy</html>', { status: 200 }))
    const result = await new OllamaClient({ ...baseConfig, fetch }).invoke(promptRequest('hi'))
    expect(!result.ok && result.error.kind).toBe('invalid_response')
  })

  it('reports an empty message as invalid_response', async () => {
    const { fetch } = createMockFetch(() =>
      jsonResponse(200, { ...chatReply, message: { role: 'assistant', content: '' } })
    )
    const result = await new OllamaClient({ ...baseConfig, fetch }).invoke(promptRequest('hi'))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Empty response from Ollama')
  })

  it('reports a refused connection as connection_failed', async () => {
    const { fetch } = createMockFetch(() => {
      throw new TypeError('fetch failed', {
        cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:11434'), {
          code: 'ECONNREFUSED'
        })
      })
    })
    const result = await new OllamaClient({ ...baseConfig, fetch }).invoke(promptRequest('hi'))
    expect(!result.ok && result.error.kind).toBe('connection_failed')
  })

  it('times out a slow attempt', async () => {
    const client = new OllamaClient({ ...baseConfig, timeoutSeconds: 0.01, fetch: hangingFetch })
    const result = await client.invoke(promptRequest('hi'))
    expect(!result.ok && result.error.kind).toBe('timeout')
  })

  it('reports caller cancellation as cancelled', async () => {
    const controller = new AbortController()
    const client = new OllamaClient({ ...baseConfig, fetch: hangingFetch })
    const pending = client.invoke(promptRequest('hi'), { signal: controller.signal })
    controller.abort()
    const result = await pending
    expect(!result.ok && result.error.kind).toBe('cancelled')
  })

  describe('isAvailable', () => {
    it('probes /api/tags', async () => {
      const { fetch, requests } = createMockFetch(() => jsonResponse(200, { models: [] }))
      expect(await new OllamaClient({ ...baseConfig, fetch }).isAvailable()).toBe(true)
      expect(requests[0]?.url).toBe('http://localhost:11434/api/tags')
      expect(requests[0]?.method).toBe('GET')
    })

    it('returns false when the server is down', async () => {
      const { fetch } = createMockFetch(() => {
        throw new TypeError('fetch failed')
      })
      expect(await new OllamaClient({ ...baseConfig, fetch }).isAvailable()).toBe(false)
    })
  })

  it('exposes provider and model names', () => {
    const client = new OllamaClient(baseConfig)
    expect(client.providerName).toBe('ollama')
    expect(client.modelName).toBe('qwen2.5:14b')
  })
})
