import { describe, expect, it } from 'vitest'
import { createRequest, promptRequest, systemPromptRequest } from './request'

describe('request builders', () => {
  it('applies defaults', () => {
    const request = promptRequest('Parse this resume')
    expect(request).toEqual({
      messages: [{ role: 'user', content: 'Parse this resume' }],
      temperature: 0.1,
      maxTokens: 4096,
      jsonMode: false
    })
  })

  it('keeps system and user messages in order', () => {
    const request = systemPromptRequest('You extract JSON.', 'Resume text', { jsonMode: true })
    expect(request.messages.map((m) => m.role)).toEqual(['system', 'user'])
    expect(request.jsonMode).toBe(true)
  })

  it('freezes the request and its messages', () => {
    const request = createRequest([{ role: 'user', content: 'hi' }], { temperature: 0.7 })
    expect(Object.isFrozen(request)).toBe(true)
    expect(Object.isFrozen(request.messages)).toBe(true)
    expect(Object.isFrozen(request.messages[0])).toBe(true)
    expect(request.temperature).toBe(0.7)
  })

  it('copies messages so later edits to the input do not leak in', () => {
    const messages = [{ role: 'user' as const, content: 'original' }]
    const request = createRequest(messages)
    messages[0] = { role: 'user', content: 'changed' }
    expect(request.messages[0]?.content).toBe('original')
  })

  it('rejects an empty message list', () => {
    expect(() => createRequest([])).toThrow('LLM request needs at least one message')
  })
})
