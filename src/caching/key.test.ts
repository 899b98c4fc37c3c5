import { describe, expect, it } from 'vitest'
import { generateCacheKey, generateParseCacheKey, normalizeSourceText } from './key'

const baseInput = {
  kind: 'jd' as const,
  text: 'Senior Go Engineer\n\nBuild APIs',
  schemaVersion: 's1',
  promptVersion: 'p1',
  provider: 'ollama',
  model: 'qwen2.5:14b'
}

describe('generateCacheKey', () => {
  it('hashes service, model and the sorted JSON payload', () => {
    const key = generateCacheKey({
      service: 'svc',
      model: 'm',
      payload: { b: { d: [1, 'x'], c: 2 }, a: 1 }
    })
    expect(key).toBe('922615ea4bdd0ca5c62033f8ee3e3aa429d12a012499fe98e9421310be611fc9')
  })

  it('generates a 64 character hex string', () => {
    expect(generateCacheKey({ service: 'test', model: 'test', payload: {} })).toMatch(
      /^[a-f0-9]{64}$/
    )
  })

  it('keeps array order significant', () => {
    const key1 = generateCacheKey({ service: 's', model: 'm', payload: { items: ['a', 'b'] } })
    const key2 = generateCacheKey({ service: 's', model: 'm', payload: { items: ['b', 'a'] } })
    expect(key1).not.toBe(key2)
  })
})

describe('normalizeSourceText', () => {
  it('normalizes line endings, tabs, runs of spaces and blank lines', () => {
    expect(normalizeSourceText('  Senior Go Engineer  \r\n\r\n\r\n\r\nBuild\tAPIs  ')).toBe(
      'Senior Go Engineer\n\nBuild APIs'
    )
  })

  it('keeps a single blank line between paragraphs', () => {
    expect(normalizeSourceText('a\n\nb')).toBe('a\n\nb')
  })

  it('returns an empty string for whitespace-only input', () => {
    expect(normalizeSourceText(' \n\t\r\n ')).toBe('')
  })
})

describe('generateParseCacheKey', () => {
  it('matches the documented composition', () => {
    expect(generateParseCacheKey(baseInput)).toBe(
      '88bd881c267d80b0ace6de1238912573833492f0c4d35d42f29c8f4360aa2545'
    )
  })

  it('ignores cosmetic whitespace differences in the text', () => {
    const messy = { ...baseInput, text: 'Senior Go Engineer   \r\n\r\n\r\nBuild  APIs\n' }
    expect(generateParseCacheKey(messy)).toBe(generateParseCacheKey(baseInput))
  })

  it('changes when the prompt version changes', () => {
    expect(generateParseCacheKey({ ...baseInput, promptVersion: 'p2' })).not.toBe(
      generateParseCacheKey(baseInput)
    )
  })

  it('changes when the schema version changes', () => {
    expect(generateParseCacheKey({ ...baseInput, schemaVersion: 's2' })).not.toBe(
      generateParseCacheKey(baseInput)
    )
  })

  it('separates resume and job description parses of the same text', () => {
    expect(generateParseCacheKey({ ...baseInput, kind: 'resume' })).not.toBe(
      generateParseCacheKey(baseInput)
    )
  })

  it('separates models', () => {
    expect(generateParseCacheKey({ ...baseInput, model: 'qwen2.5:7b' })).not.toBe(
      generateParseCacheKey(baseInput)
    )
  })
})
