import { describe, expect, it } from 'vitest'
import { extractJsonBlock } from './json'

describe('extractJsonBlock', () => {
  it('returns a bare object unchanged apart from whitespace', () => {
    expect(extractJsonBlock('  {"a":1}\n')).toBe('{"a":1}')
  })

  it('unwraps a json fence', () => {
    expect(extractJsonBlock('Here you go:\n```json\n{"a": [1, 2]}\n```\nDone.')).toBe(
      '{"a": [1, 2]}'
    )
  })

  it('unwraps a plain fence', () => {
    expect(extractJsonBlock('```\n[1, 2]\n```')).toBe('[1, 2]')
  })

  it('cuts the object out of surrounding prose', () => {
    expect(extractJsonBlock('Sure! {"title": "SRE"} Hope this helps')).toBe('{"title": "SRE"}')
  })

  it('returns the trimmed reply when there is no JSON', () => {
    expect(extractJsonBlock('  no json here ')).toBe('no json here')
  })
})
