/**
 * Parse Prompts
 *
 * Bump a prompt's version whenever its text changes; the version is part of
 * the cache key.
 */

import type { ParseKind } from '../caching/key'
import { type RequestOptions, systemPromptRequest } from '../llm/request'
import type { LlmRequest } from '../llm/types'

/** Version of the structured output shape shared by both prompts */
export const PARSE_SCHEMA_VERSION = '1'

export interface ParsePrompt {
  readonly version: string
  readonly system: string
  readonly label: string
}

const SYSTEM_PREAMBLE =
  'You extract structured data from documents. Reply with a single JSON object and ' +
  'nothing else. Use null for facts the document does not state. Never invent facts.'

export const PARSE_PROMPTS: Record<ParseKind, ParsePrompt> = {
  resume: {
    version: 'resume-v1',
    label: 'Resume',
    system:
      `${SYSTEM_PREAMBLE}\n\nFields: basic_info (name, education, years_of_experience, ` +
      'current_title, city), skills (name, level, evidence), experiences (company, title, ' +
      'start, end, highlights), projects (name, role, tech_stack, highlights).'
  },
  jd: {
    version: 'jd-v1',
    label: 'Job description',
    system:
      `${SYSTEM_PREAMBLE}\n\nFields: basic_info (title, company, city, salary_range, ` +
      'experience_years, education), hard_requirements (type, value, evidence), ' +
      'soft_requirements (type, value, weight), implicit_requirements (value, reasoning), ' +
      'ideal_candidate.'
  }
}

export type ParseRequestOptions = Pick<RequestOptions, 'temperature' | 'maxTokens'>

export function buildParseRequest(
  kind: ParseKind,
  text: string,
  options: ParseRequestOptions = {}
): LlmRequest {
  const prompt = PARSE_PROMPTS[kind]
  return systemPromptRequest(prompt.system, `${prompt.label}:\n\n${text}`, {
    temperature: options.temperature,
    maxTokens: options.maxTokens,
    jsonMode: true
  })
}
