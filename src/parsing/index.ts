/**
 * Parsing Module
 *
 * LLM extraction of resumes and job descriptions, backed by the parse cache.
 */

export { extractJsonBlock } from './json'
export {
  EmptyInputError,
  type ParseDocumentOptions,
  parseDocument,
  type ParsedDocument,
  ParsedDocumentSchema,
  type ParseOutcome,
  type ParseResponseMeta,
  type ParseWithCacheOptions,
  parseWithCache
} from './parse'
export {
  buildParseRequest,
  PARSE_PROMPTS,
  PARSE_SCHEMA_VERSION,
  type ParsePrompt,
  type ParseRequestOptions
} from './prompts'
