/**
 * JSON Extraction
 *
 * Models wrap JSON in markdown fences or chatter even in JSON mode.
 */

const FENCED = /```(?:json)?\s*([\s\S]*?)\s*```/

/**
 * Pull the JSON document out of a model reply: the first fenced block if
 * there is one, otherwise the span from the first `{` to the last `}`.
 * Returns the trimmed reply when neither is found.
 */
export function extractJsonBlock(content: string): string {
  const fenced = content.match(FENCED)
  if (fenced?.[1] !== undefined) {
    return fenced[1].trim()
  }

  const trimmed = content.trim()
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    return trimmed
  }

  const start = trimmed.indexOf('{')
  const end = trimmed.lastIndexOf('}')
  if (start !== -1 && end > start) {
    return trimmed.slice(start, end + 1)
  }
  return trimmed
}
