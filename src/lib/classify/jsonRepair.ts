/**
 * JSON parsing and local repair for model output.
 *
 * Parsing never throws: it yields a `ParseOutcome`. Local repair is
 * conservative string surgery that is only attempted after a plain parse
 * has failed, so valid JSON is never altered:
 *   1. close an unterminated string and any unclosed `{` / `[` (innermost first)
 *   2. drop a `,` that sits directly before `}` or `]` (bounded passes)
 */

import { isJsonObject } from '../coerce'
import type { JsonObject } from '../coerce'

export type ParseOutcome =
  | { kind: 'parsed'; value: JsonObject; repaired: boolean }
  | { kind: 'syntax_error'; raw: string; message: string }

export const MAX_SEPARATOR_PASSES = 3

/**
 * Scans `text` outside of string literals, calling `visit` for every
 * structural character. Returns whether the text ends inside a string and
 * whether that string ends on a pending escape.
 */
function scanStructure(
  text: string,
  visit: (ch: string, index: number) => void,
): { inString: boolean; escaped: boolean } {
  let inString = false
  let escaped = false
  for (let i = 0; i < text.length; i++) {
    const ch = text[i]
    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === '"') {
        inString = false
      }
      continue
    }
    if (ch === '"') {
      inString = true
      continue
    }
    visit(ch, i)
  }
  return { inString, escaped }
}

/**
 * Candidate JSON texts in priority order: the whole text, fenced code
 * blocks, then the first balanced top-level object embedded in prose.
 */
export function extractJsonCandidates(rawText: string): string[] {
  const candidates: string[] = []
  const seen = new Set<string>()

  const addCandidate = (candidate: string) => {
    const trimmed = candidate.trim()
    if (!trimmed || seen.has(trimmed)) return
    seen.add(trimmed)
    candidates.push(trimmed)
  }

  addCandidate(rawText)

  const fencedBlockRegex = /```(?:json)?\s*([\s\S]*?)\s*```/gi
  let match: RegExpExecArray | null
  while ((match = fencedBlockRegex.exec(rawText)) !== null) {
    addCandidate(match[1])
  }

  // Only an object outside every enclosing aggregate counts; an object
  // nested in a bare array is an item, not the reply.
  const open: string[] = []
  let objectStart = -1
  let found = false
  scanStructure(rawText, (ch, i) => {
    if (found) return
    if (ch === '{' || ch === '[') {
      if (ch === '{' && open.length === 0) objectStart = i
      open.push(ch === '{' ? '}' : ']')
    } else if ((ch === '}' || ch === ']') && open[open.length - 1] === ch) {
      open.pop()
      if (ch === '}' && open.length === 0 && objectStart >= 0) {
        addCandidate(rawText.slice(objectStart, i + 1))
        found = true
      }
    }
  })

  return candidates
}

/**
 * Appends whatever is needed to close an unterminated string and every
 * unclosed aggregate. Mismatched closers are left alone.
 */
export function closeOpenAggregates(text: string): string {
  const stack: string[] = []
  const end = scanStructure(text, (ch) => {
    if (ch === '{') stack.push('}')
    else if (ch === '[') stack.push(']')
    else if ((ch === '}' || ch === ']') && stack[stack.length - 1] === ch) stack.pop()
  })

  let out = text
  if (end.inString) {
    if (end.escaped) out = out.slice(0, -1)
    out += '"'
  }
  return out + stack.reverse().join('')
}

/**
 * Removes `,` separators whose next non-whitespace character closes an
 * aggregate. Repeats until stable or `maxPasses` is reached.
 */
export function stripDanglingSeparators(text: string, maxPasses = MAX_SEPARATOR_PASSES): string {
  let current = text
  for (let pass = 0; pass < maxPasses; pass++) {
    const drop = new Set<number>()
    scanStructure(current, (ch, i) => {
      if (ch !== ',') return
      let j = i + 1
      while (j < current.length && /\s/.test(current[j])) j++
      if (current[j] === '}' || current[j] === ']') drop.add(i)
    })
    if (drop.size === 0) break
    let next = ''
    for (let i = 0; i < current.length; i++) {
      if (!drop.has(i)) next += current[i]
    }
    current = next
  }
  return current
}

export function repairJson(text: string): string {
  return stripDanglingSeparators(closeOpenAggregates(text.trim()))
}

function tryParseObject(text: string): { ok: true; value: JsonObject } | { ok: false; message: string } {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : 'Unknown parse error' }
  }
  if (!isJsonObject(value)) {
    return { ok: false, message: `Expected a JSON object, got ${Array.isArray(value) ? 'array' : typeof value}` }
  }
  return { ok: true, value }
}

/**
 * Parses model output into a JSON object: every candidate as-is first, then
 * every candidate after local repair.
 */
export function parseModelJson(text: string): ParseOutcome {
  const candidates = extractJsonCandidates(text)
  let firstError = 'Empty model output'

  for (const candidate of candidates) {
    const attempt = tryParseObject(candidate)
    if (attempt.ok) return { kind: 'parsed', value: attempt.value, repaired: false }
    if (firstError === 'Empty model output') firstError = attempt.message
  }

  for (const candidate of candidates) {
    const attempt = tryParseObject(repairJson(candidate))
    if (attempt.ok) return { kind: 'parsed', value: attempt.value, repaired: true }
  }

  return { kind: 'syntax_error', raw: text, message: firstError }
}
