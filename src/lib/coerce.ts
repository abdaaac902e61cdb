/**
 * Parse-or-default helpers for untrusted model output.
 *
 * Every reader returns a `Coerced<T>`: either the parsed value, or the
 * fallback together with the reason the raw value was rejected. Callers
 * decide what to do with the reason (count it, log it) instead of relying on
 * swallowed exceptions.
 */

export type Coerced<T> =
  | { ok: true; value: T }
  | { ok: false; fallback: T; reason: string }

export type JsonObject = Record<string, unknown>

export function parsed<T>(value: T): Coerced<T> {
  return { ok: true, value }
}

export function defaulted<T>(fallback: T, reason: string): Coerced<T> {
  return { ok: false, fallback, reason }
}

/** Unwraps to the parsed value or the fallback. */
export function valueOf<T>(c: Coerced<T>): T {
  return c.ok ? c.value : c.fallback
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/

/**
 * Reads an integer identity. Integral numbers and digit strings are accepted;
 * fractional numbers, booleans and everything else are rejected.
 */
export function readInteger(raw: unknown): Coerced<number | null> {
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) ? parsed(raw) : defaulted(null, `not an integer: ${raw}`)
  }
  if (typeof raw === 'string' && INTEGER_STRING.test(raw)) {
    const n = Number(raw.trim())
    return Number.isSafeInteger(n) ? parsed(n) : defaulted(null, `integer out of range: ${raw}`)
  }
  return defaulted(null, raw === undefined ? 'missing' : `unsupported type: ${typeof raw}`)
}

/**
 * Reads a probability-like score, clamped into [0, 1].
 * Anything that is not a finite number or numeric string becomes 0.
 */
export function readScore(raw: unknown): Coerced<number> {
  let n: number | undefined
  if (typeof raw === 'number') {
    n = raw
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    n = Number(raw)
  }
  if (n === undefined) {
    return defaulted(0, raw === undefined ? 'missing' : `unsupported type: ${typeof raw}`)
  }
  if (!Number.isFinite(n)) {
    return defaulted(0, `not a finite number: ${String(raw)}`)
  }
  return parsed(Math.min(1, Math.max(0, n)))
}

/** Reads a member of `allowed`, falling back when absent, empty or unknown. */
export function readMember<T extends string>(
  raw: unknown,
  allowed: ReadonlySet<string>,
  fallback: T,
): Coerced<string> {
  if (typeof raw !== 'string' || raw.length === 0) {
    return defaulted(fallback, raw === undefined ? 'missing' : 'empty or not a string')
  }
  return allowed.has(raw) ? parsed(raw) : defaulted(fallback, `unknown value: ${raw}`)
}

/** Reads an array, treating anything else as empty. */
export function readArray(raw: unknown): Coerced<unknown[]> {
  if (Array.isArray(raw)) return parsed(raw)
  return defaulted([], raw === undefined ? 'missing' : 'not an array')
}

/** Reads an optional string, capped at `maxChars`. */
export function readOptionalString(raw: unknown, maxChars: number): Coerced<string | null> {
  if (typeof raw !== 'string') {
    return defaulted(null, raw === undefined ? 'missing' : 'not a string')
  }
  const trimmed = raw.trim()
  if (!trimmed) return defaulted(null, 'empty')
  return parsed(trimmed.length <= maxChars ? trimmed : trimmed.slice(0, maxChars))
}
