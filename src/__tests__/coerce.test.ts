import { describe, it, expect } from 'vitest'
import {
  isJsonObject,
  readArray,
  readInteger,
  readMember,
  readOptionalString,
  readScore,
  valueOf,
} from '../lib/coerce'

describe('readInteger', () => {
  it.each([
    [42, 42],
    [0, 0],
    [-7, -7],
    ['15', 15],
    [' +3 ', 3],
    ['-12', -12],
  ])('accepts %j', (raw, expected) => {
    expect(readInteger(raw)).toEqual({ ok: true, value: expected })
  })

  it.each([1.5, true, null, '1.0', '12abc', '', [], {}, Number.MAX_SAFE_INTEGER + 1, NaN])('rejects %j', (raw) => {
    const result = readInteger(raw)
    expect(result.ok).toBe(false)
    expect(valueOf(result)).toBeNull()
  })

  it('reports why a value was rejected', () => {
    expect(readInteger(undefined)).toEqual({ ok: false, fallback: null, reason: 'missing' })
    expect(readInteger(true)).toEqual({ ok: false, fallback: null, reason: 'unsupported type: boolean' })
    expect(readInteger(2.5)).toEqual({ ok: false, fallback: null, reason: 'not an integer: 2.5' })
  })
})

describe('readScore', () => {
  it('accepts numbers and numeric strings', () => {
    expect(readScore(0.25)).toEqual({ ok: true, value: 0.25 })
    expect(readScore('0.8')).toEqual({ ok: true, value: 0.8 })
  })

  it('clamps into [0, 1]', () => {
    expect(valueOf(readScore(1.7))).toBe(1)
    expect(valueOf(readScore(-0.2))).toBe(0)
    expect(valueOf(readScore('42'))).toBe(1)
  })

  it.each([undefined, null, 'high', '', '  ', true, {}, NaN, Infinity])('defaults %j to 0', (raw) => {
    const result = readScore(raw)
    expect(result.ok).toBe(false)
    expect(valueOf(result)).toBe(0)
  })
})

describe('readMember', () => {
  const allowed = new Set(['billing', 'other'])

  it('accepts members', () => {
    expect(readMember('billing', allowed, 'other')).toEqual({ ok: true, value: 'billing' })
  })

  it('falls back for unknown, empty, non-string or missing values', () => {
    expect(readMember('Billing', allowed, 'other')).toEqual({
      ok: false,
      fallback: 'other',
      reason: 'unknown value: Billing',
    })
    expect(valueOf(readMember('', allowed, 'other'))).toBe('other')
    expect(valueOf(readMember(3, allowed, 'other'))).toBe('other')
    expect(readMember(undefined, allowed, 'other')).toEqual({ ok: false, fallback: 'other', reason: 'missing' })
  })
})

describe('readArray', () => {
  it('passes arrays through and empties anything else', () => {
    expect(readArray([1, 2])).toEqual({ ok: true, value: [1, 2] })
    expect(readArray({ 0: 'a' })).toEqual({ ok: false, fallback: [], reason: 'not an array' })
    expect(readArray(undefined)).toEqual({ ok: false, fallback: [], reason: 'missing' })
  })
})

describe('readOptionalString', () => {
  it('trims and caps', () => {
    expect(readOptionalString('  hello  ', 100)).toEqual({ ok: true, value: 'hello' })
    expect(readOptionalString('abcdef', 3)).toEqual({ ok: true, value: 'abc' })
  })

  it('treats blank and non-string values as null', () => {
    expect(valueOf(readOptionalString('   ', 10))).toBeNull()
    expect(valueOf(readOptionalString(12, 10))).toBeNull()
    expect(valueOf(readOptionalString(undefined, 10))).toBeNull()
  })
})

describe('isJsonObject', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({})).toBe(true)
    expect(isJsonObject([])).toBe(false)
    expect(isJsonObject(null)).toBe(false)
    expect(isJsonObject('{}')).toBe(false)
  })
})
