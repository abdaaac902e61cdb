/**
 * Response Coercion Engine
 *
 * Turns a parsed (but untrusted) classification response into exactly one
 * result per expected id, in the order of `expectedIds`. Missing, foreign,
 * duplicate or malformed items never raise: they fall back to the reserved
 * category and a uniform score vector. Only a non-object response is a
 * caller error.
 *
 * Pure: no I/O, no logging.
 */

import {
  isJsonObject,
  readArray,
  readInteger,
  readMember,
  readOptionalString,
  readScore,
  valueOf,
} from '../coerce'
import type { JsonObject } from '../coerce'
import { FALLBACK_CATEGORY, uniformScores } from '../taxonomy'
import type { ScoreVector, Taxonomy } from '../taxonomy'
import type { ClassificationResult, ReconcileReport, SessionClassification } from './types'

export const ITEMS_KEY = 'items'
export const ITEM_ID_KEY = 'message_id'
export const NOTES_MAX_CHARS = 1000

function emptyReport(): ReconcileReport {
  return {
    candidates: 0,
    discardedUnparsableId: 0,
    discardedForeignId: 0,
    discardedDuplicate: 0,
    defaultedCategory: 0,
    defaultedScores: 0,
    uniformFallback: 0,
    synthesized: 0,
  }
}

function assertObject(raw: unknown): asserts raw is JsonObject {
  if (!isJsonObject(raw)) {
    throw new TypeError(
      `Classification response must be a JSON object, got ${Array.isArray(raw) ? 'array' : typeof raw}`
    )
  }
}

/**
 * Builds a complete score vector over the taxonomy. Absent or uncoercible
 * entries become 0; an all-zero vector becomes uniform. Keys outside the
 * taxonomy are dropped.
 */
export function coerceScores(
  raw: unknown,
  taxonomy: Taxonomy,
  report: ReconcileReport = emptyReport(),
): ScoreVector {
  const source: JsonObject = isJsonObject(raw) ? raw : {}
  const scores: ScoreVector = {}
  let total = 0
  for (const category of taxonomy.categories) {
    const coerced = readScore(source[category])
    if (!coerced.ok && source[category] !== undefined) report.defaultedScores += 1
    const value = valueOf(coerced)
    scores[category] = value
    total += value
  }

  if (total === 0) {
    report.uniformFallback += 1
    return uniformScores(taxonomy)
  }
  return scores
}

function coerceLabel(raw: JsonObject, taxonomy: Taxonomy, report: ReconcileReport) {
  const category = readMember(raw.primary_category, taxonomy.members, FALLBACK_CATEGORY)
  if (!category.ok) report.defaultedCategory += 1
  return {
    primaryCategory: valueOf(category),
    scores: coerceScores(raw.scores, taxonomy, report),
  }
}

/**
 * Like `reconcile`, but also returns counters describing every fallback.
 *
 * @throws TypeError if `raw` is not a JSON object
 */
export function reconcileWithReport(
  raw: unknown,
  expectedIds: readonly number[],
  taxonomy: Taxonomy,
): { results: ClassificationResult[]; report: ReconcileReport } {
  assertObject(raw)
  const report = emptyReport()
  const expected = new Set(expectedIds)
  const kept = new Map<number, ClassificationResult>()

  const candidates = valueOf(readArray(raw[ITEMS_KEY]))
  report.candidates = candidates.length

  for (const candidate of candidates) {
    const item: JsonObject = isJsonObject(candidate) ? candidate : {}
    const id = valueOf(readInteger(item[ITEM_ID_KEY]))
    if (id === null) {
      report.discardedUnparsableId += 1
      continue
    }
    if (!expected.has(id)) {
      report.discardedForeignId += 1
      continue
    }
    // First occurrence wins
    if (kept.has(id)) {
      report.discardedDuplicate += 1
      continue
    }
    kept.set(id, { id, ...coerceLabel(item, taxonomy, report) })
  }

  const results = expectedIds.map((id): ClassificationResult => {
    const hit = kept.get(id)
    if (hit) return { ...hit, scores: { ...hit.scores } }
    report.synthesized += 1
    return { id, primaryCategory: FALLBACK_CATEGORY, scores: uniformScores(taxonomy) }
  })

  return { results, report }
}

/**
 * Reconciles a message-batch response into one result per expected id.
 *
 * @throws TypeError if `raw` is not a JSON object
 */
export function reconcile(
  raw: unknown,
  expectedIds: readonly number[],
  taxonomy: Taxonomy,
): ClassificationResult[] {
  return reconcileWithReport(raw, expectedIds, taxonomy).results
}

/**
 * Reconciles a session-level response: same category and score policy as
 * message items, plus an optional rationale kept as notes.
 *
 * @throws TypeError if `raw` is not a JSON object
 */
export function reconcileSession(
  raw: unknown,
  taxonomy: Taxonomy,
): { result: SessionClassification; report: ReconcileReport } {
  assertObject(raw)
  const report = emptyReport()
  report.candidates = 1
  const label = coerceLabel(raw, taxonomy, report)
  return {
    result: { ...label, notes: valueOf(readOptionalString(raw.rationale, NOTES_MAX_CHARS)) },
    report,
  }
}
