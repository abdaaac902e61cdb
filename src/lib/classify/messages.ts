/**
 * Per-message classifier.
 *
 * Expected model output:
 * {
 *   "items": [
 *     { "message_id": 123, "primary_category": "billing", "scores": { "billing": 0.9, ... } }
 *   ]
 * }
 */

import { logger } from '../logger'
import type { Taxonomy } from '../taxonomy'
import type { ModelInvoker } from './invoker'
import { buildMessageBatchPayload, messageBatchSchema } from './payloads'
import { reconcileWithReport } from './reconcile'
import type { ClassificationRequestItem, ClassificationResult, ReconcileReport } from './types'

export function hasFallbacks(report: ReconcileReport): boolean {
  return (
    report.discardedUnparsableId +
      report.discardedForeignId +
      report.discardedDuplicate +
      report.defaultedCategory +
      report.defaultedScores +
      report.synthesized >
    0
  )
}

/**
 * Classifies one batch. Always returns exactly one result per batch item,
 * in batch order.
 */
export async function classifyMessages(params: {
  invoker: ModelInvoker
  systemInstructions: string
  taxonomy: Taxonomy
  batch: readonly ClassificationRequestItem[]
  label?: string
}): Promise<ClassificationResult[]> {
  const { invoker, systemInstructions, taxonomy, batch } = params
  if (batch.length === 0) return []

  const expectedIds = batch.map((item) => item.id)
  const label = params.label ?? `message batch of ${batch.length}`

  const raw = await invoker.requestJson({
    label,
    system: systemInstructions,
    payload: buildMessageBatchPayload(taxonomy, batch),
    repair: { schema: messageBatchSchema(taxonomy), expectedIds },
    dryRun: { stage: 'classify_messages', expectedIds, categories: taxonomy.categories },
  })

  const { results, report } = reconcileWithReport(raw, expectedIds, taxonomy)
  if (hasFallbacks(report)) {
    logger.warn('Message classification response reconciled with fallbacks', { label, ...report })
  }
  return results
}
