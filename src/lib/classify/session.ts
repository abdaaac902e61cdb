/**
 * Session-level classifier.
 *
 * Given a session's transcript in chronological order, produce a single
 * category for the whole conversation.
 *
 * Expected model output:
 * {
 *   "session_id": "abc123",
 *   "primary_category": "billing",
 *   "scores": { "billing": 0.72, "technical_support": 0.18, ... },
 *   "rationale": "Optional short rationale"
 * }
 */

import { logger } from '../logger'
import type { Taxonomy } from '../taxonomy'
import type { ModelInvoker } from './invoker'
import { hasFallbacks } from './messages'
import { buildSessionPayload, sessionSchema } from './payloads'
import { reconcileSession } from './reconcile'
import type { SessionClassification, TranscriptMessage } from './types'

export async function classifySession(params: {
  invoker: ModelInvoker
  systemInstructions: string
  taxonomy: Taxonomy
  sessionId: string
  messages: readonly TranscriptMessage[]
}): Promise<SessionClassification> {
  const { invoker, systemInstructions, taxonomy, sessionId, messages } = params
  const label = `session ${sessionId}`

  const raw = await invoker.requestJson({
    label,
    system: systemInstructions,
    payload: buildSessionPayload({ sessionId, taxonomy, messages }),
    repair: { schema: sessionSchema(taxonomy), expectedIds: [] },
    dryRun: { stage: 'classify_session', sessionId, categories: taxonomy.categories },
  })

  const { result, report } = reconcileSession(raw, taxonomy)
  if (hasFallbacks(report)) {
    logger.warn('Session classification response reconciled with fallbacks', { label, ...report })
  }
  return result
}
