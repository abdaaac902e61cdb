/**
 * User-message payloads for the classification service.
 *
 * Each payload is serialized as JSON into the single user message; the
 * instruction text fetched from the instruction source is the system message.
 */

import type { Taxonomy } from '../taxonomy'
import type { ClassificationRequestItem, TranscriptMessage } from './types'
import { ITEM_ID_KEY, ITEMS_KEY } from './reconcile'

function scoreSchema(taxonomy: Taxonomy): Record<string, string> {
  const schema: Record<string, string> = {}
  for (const c of taxonomy.categories) schema[c] = 'float in [0,1]'
  return schema
}

export function messageBatchSchema(taxonomy: Taxonomy) {
  return {
    [ITEMS_KEY]: [
      {
        [ITEM_ID_KEY]: 'int',
        primary_category: 'str',
        scores: scoreSchema(taxonomy),
      },
    ],
  }
}

export function sessionSchema(taxonomy: Taxonomy) {
  return {
    session_id: 'str',
    primary_category: 'str',
    scores: scoreSchema(taxonomy),
    rationale: 'str (<= 2 sentences)',
  }
}

export function buildMessageBatchPayload(taxonomy: Taxonomy, items: readonly ClassificationRequestItem[]) {
  const expectedIds = items.map((item) => item.id)
  return {
    task: 'single-label classification per message',
    categories: taxonomy.categories,
    expected_count: expectedIds.length,
    expected_ids: expectedIds,
    schema: messageBatchSchema(taxonomy),
    [ITEMS_KEY]: items.map((item) => ({ [ITEM_ID_KEY]: item.id, text: item.text })),
    instructions:
      `Return a JSON object with an "${ITEMS_KEY}" array containing exactly ${expectedIds.length} ` +
      `element(s), one per id in expected_ids, in the same order, each with "${ITEM_ID_KEY}" set to that id. ` +
      'Assign exactly one primary_category from categories to each message and a probability-like ' +
      'score for every category that sums to about 1. Focus on the customer\'s intent. ' +
      'If the text is off-topic or unclear, use \'other\'. Output JSON only.',
  }
}

export function buildSessionPayload(params: {
  sessionId: string
  taxonomy: Taxonomy
  messages: readonly TranscriptMessage[]
}) {
  return {
    task: 'single-label session classification',
    session_id: params.sessionId,
    categories: params.taxonomy.categories,
    schema: sessionSchema(params.taxonomy),
    messages: params.messages,
    instructions:
      'Decide the category that best represents the customer\'s overall intent across this session. ' +
      'Favor the customer\'s messages over assistant/tool content. If mixed, choose the dominant or ' +
      'final resolved intent. Use \'other\' when unclear. Output JSON only.',
  }
}

export const REPAIR_SYSTEM_PROMPT =
  'You repair malformed JSON. Convert the given text into one valid JSON object that matches the ' +
  'supplied schema. Preserve every value that can be recovered; do not invent new classifications. ' +
  'Respond with the JSON object only.'

export interface RepairHint {
  schema: unknown
  /** Ids the repaired `items` array must cover; empty for single-object responses */
  expectedIds: readonly number[]
}

export function buildRepairPayload(malformed: string, hint: RepairHint) {
  return {
    task: 'convert malformed text to valid JSON',
    schema: hint.schema,
    ...(hint.expectedIds.length > 0
      ? {
          expected_count: hint.expectedIds.length,
          expected_ids: hint.expectedIds,
        }
      : {}),
    malformed,
    instructions:
      hint.expectedIds.length > 0
        ? `Return exactly one "${ITEMS_KEY}" element per id in expected_ids. Output JSON only.`
        : 'Return a single object matching the schema. Output JSON only.',
  }
}
