/**
 * Persistent store contract.
 *
 * Reads feed the scheduler and the orchestrator; writes are idempotent
 * upserts keyed on session_id / message_id that refresh the run timestamp.
 */

import type { Category, ScoreVector } from '../taxonomy'

/** Aggregated message activity for one session, joined with its recorded watermark. */
export interface SessionActivity {
  sessionId: string
  maxTimestamp: Date
  messageCount: number
  /** `processed_upto` of the existing session record, or null if none */
  processedUpto: Date | null
}

export interface ActivityQuery {
  /** Only messages at or after this bound are aggregated */
  since?: Date
  /** Upper bound on rows; applied after due-filtering and oldest-first ordering */
  limit?: number
}

export interface StoredMessage {
  id: number
  sessionId: string
  role: string
  content: string | null
  timestamp: Date
}

export interface SessionClassificationRecord {
  sessionId: string
  primaryCategory: Category
  scores: ScoreVector
  processedUpto: Date
  model: string
  instructionsVersion: string | null
  notes: string | null
}

export interface MessageClassificationRecord {
  messageId: number
  sessionId: string
  role: string
  primaryCategory: Category
  scores: ScoreVector
  model: string
  instructionsVersion: string | null
}

export interface ClassificationStore {
  /** Creates the result tables if they do not exist. */
  ensureSchema(): Promise<void>
  /**
   * Sessions whose aggregated activity is newer than their recorded watermark
   * (or that have none), oldest `maxTimestamp` first.
   */
  listSessionActivity(query: ActivityQuery): Promise<SessionActivity[]>
  /** Messages of one session with a role in `roles`, chronological. */
  fetchMessages(sessionId: string, roles: readonly string[]): Promise<StoredMessage[]>
  classifiedMessageIds(sessionId: string): Promise<Set<number>>
  upsertSessionClassification(record: SessionClassificationRecord): Promise<void>
  upsertMessageClassification(record: MessageClassificationRecord): Promise<void>
  /**
   * Runs `fn` while holding an exclusive claim on the session.
   *
   * @throws SessionLockedError if another worker holds it
   */
  withSessionLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T>
}
