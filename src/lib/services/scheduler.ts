/**
 * Session Scheduler
 *
 * Decides which sessions need (re)classification. A session is due when it
 * has never been classified, or when its newest message is later than the
 * `processed_upto` watermark recorded at its last classification.
 */

import { InvalidInputError } from '../errors'
import type { ClassificationStore, SessionActivity } from './store'

export interface DueSession {
  sessionId: string
  maxTimestamp: Date
  messageCount: number
}

export interface SchedulerOptions {
  /** Ignore messages older than this when aggregating activity */
  since?: Date
  /** Positive integer cap on the number of sessions returned */
  limit?: number
}

export function isDue(activity: SessionActivity): boolean {
  return activity.processedUpto === null || activity.maxTimestamp.getTime() > activity.processedUpto.getTime()
}

function assertLimit(limit: number | undefined): void {
  if (limit === undefined) return
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidInputError(`limit must be a positive integer, got ${limit}`, { limit })
  }
}

/**
 * Filters activity down to due sessions, oldest activity first, ties broken
 * by session id.
 */
export function planDueSessions(activity: readonly SessionActivity[], opts: { limit?: number } = {}): DueSession[] {
  assertLimit(opts.limit)

  const due = activity
    .filter(isDue)
    .sort(
      (a, b) =>
        a.maxTimestamp.getTime() - b.maxTimestamp.getTime() ||
        (a.sessionId < b.sessionId ? -1 : a.sessionId > b.sessionId ? 1 : 0)
    )
    .map(({ sessionId, maxTimestamp, messageCount }) => ({ sessionId, maxTimestamp, messageCount }))

  return opts.limit === undefined ? due : due.slice(0, opts.limit)
}

/**
 * Sessions due for classification.
 *
 * The store already filters and orders; the plan is re-applied here so the
 * watermark rule holds for any store implementation.
 */
export async function sessionsDue(store: ClassificationStore, opts: SchedulerOptions = {}): Promise<DueSession[]> {
  assertLimit(opts.limit)
  const activity = await store.listSessionActivity({ since: opts.since, limit: opts.limit })
  return planDueSessions(activity, { limit: opts.limit })
}
