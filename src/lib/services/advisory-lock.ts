/**
 * Advisory Lock Service
 *
 * Postgres advisory locks keyed on session id, so two pipeline processes
 * never classify the same session at once.
 *
 * Advisory locks are connection-scoped in Postgres, so acquire and release
 * run on one dedicated connection checked out for the duration of `fn`.
 */

import type { Database } from '../db'
import { SessionLockedError } from '../errors'
import { logger } from '../logger'

/**
 * Computes a stable non-negative int64 lock key from a session id.
 */
export function computeLockKey(sessionId: string): bigint {
  let hash = BigInt(0)
  for (let i = 0; i < sessionId.length; i++) {
    hash = (hash * BigInt(31) + BigInt(sessionId.charCodeAt(i))) % BigInt(2 ** 63)
  }
  return hash
}

function readAcquired(rows: unknown[]): boolean {
  const row = rows[0]
  return typeof row === 'object' && row !== null && 'acquired' in row && row.acquired === true
}

/**
 * Executes `fn` while holding the session's advisory lock.
 *
 * @throws SessionLockedError if the lock is held elsewhere
 */
export async function withLock<T>(db: Database, sessionId: string, fn: () => Promise<T>): Promise<T> {
  const lockKey = computeLockKey(sessionId).toString()
  const client = await db.connect()

  try {
    const { rows } = await client.query('SELECT pg_try_advisory_lock($1::bigint) AS acquired', [lockKey])
    if (!readAcquired(rows)) {
      throw new SessionLockedError(sessionId)
    }

    try {
      return await fn()
    } finally {
      try {
        await client.query('SELECT pg_advisory_unlock($1::bigint)', [lockKey])
      } catch (err) {
        // Postgres drops the lock with the connection anyway
        logger.warn('Failed to release advisory lock', {
          sessionId,
          error: err instanceof Error ? err.message : String(err),
        })
      }
    }
  } finally {
    client.release()
  }
}
