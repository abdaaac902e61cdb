/**
 * Postgres implementation of ClassificationStore.
 *
 * Reads the existing `messages` table and owns the two result tables
 * created by sql/create_result_tables.sql. Upserts use ON CONFLICT so that
 * re-applying a result replaces the business fields and bumps `run_at`.
 */

import { readFile } from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import type { Database } from '../db'
import { PersistenceError } from '../errors'
import { withLock } from './advisory-lock'
import type {
  ActivityQuery,
  ClassificationStore,
  MessageClassificationRecord,
  SessionActivity,
  SessionClassificationRecord,
  StoredMessage,
} from './store'

export const DEFAULT_SCHEMA_PATH = path.resolve(__dirname, '../../../sql/create_result_tables.sql')

/*
 * Watermarks are compared at millisecond resolution, the precision a JS Date
 * round-trips through processed_upto.
 */
const SESSION_ACTIVITY_SQL = `
SELECT agg.session_id, agg.max_ts, agg.message_count, sc.processed_upto
FROM (
  SELECT m.session_id,
         date_trunc('milliseconds', MAX(m.timestamp)) AS max_ts,
         COUNT(m.id) AS message_count
  FROM messages m
  WHERE $1::timestamptz IS NULL OR m.timestamp >= $1::timestamptz
  GROUP BY m.session_id
) agg
LEFT JOIN session_classification sc ON sc.session_id = agg.session_id
WHERE sc.processed_upto IS NULL OR agg.max_ts > sc.processed_upto
ORDER BY agg.max_ts ASC, agg.session_id ASC
LIMIT $2::bigint`

const MESSAGES_SQL = `
SELECT id, session_id, role, content, timestamp
FROM messages
WHERE session_id = $1 AND role = ANY($2::text[])
ORDER BY timestamp ASC, id ASC`

const CLASSIFIED_IDS_SQL = `
SELECT message_id FROM message_classification WHERE session_id = $1`

const UPSERT_SESSION_SQL = `
INSERT INTO session_classification
  (session_id, primary_category, all_categories, processed_upto, model, instructions_version, notes)
VALUES ($1, $2, $3::jsonb, $4, $5, $6, $7)
ON CONFLICT (session_id) DO UPDATE SET
  primary_category = EXCLUDED.primary_category,
  all_categories = EXCLUDED.all_categories,
  processed_upto = EXCLUDED.processed_upto,
  run_at = NOW(),
  model = EXCLUDED.model,
  instructions_version = EXCLUDED.instructions_version,
  notes = EXCLUDED.notes`

const UPSERT_MESSAGE_SQL = `
INSERT INTO message_classification
  (message_id, session_id, role, primary_category, all_categories, model, instructions_version)
VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7)
ON CONFLICT (message_id) DO UPDATE SET
  session_id = EXCLUDED.session_id,
  role = EXCLUDED.role,
  primary_category = EXCLUDED.primary_category,
  all_categories = EXCLUDED.all_categories,
  run_at = NOW(),
  model = EXCLUDED.model,
  instructions_version = EXCLUDED.instructions_version`

const ActivityRow = z.object({
  session_id: z.string(),
  max_ts: z.date(),
  message_count: z.coerce.number().int(),
  processed_upto: z.date().nullable(),
})

const MessageRow = z.object({
  id: z.coerce.number().int(),
  session_id: z.string(),
  role: z.string(),
  content: z.string().nullable(),
  timestamp: z.date(),
})

const ClassifiedIdRow = z.object({
  message_id: z.coerce.number().int(),
})

export interface PgStoreOptions {
  schemaPath?: string
}

export class PgClassificationStore implements ClassificationStore {
  private readonly schemaPath: string

  constructor(private readonly db: Database, options: PgStoreOptions = {}) {
    this.schemaPath = options.schemaPath ?? DEFAULT_SCHEMA_PATH
  }

  async ensureSchema(): Promise<void> {
    const ddl = await readFile(this.schemaPath, 'utf8')
    await this.run('ensureSchema', ddl)
  }

  async listSessionActivity(query: ActivityQuery): Promise<SessionActivity[]> {
    const rows = await this.run('listSessionActivity', SESSION_ACTIVITY_SQL, [
      query.since ?? null,
      query.limit ?? null,
    ])
    return rows.map((raw) => {
      const row = ActivityRow.parse(raw)
      return {
        sessionId: row.session_id,
        maxTimestamp: row.max_ts,
        messageCount: row.message_count,
        processedUpto: row.processed_upto,
      }
    })
  }

  async fetchMessages(sessionId: string, roles: readonly string[]): Promise<StoredMessage[]> {
    const rows = await this.run('fetchMessages', MESSAGES_SQL, [sessionId, [...roles]])
    return rows.map((raw) => {
      const row = MessageRow.parse(raw)
      return {
        id: row.id,
        sessionId: row.session_id,
        role: row.role,
        content: row.content,
        timestamp: row.timestamp,
      }
    })
  }

  async classifiedMessageIds(sessionId: string): Promise<Set<number>> {
    const rows = await this.run('classifiedMessageIds', CLASSIFIED_IDS_SQL, [sessionId])
    return new Set(rows.map((raw) => ClassifiedIdRow.parse(raw).message_id))
  }

  async upsertSessionClassification(record: SessionClassificationRecord): Promise<void> {
    await this.run('upsertSessionClassification', UPSERT_SESSION_SQL, [
      record.sessionId,
      record.primaryCategory,
      JSON.stringify(record.scores),
      record.processedUpto,
      record.model,
      record.instructionsVersion,
      record.notes,
    ])
  }

  async upsertMessageClassification(record: MessageClassificationRecord): Promise<void> {
    await this.run('upsertMessageClassification', UPSERT_MESSAGE_SQL, [
      record.messageId,
      record.sessionId,
      record.role,
      record.primaryCategory,
      JSON.stringify(record.scores),
      record.model,
      record.instructionsVersion,
    ])
  }

  withSessionLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return withLock(this.db, sessionId, fn)
  }

  private async run(operation: string, text: string, values?: unknown[]): Promise<unknown[]> {
    try {
      const { rows } = await this.db.query(text, values)
      return rows
    } catch (err) {
      throw new PersistenceError(operation, err)
    }
  }
}
