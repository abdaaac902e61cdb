/**
 * Postgres access.
 *
 * The rest of the code depends on the small `Database` interface rather than
 * on pg directly, so tests can substitute a recording fake. Rows come back
 * as `unknown` and are validated where they are read.
 */

import { Pool } from 'pg'

export interface Queryable {
  query(text: string, values?: readonly unknown[]): Promise<{ rows: unknown[] }>
}

/** A single checked-out connection; session-scoped state (advisory locks) lives here. */
export interface DbConnection extends Queryable {
  release(): void
}

export interface Database extends Queryable {
  connect(): Promise<DbConnection>
  end(): Promise<void>
}

export function createDatabase(connectionString: string, opts: { max?: number } = {}): Database {
  const pool = new Pool({ connectionString, max: opts.max ?? 5 })

  return {
    async query(text, values) {
      const result = await pool.query(text, values ? [...values] : undefined)
      return { rows: result.rows }
    },
    async connect() {
      const client = await pool.connect()
      return {
        async query(text, values) {
          const result = await client.query(text, values ? [...values] : undefined)
          return { rows: result.rows }
        },
        release: () => client.release(),
      }
    },
    end: () => pool.end(),
  }
}
