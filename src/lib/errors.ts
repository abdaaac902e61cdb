/**
 * Shared typed service errors for instanceof dispatch.
 *
 * Each subclass carries a fixed `code` so the CLI and the pipeline can tell
 * fatal startup problems apart from per-session failures without matching
 * on message text.
 */

export class ServiceError extends Error {
  readonly code: string
  readonly details?: Record<string, unknown>

  constructor(message: string, opts: { code: string; details?: Record<string, unknown> }) {
    super(message)
    this.name = this.constructor.name
    this.code = opts.code
    this.details = opts.details
  }
}

export class InvalidInputError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'INVALID_INPUT', details })
  }
}

export class ConfigError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'CONFIG_INVALID', details })
  }
}

export class TaxonomyError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'TAXONOMY_INVALID', details })
  }
}

export class PersistenceError extends ServiceError {
  constructor(operation: string, cause: unknown) {
    super(
      `Persistence failed during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { code: 'PERSISTENCE_FAILED', details: { operation } }
    )
  }
}

export class SessionLockedError extends ServiceError {
  readonly sessionId: string

  constructor(sessionId: string) {
    super(`Session is being classified by another worker: ${sessionId}`, {
      code: 'SESSION_LOCKED',
      details: { sessionId },
    })
    this.sessionId = sessionId
  }
}
