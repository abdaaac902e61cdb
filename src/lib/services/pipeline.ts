/**
 * Batch Orchestrator
 *
 * One pass over the sessions the scheduler reports as due. Per session:
 * fetch its messages, optionally classify the whole transcript, optionally
 * classify the individual messages in batches, and upsert every result as
 * soon as it is available.
 *
 * Failures are isolated per session: a session whose model call or write
 * fails is counted and the pass moves on. Errors that would fail every
 * session alike (spend cap, configuration, credentials) abort the pass.
 */

import { classifyMessages, classifySession } from '../classify'
import type { InvokerUsage, ModelInvoker } from '../classify'
import { ConfigError, SessionLockedError, TaxonomyError } from '../errors'
import type { LoadedInstructions, InstructionSource } from '../instructions'
import { BudgetExceededError, MissingApiKeyError } from '../llm'
import { logger } from '../logger'
import type { Taxonomy } from '../taxonomy'
import { sessionsDue } from './scheduler'
import type { DueSession } from './scheduler'
import type { ClassificationStore, StoredMessage } from './store'
import { chunk, DEFAULT_MAX_MESSAGE_CHARS, stripFirstUserMarker, toRequestItems, toTranscript } from './transcript'

export interface PipelineDeps {
  store: ClassificationStore
  invoker: ModelInvoker
  taxonomy: Taxonomy
  instructions: InstructionSource
  instructionNames: { session: string; message: string }
  maxMessageChars?: number
  firstUserSplitMarker?: string
}

export interface PipelineOptions {
  /** Message roles to include; defaults to ['user'] */
  roles?: readonly string[]
  since?: Date
  limit?: number
  runSessionClassification?: boolean
  runMessageClassification?: boolean
  /** Classify messages that already have a result row */
  reclassifyExistingMessages?: boolean
  /** Messages per model call; unset means one call per session */
  perSessionMessageBatchSize?: number
  /** Classify without writing any result rows */
  dryRun?: boolean
}

export interface SessionFailure {
  sessionId: string
  code: string
  message: string
}

export interface PipelineResult {
  sessionsProcessed: number
  messagesProcessed: number
  sessionsFailed: number
  sessionsSkipped: number
  failures: SessionFailure[]
  usage: InvokerUsage
}

interface SessionOutcome {
  sessionClassified: boolean
  messagesClassified: number
}

interface RunContext {
  deps: PipelineDeps
  roles: readonly string[]
  runSession: boolean
  runMessages: boolean
  reclassify: boolean
  batchSize?: number
  dryRun: boolean
  maxChars: number
  sessionInstructions?: LoadedInstructions
  messageInstructions?: LoadedInstructions
}

export function isFatalPipelineError(err: unknown): boolean {
  return (
    err instanceof BudgetExceededError ||
    err instanceof MissingApiKeyError ||
    err instanceof ConfigError ||
    err instanceof TaxonomyError
  )
}

function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : err.name
    return { code, message: err.message }
  }
  return { code: 'UNKNOWN', message: String(err) }
}

async function classifySessionLevel(
  ctx: RunContext,
  session: DueSession,
  messages: readonly StoredMessage[],
  instructions: LoadedInstructions,
): Promise<boolean> {
  const { store, invoker, taxonomy } = ctx.deps
  if (messages.length === 0) return false

  const result = await classifySession({
    invoker,
    systemInstructions: instructions.text,
    taxonomy,
    sessionId: session.sessionId,
    messages: toTranscript(messages, ctx.maxChars),
  })

  if (!ctx.dryRun) {
    await store.upsertSessionClassification({
      sessionId: session.sessionId,
      primaryCategory: result.primaryCategory,
      scores: result.scores,
      processedUpto: session.maxTimestamp,
      model: invoker.model,
      instructionsVersion: instructions.version,
      notes: result.notes,
    })
  }
  return true
}

async function classifyMessageLevel(
  ctx: RunContext,
  session: DueSession,
  messages: readonly StoredMessage[],
  instructions: LoadedInstructions,
): Promise<number> {
  const { store, invoker, taxonomy } = ctx.deps
  if (messages.length === 0) return 0

  const already = ctx.reclassify ? new Set<number>() : await store.classifiedMessageIds(session.sessionId)
  const targets = messages.filter((m) => !already.has(m.id))
  if (targets.length === 0) {
    logger.debug('All messages already classified', { sessionId: session.sessionId })
    return 0
  }

  const byId = new Map(targets.map((m) => [m.id, m]))
  const batches = chunk(targets, ctx.batchSize)
  let classified = 0

  for (const [index, batch] of batches.entries()) {
    const results = await classifyMessages({
      invoker,
      systemInstructions: instructions.text,
      taxonomy,
      batch: toRequestItems(batch, ctx.maxChars),
      label: `session ${session.sessionId} batch ${index + 1}/${batches.length}`,
    })

    for (const result of results) {
      const message = byId.get(result.id)
      if (!message) continue
      if (!ctx.dryRun) {
        await store.upsertMessageClassification({
          messageId: message.id,
          sessionId: message.sessionId,
          role: message.role,
          primaryCategory: result.primaryCategory,
          scores: result.scores,
          model: invoker.model,
          instructionsVersion: instructions.version,
        })
      }
      classified += 1
    }
  }
  return classified
}

async function processSession(ctx: RunContext, session: DueSession): Promise<SessionOutcome> {
  const { store, firstUserSplitMarker } = ctx.deps

  let messages = await store.fetchMessages(session.sessionId, ctx.roles)
  if (firstUserSplitMarker) {
    messages = stripFirstUserMarker(messages, firstUserSplitMarker)
  }

  const sessionClassified =
    ctx.runSession && ctx.sessionInstructions
      ? await classifySessionLevel(ctx, session, messages, ctx.sessionInstructions)
      : false

  const messagesClassified =
    ctx.runMessages && ctx.messageInstructions
      ? await classifyMessageLevel(ctx, session, messages, ctx.messageInstructions)
      : 0

  return { sessionClassified, messagesClassified }
}

/**
 * Runs one classification pass.
 *
 * @throws on errors that abort the run (see isFatalPipelineError) and on
 *   failures before the first session, such as schema or instruction loading
 */
export async function runPipeline(deps: PipelineDeps, options: PipelineOptions = {}): Promise<PipelineResult> {
  const runSession = options.runSessionClassification ?? true
  const runMessages = options.runMessageClassification ?? true
  const dryRun = options.dryRun ?? false

  await deps.store.ensureSchema()

  const ctx: RunContext = {
    deps,
    roles: options.roles ?? ['user'],
    runSession,
    runMessages,
    reclassify: options.reclassifyExistingMessages ?? false,
    batchSize: options.perSessionMessageBatchSize,
    dryRun,
    maxChars: deps.maxMessageChars ?? DEFAULT_MAX_MESSAGE_CHARS,
    sessionInstructions: runSession ? await deps.instructions.load(deps.instructionNames.session) : undefined,
    messageInstructions: runMessages ? await deps.instructions.load(deps.instructionNames.message) : undefined,
  }

  const due = await sessionsDue(deps.store, { since: options.since, limit: options.limit })
  logger.info(`Found ${due.length} session(s) due for classification`, {
    since: options.since?.toISOString(),
    limit: options.limit,
    dryRun,
  })

  const result: PipelineResult = {
    sessionsProcessed: 0,
    messagesProcessed: 0,
    sessionsFailed: 0,
    sessionsSkipped: 0,
    failures: [],
    usage: deps.invoker.usage,
  }

  for (const session of due) {
    try {
      const outcome = await deps.store.withSessionLock(session.sessionId, () => processSession(ctx, session))
      if (outcome.sessionClassified) result.sessionsProcessed += 1
      result.messagesProcessed += outcome.messagesClassified
      logger.debug('Session done', { sessionId: session.sessionId, ...outcome })
    } catch (err) {
      if (err instanceof SessionLockedError) {
        result.sessionsSkipped += 1
        logger.info('Session locked by another worker; skipping', { sessionId: session.sessionId })
        continue
      }
      if (isFatalPipelineError(err)) throw err

      const failure = { sessionId: session.sessionId, ...describeError(err) }
      result.sessionsFailed += 1
      result.failures.push(failure)
      logger.error('Session classification failed', failure)
    }
  }

  result.usage = deps.invoker.usage
  logger.info(
    'Pipeline pass complete. Sessions: %d, Messages: %d, Failed: %d, Skipped: %d',
    result.sessionsProcessed,
    result.messagesProcessed,
    result.sessionsFailed,
    result.sessionsSkipped,
  )
  return result
}
