#!/usr/bin/env node
/**
 * CLI entry point: one incremental classification pass.
 *
 *   convo-classify                                   # sessions and messages, user role
 *   convo-classify --no-messages                     # session-level only
 *   convo-classify --no-session --roles user,assistant --per-session-message-batch-size 20
 *   convo-classify --since 2025-01-01T00:00:00Z --limit 100
 *
 * Exits 1 when the pass aborts or any session fails.
 */

import { config as loadDotenv } from 'dotenv'
import { ModelInvoker } from './lib/classify'
import { parseCliArgs, USAGE } from './lib/cliArgs'
import { loadConfig } from './lib/config'
import type { AppConfig } from './lib/config'
import { createDatabase } from './lib/db'
import { createInstructionSource } from './lib/instructions'
import { createLlmCaller, RateLimiter } from './lib/llm'
import { logger, setLogLevel } from './lib/logger'
import { PgClassificationStore } from './lib/services/pg-store'
import { runPipeline } from './lib/services/pipeline'
import type { PipelineResult } from './lib/services/pipeline'
import { loadTaxonomy } from './lib/taxonomy'

async function run(config: AppConfig, args: ReturnType<typeof parseCliArgs>): Promise<PipelineResult> {
  const taxonomy = await loadTaxonomy(config.taxonomyPath)
  const db = createDatabase(config.databaseUrl)

  const invoker = new ModelInvoker({
    llm: createLlmCaller({ mode: config.llm.mode, credentials: config.llm.credentials }),
    provider: config.llm.provider,
    model: config.model,
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    rateLimiter: new RateLimiter({ minDelayMs: config.llm.minDelayMs }),
    budget: config.llm.maxUsdPerRun !== undefined ? { maxUsdPerRun: config.llm.maxUsdPerRun } : undefined,
  })

  try {
    return await runPipeline(
      {
        store: new PgClassificationStore(db),
        invoker,
        taxonomy,
        instructions: createInstructionSource(config.instructions.backend),
        instructionNames: {
          session: config.instructions.sessionName,
          message: config.instructions.messageName,
        },
        maxMessageChars: config.maxMessageChars,
        firstUserSplitMarker: config.firstUserSplitMarker,
      },
      { ...args.pipeline, dryRun: config.llm.mode === 'dry_run' },
    )
  } finally {
    await db.end()
  }
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2))
  if (args.help) {
    process.stdout.write(USAGE)
    return 0
  }
  setLogLevel(args.logLevel)

  loadDotenv({ path: '.env.local' })
  const config = loadConfig(process.env)
  logger.info('Starting classification pass', {
    model: config.model,
    provider: config.llm.provider,
    mode: config.llm.mode,
  })

  const result = await run(config, args)
  logger.info(
    'Completed. Sessions processed: %d | Messages processed: %d',
    result.sessionsProcessed,
    result.messagesProcessed,
  )
  if (result.sessionsFailed > 0) {
    logger.error(`${result.sessionsFailed} session(s) failed`, {
      sessionIds: result.failures.map((f) => f.sessionId),
    })
    return 1
  }
  return 0
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    logger.error('Classification pass aborted', {
      error: err instanceof Error ? err.message : String(err),
      code: err instanceof Error && 'code' in err ? err.code : undefined,
    })
    process.exitCode = 1
  })
