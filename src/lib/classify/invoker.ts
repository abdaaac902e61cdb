/**
 * Model Invocation Adapter
 *
 * Sends one structured request to the classification service and returns a
 * parsed JSON object. Each call goes through the rate limiter, the spend
 * cap and the transient-error retry loop. When the reply does not parse even
 * after local repair, one model-assisted repair call is made; if that also
 * fails the batch fails with LlmBadOutputError.
 */

import {
  assertWithinBudget,
  costOrZero,
  LlmBadOutputError,
  withRetry,
} from '../llm'
import type {
  BudgetPolicy,
  DryRunHint,
  LlmCaller,
  ProviderId,
  RateLimiter,
  RetryOptions,
} from '../llm'
import type { JsonObject } from '../coerce'
import { logger } from '../logger'
import { parseModelJson } from './jsonRepair'
import { buildRepairPayload, REPAIR_SYSTEM_PROMPT } from './payloads'
import type { RepairHint } from './payloads'

/** Model-assisted repair calls allowed per request. */
export const MAX_REPAIR_ESCALATIONS = 1

const RAW_PREVIEW_CHARS = 500

/** Rough token count for budget estimates. */
const CHARS_PER_TOKEN = 4

export interface ModelInvokerOptions {
  llm: LlmCaller
  provider: ProviderId
  model: string
  maxTokens: number
  temperature: number
  rateLimiter?: RateLimiter
  budget?: BudgetPolicy
  retry?: Omit<RetryOptions, 'onRetry'>
  /** Fixed per-call estimate for the budget guard; by default priced from the request size */
  estimatedCallCostUsd?: number
}

export interface JsonRequest {
  /** Short description for logs, e.g. "session abc" */
  label: string
  system: string
  payload: unknown
  repair: RepairHint
  dryRun?: DryRunHint
}

export interface InvokerUsage {
  calls: number
  repairCalls: number
  tokensIn: number
  tokensOut: number
  costUsd: number
}

export class ModelInvoker {
  readonly model: string
  private readonly options: ModelInvokerOptions
  private readonly totals: InvokerUsage = {
    calls: 0,
    repairCalls: 0,
    tokensIn: 0,
    tokensOut: 0,
    costUsd: 0,
  }

  constructor(options: ModelInvokerOptions) {
    this.options = options
    this.model = options.model
  }

  get usage(): InvokerUsage {
    return { ...this.totals }
  }

  /**
   * @throws LlmBadOutputError when the reply is still unparseable after the repair escalation
   * @throws LlmProviderError when transient retries are exhausted or the error is permanent
   * @throws BudgetExceededError when the next call would exceed the spend cap
   */
  async requestJson(req: JsonRequest): Promise<JsonObject> {
    let text = await this.complete(req.system, JSON.stringify(req.payload), req.dryRun)

    for (let escalations = 0; ; escalations++) {
      const outcome = parseModelJson(text)
      if (outcome.kind === 'parsed') {
        if (outcome.repaired) {
          logger.warn('Applied local JSON repair to model output', { label: req.label, escalations })
        }
        return outcome.value
      }

      if (escalations >= MAX_REPAIR_ESCALATIONS) {
        throw new LlmBadOutputError('Model output is not valid JSON after repair', {
          label: req.label,
          escalations,
          parseError: outcome.message,
          rawPreview: outcome.raw.slice(0, RAW_PREVIEW_CHARS),
        })
      }

      logger.warn('Model output unparseable after local repair; requesting model-assisted repair', {
        label: req.label,
        parseError: outcome.message,
      })
      this.totals.repairCalls += 1
      text = await this.complete(
        REPAIR_SYSTEM_PROMPT,
        JSON.stringify(buildRepairPayload(outcome.raw, req.repair)),
        undefined,
      )
    }
  }

  private async complete(system: string, content: string, dryRun: DryRunHint | undefined): Promise<string> {
    const { llm, provider, model, maxTokens, temperature, rateLimiter, budget } = this.options

    return withRetry(
      async () => {
        const waitedMs = await rateLimiter?.acquire()
        if (waitedMs) logger.debug('Rate limiter delayed model call', { waitedMs })
        if (budget) {
          assertWithinBudget({
            nextCostUsd: this.options.estimatedCallCostUsd ?? this.estimateCallCost(system, content),
            spentUsdSoFar: this.totals.costUsd,
            policy: budget,
          })
        }

        const response = await llm(
          {
            provider,
            model,
            system,
            messages: [{ role: 'user', content }],
            maxTokens,
            temperature,
            jsonMode: true,
            dryRun,
          },
          { spentUsdSoFar: this.totals.costUsd },
        )

        this.totals.calls += 1
        this.totals.tokensIn += response.tokensIn
        this.totals.tokensOut += response.tokensOut
        this.totals.costUsd += response.costUsd
        return response.text
      },
      {
        ...this.options.retry,
        onRetry: ({ attempt, delayMs, error }) => {
          logger.warn('Transient model error; retrying', {
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          })
        },
      },
    )
  }

  /**
   * Upper-bound cost of one call: input priced at chars/4, output at the full
   * `maxTokens`. Unpriced models estimate 0.
   */
  private estimateCallCost(system: string, content: string): number {
    return costOrZero({
      provider: this.options.provider,
      model: this.options.model,
      tokensIn: Math.ceil((system.length + content.length) / CHARS_PER_TOKEN),
      tokensOut: this.options.maxTokens,
    })
  }
}
