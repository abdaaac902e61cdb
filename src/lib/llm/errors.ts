/**
 * LLM Plumbing — Error Classes
 *
 * Typed errors carrying a stable `code` and optional `details`.
 */

export class LlmError extends Error {
  readonly code: string
  readonly details?: Record<string, unknown>

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'LlmError'
    this.code = code
    this.details = details
  }
}

export class MissingApiKeyError extends LlmError {
  constructor(provider: string, envVar: string) {
    super(
      'MISSING_API_KEY',
      `Credentials not configured for provider "${provider}". Set ${envVar}.`,
      { provider, envVar }
    )
    this.name = 'MissingApiKeyError'
  }
}

/**
 * Wraps SDK and network failures. `retryable` is true for rate limiting,
 * server-side errors and failures without an HTTP status (connection
 * resets, timeouts).
 */
export class LlmProviderError extends LlmError {
  readonly provider: string
  readonly status?: number

  constructor(provider: string, message: string, details?: { status?: number; name?: string }) {
    super('PROVIDER_ERROR', `${provider} request failed: ${message}`, { provider, ...details })
    this.name = 'LlmProviderError'
    this.provider = provider
    this.status = details?.status
  }

  get retryable(): boolean {
    if (this.status === undefined) return true
    return this.status === 429 || this.status >= 500
  }
}

export class BudgetExceededError extends LlmError {
  constructor(nextCostUsd: number, spentUsdSoFar: number, limitUsd: number) {
    super(
      'BUDGET_EXCEEDED',
      `Budget exceeded: next call would cost $${nextCostUsd.toFixed(4)}, ` +
        `already spent $${spentUsdSoFar.toFixed(4)} against per-run limit of $${limitUsd.toFixed(4)}.`,
      { nextCostUsd, spentUsdSoFar, limitUsd }
    )
    this.name = 'BudgetExceededError'
  }
}

export class LlmBadOutputError extends LlmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('LLM_BAD_OUTPUT', message, details)
    this.name = 'LlmBadOutputError'
  }
}

export class UnknownModelPricingError extends LlmError {
  constructor(provider: string, model: string) {
    super(
      'UNKNOWN_MODEL_PRICING',
      `No pricing data for provider "${provider}", model "${model}". Add it to the rate table in src/lib/llm/pricing.ts.`,
      { provider, model }
    )
    this.name = 'UnknownModelPricingError'
  }
}
