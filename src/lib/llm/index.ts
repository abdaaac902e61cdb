/**
 * LLM Plumbing — Public API
 *
 * Re-exports for consumers.
 */

export { callLlm, createLlmCaller } from './client'
export type { LlmCaller, LlmClientSettings } from './client'
export { getLlmMode, getCredentials } from './config'
export type { Env } from './config'
export { RateLimiter, realClock } from './rateLimit'
export type { Clock, RateLimiterOptions } from './rateLimit'
export { withRetry, backoffDelayMs, isTransientLlmError, DEFAULT_RETRY_POLICY } from './retry'
export type { RetryPolicy, RetryOptions } from './retry'
export { assertWithinBudget } from './budget'
export type { BudgetPolicy, BudgetCheckInput } from './budget'
export {
  LlmError,
  MissingApiKeyError,
  LlmProviderError,
  BudgetExceededError,
  LlmBadOutputError,
  UnknownModelPricingError,
} from './errors'
export { getRate, estimateCostUsd, costOrZero, inferProvider } from './pricing'
export type { Rate, EstimateCostInput } from './pricing'
export type {
  ProviderId,
  LlmMode,
  LlmMessage,
  LlmRequest,
  LlmResponse,
  LlmCallContext,
  DryRunHint,
  ProviderCredentials,
} from './types'
