/**
 * LLM Plumbing — Retry with exponential backoff
 *
 * Retries only errors the predicate marks as transient. Waits grow as
 * `baseDelayMs * 2^(attempt-1)`, bounded to [minDelayMs, maxDelayMs]. After
 * the final attempt the last error is rethrown unchanged.
 */

import type { Clock } from './rateLimit'
import { realClock } from './rateLimit'
import { LlmProviderError } from './errors'

export interface RetryPolicy {
  maxAttempts: number
  baseDelayMs: number
  minDelayMs: number
  maxDelayMs: number
}

/** 5 attempts, 1.5s doubling, clamped to 1s..20s. */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1500,
  minDelayMs: 1000,
  maxDelayMs: 20_000,
}

export interface RetryOptions {
  policy?: RetryPolicy
  clock?: Clock
  isRetryable?: (err: unknown) => boolean
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void
}

export function isTransientLlmError(err: unknown): boolean {
  return err instanceof LlmProviderError && err.retryable
}

/** Delay before retry number `attempt` (1-based). */
export function backoffDelayMs(attempt: number, policy: RetryPolicy): number {
  const raw = policy.baseDelayMs * 2 ** (attempt - 1)
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, raw))
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY
  const clock = options.clock ?? realClock
  const isRetryable = options.isRetryable ?? isTransientLlmError

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (attempt >= policy.maxAttempts || !isRetryable(err)) throw err
      const delayMs = backoffDelayMs(attempt, policy)
      options.onRetry?.({ attempt, delayMs, error: err })
      await clock.sleep(delayMs)
    }
  }
}
