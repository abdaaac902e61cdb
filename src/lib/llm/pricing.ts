/**
 * LLM Plumbing — Pricing Book + Cost Calculator
 *
 * Per-provider/per-model token rates, committed in repo (no runtime fetches).
 * Azure deployments are billed at the OpenAI list rates of the same model.
 */

import { UnknownModelPricingError } from './errors'
import type { ProviderId } from './types'

export interface Rate {
  inputPer1MUsd: number
  outputPer1MUsd: number
}

export interface EstimateCostInput {
  provider: ProviderId
  model: string
  tokensIn: number
  tokensOut: number
}

/**
 * Infers provider from a model string, falling back to `fallback`.
 */
export function inferProvider(model: string, fallback: ProviderId = 'openai'): ProviderId {
  const lower = model.toLowerCase()
  if (lower.includes('claude') || lower.includes('anthropic')) return 'anthropic'
  if (lower.includes('gpt') || lower.includes('openai') || /^o\d/.test(lower)) return 'openai'
  return fallback
}

/** USD per 1M tokens. */
const RATE_TABLE: Record<'openai' | 'anthropic', Record<string, Rate>> = {
  openai: {
    'gpt-4o': { inputPer1MUsd: 2.5, outputPer1MUsd: 10.0 },
    'gpt-4o-mini': { inputPer1MUsd: 0.15, outputPer1MUsd: 0.6 },
    'gpt-4.1': { inputPer1MUsd: 2.0, outputPer1MUsd: 8.0 },
    'gpt-4.1-mini': { inputPer1MUsd: 0.4, outputPer1MUsd: 1.6 },
    'gpt-4.1-nano': { inputPer1MUsd: 0.1, outputPer1MUsd: 0.4 },
  },
  anthropic: {
    'claude-sonnet-4-5': { inputPer1MUsd: 3.0, outputPer1MUsd: 15.0 },
    'claude-3-5-sonnet': { inputPer1MUsd: 3.0, outputPer1MUsd: 15.0 },
    'claude-3-5-haiku': { inputPer1MUsd: 0.8, outputPer1MUsd: 4.0 },
  },
}

/**
 * @throws UnknownModelPricingError if the model is not in the rate table
 */
export function getRate(provider: ProviderId, model: string): Rate {
  const table = RATE_TABLE[provider === 'azure' ? 'openai' : provider]
  const rate = table[model]
  if (!rate) {
    throw new UnknownModelPricingError(provider, model)
  }
  return rate
}

export function estimateCostUsd(input: EstimateCostInput): number {
  const rate = getRate(input.provider, input.model)
  return (input.tokensIn / 1_000_000) * rate.inputPer1MUsd +
    (input.tokensOut / 1_000_000) * rate.outputPer1MUsd
}

/** Like estimateCostUsd, but unknown models cost 0 instead of throwing. */
export function costOrZero(input: EstimateCostInput): number {
  try {
    return estimateCostUsd(input)
  } catch (err) {
    if (err instanceof UnknownModelPricingError) return 0
    throw err
  }
}
