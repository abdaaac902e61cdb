import { describe, it, expect } from 'vitest'
import { costOrZero, estimateCostUsd, getRate, inferProvider } from '../lib/llm/pricing'
import { UnknownModelPricingError } from '../lib/llm/errors'

describe('inferProvider', () => {
  it.each([
    ['gpt-4o-mini', 'openai'],
    ['o3-mini', 'openai'],
    ['claude-3-5-haiku', 'anthropic'],
    ['Claude-Sonnet-4-5', 'anthropic'],
  ])('%s → %s', (model, provider) => {
    expect(inferProvider(model)).toBe(provider)
  })

  it('falls back for unknown model names', () => {
    expect(inferProvider('my-deployment')).toBe('openai')
    expect(inferProvider('my-deployment', 'azure')).toBe('azure')
  })
})

describe('getRate', () => {
  it('returns the committed rate', () => {
    expect(getRate('openai', 'gpt-4o-mini')).toEqual({ inputPer1MUsd: 0.15, outputPer1MUsd: 0.6 })
  })

  it('prices azure deployments at openai rates', () => {
    expect(getRate('azure', 'gpt-4o')).toEqual(getRate('openai', 'gpt-4o'))
  })

  it('throws for unknown models', () => {
    expect(() => getRate('anthropic', 'claude-unknown')).toThrow(UnknownModelPricingError)
  })
})

describe('estimateCostUsd', () => {
  it('charges input and output tokens separately', () => {
    // 1M in at $2.50 + 0.5M out at $10.00
    expect(
      estimateCostUsd({ provider: 'openai', model: 'gpt-4o', tokensIn: 1_000_000, tokensOut: 500_000 })
    ).toBeCloseTo(7.5, 10)
  })

  it('is zero for zero tokens', () => {
    expect(estimateCostUsd({ provider: 'anthropic', model: 'claude-3-5-haiku', tokensIn: 0, tokensOut: 0 })).toBe(0)
  })
})

describe('costOrZero', () => {
  it('returns 0 for unknown models', () => {
    expect(costOrZero({ provider: 'openai', model: 'custom-deploy', tokensIn: 1000, tokensOut: 1000 })).toBe(0)
  })

  it('matches estimateCostUsd for known models', () => {
    const input = { provider: 'openai' as const, model: 'gpt-4.1-mini', tokensIn: 2000, tokensOut: 300 }
    expect(costOrZero(input)).toBe(estimateCostUsd(input))
  })
})
