/**
 * LLM Plumbing — Budget Guard (Spend Cap)
 *
 * Prevents accidental cost runaway by checking the per-run limit before
 * each LLM call.
 */

import { BudgetExceededError } from './errors'

export interface BudgetPolicy {
  maxUsdPerRun?: number
}

export interface BudgetCheckInput {
  nextCostUsd: number
  spentUsdSoFar: number
  policy: BudgetPolicy
}

/**
 * Throws BudgetExceededError if the next call would push the run past its cap.
 */
export function assertWithinBudget(input: BudgetCheckInput): void {
  const { nextCostUsd, spentUsdSoFar, policy } = input

  if (policy.maxUsdPerRun !== undefined) {
    const projectedTotal = spentUsdSoFar + nextCostUsd
    if (projectedTotal > policy.maxUsdPerRun) {
      throw new BudgetExceededError(nextCostUsd, spentUsdSoFar, policy.maxUsdPerRun)
    }
  }
}
