/**
 * LLM Plumbing — Type Definitions
 *
 * Provider abstraction for OpenAI / Azure OpenAI / Anthropic API calls.
 */

export type ProviderId = 'openai' | 'azure' | 'anthropic'

export type LlmMode = 'dry_run' | 'real'

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

/** Hints the dry-run client uses to produce a well-formed classification reply. */
export type DryRunHint =
  | { stage: 'classify_messages'; expectedIds: number[]; categories: readonly string[] }
  | { stage: 'classify_session'; sessionId: string; categories: readonly string[] }

export interface LlmRequest {
  provider: ProviderId
  model: string
  system?: string
  messages: LlmMessage[]
  maxTokens?: number
  temperature?: number
  /** Ask the provider for a JSON object response where it supports one */
  jsonMode?: boolean
  dryRun?: DryRunHint
}

export interface LlmResponse {
  text: string
  tokensIn: number
  tokensOut: number
  costUsd: number
  dryRun: boolean
  raw?: unknown
}

export interface LlmCallContext {
  /** Cumulative USD spent so far in this run */
  spentUsdSoFar?: number
  /** If true, dry-run returns a simulated non-zero costUsd */
  simulateCost?: boolean
}

/** Provider credentials resolved from configuration. */
export type ProviderCredentials =
  | { provider: 'openai'; apiKey: string }
  | { provider: 'azure'; apiKey: string; endpoint: string; apiVersion: string }
  | { provider: 'anthropic'; apiKey: string }
