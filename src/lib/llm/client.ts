/**
 * LLM Plumbing — Client
 *
 * Single exported function: callLlm(req, settings, ctx)
 *
 * - DRY_RUN mode returns deterministic responses (stage-aware for the
 *   classification payloads) and never touches the network.
 * - REAL mode calls OpenAI, Azure OpenAI or Anthropic via provider modules.
 */

import type { DryRunHint, LlmCallContext, LlmMode, LlmRequest, LlmResponse, ProviderCredentials } from './types'
import { costOrZero } from './pricing'
import { callOpenAi } from './providers/openai'
import { callAnthropic } from './providers/anthropic'
import type { ProviderResult } from './providers/types'
import { MissingApiKeyError } from './errors'
import { hashToUint32, sha256 } from '../hash'

export interface LlmClientSettings {
  mode: LlmMode
  /** Required in real mode */
  credentials?: ProviderCredentials
}

/** Signature shared by callLlm and test doubles. */
export type LlmCaller = (req: LlmRequest, ctx?: LlmCallContext) => Promise<LlmResponse>

const DRY_RUN_PRIMARY_SCORE = 0.7

/**
 * Estimates token count from text (chars / 4 heuristic).
 */
function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

function buildInputText(req: LlmRequest): string {
  const parts: string[] = []
  if (req.system) parts.push(req.system)
  for (const msg of req.messages) {
    parts.push(`${msg.role}: ${msg.content}`)
  }
  return parts.join('\n')
}

/**
 * Picks a category by hashing `seed`, and gives it most of the mass.
 */
function dryRunLabel(seed: string, categories: readonly string[]) {
  const index = hashToUint32(sha256(seed)) % categories.length
  const primary = categories[index]
  const rest = categories.length > 1 ? (1 - DRY_RUN_PRIMARY_SCORE) / (categories.length - 1) : 0
  const scores: Record<string, number> = {}
  for (const c of categories) {
    scores[c] = c === primary ? (categories.length > 1 ? DRY_RUN_PRIMARY_SCORE : 1) : rest
  }
  return { primary_category: primary, scores }
}

function dryRunText(req: LlmRequest, hint: DryRunHint | undefined): string {
  if (!hint) {
    return (
      `[DRY RUN] Provider: ${req.provider}, Model: ${req.model}. ` +
      `Input: ${req.messages.length} message(s).`
    )
  }

  if (hint.stage === 'classify_session') {
    return JSON.stringify({
      session_id: hint.sessionId,
      ...dryRunLabel(`session:${hint.sessionId}`, hint.categories),
      rationale: '[DRY RUN] deterministic label',
    })
  }

  return JSON.stringify({
    items: hint.expectedIds.map((id) => ({
      message_id: id,
      ...dryRunLabel(`message:${id}`, hint.categories),
    })),
  })
}

function dryRunResponse(req: LlmRequest, ctx: LlmCallContext): LlmResponse {
  const tokensIn = estimateTokens(buildInputText(req))
  const text = dryRunText(req, req.dryRun)
  const tokensOut = estimateTokens(text)

  const costUsd = ctx.simulateCost
    ? costOrZero({ provider: req.provider, model: req.model, tokensIn, tokensOut })
    : 0

  return { text, tokensIn, tokensOut, costUsd, dryRun: true }
}

async function dispatch(req: LlmRequest, creds: ProviderCredentials): Promise<ProviderResult> {
  if (creds.provider !== req.provider) {
    throw new MissingApiKeyError(req.provider, `credentials for ${req.provider}`)
  }
  return creds.provider === 'anthropic'
    ? callAnthropic(req, creds)
    : callOpenAi(req, creds)
}

/**
 * Calls an LLM provider or returns a dry-run response.
 *
 * @throws MissingApiKeyError in real mode without matching credentials
 * @throws LlmProviderError on SDK/network errors
 */
export async function callLlm(
  req: LlmRequest,
  settings: LlmClientSettings,
  ctx: LlmCallContext = {}
): Promise<LlmResponse> {
  if (settings.mode === 'dry_run') {
    return dryRunResponse(req, ctx)
  }

  if (!settings.credentials) {
    throw new MissingApiKeyError(req.provider, 'provider credentials')
  }

  const result = await dispatch(req, settings.credentials)

  return {
    text: result.text,
    tokensIn: result.tokensIn,
    tokensOut: result.tokensOut,
    costUsd: costOrZero({
      provider: req.provider,
      model: req.model,
      tokensIn: result.tokensIn,
      tokensOut: result.tokensOut,
    }),
    dryRun: false,
    raw: result.raw,
  }
}

/** Binds settings so callers only pass the request. */
export function createLlmCaller(settings: LlmClientSettings): LlmCaller {
  return (req, ctx) => callLlm(req, settings, ctx)
}
