/**
 * Anthropic Provider — Messages API wrapper
 *
 * Thin adapter: takes an LlmRequest, calls the Anthropic Messages API,
 * and returns { text, tokensIn, tokensOut, raw }. There is no JSON response
 * mode, so `jsonMode` is expressed as an extra system line.
 *
 * Never logs secrets or full prompts.
 */

import Anthropic from '@anthropic-ai/sdk'
import type { LlmRequest, ProviderCredentials } from '../types'
import { LlmProviderError } from '../errors'
import type { ProviderResult } from './types'

const JSON_ONLY_DIRECTIVE = 'Respond with a single JSON object and no other text.'

/**
 * @throws LlmProviderError on SDK/network errors
 */
export async function callAnthropic(
  req: LlmRequest,
  creds: Extract<ProviderCredentials, { provider: 'anthropic' }>,
): Promise<ProviderResult> {
  const client = new Anthropic({ apiKey: creds.apiKey, maxRetries: 0 })

  const systemParts = [req.system, req.jsonMode ? JSON_ONLY_DIRECTIVE : undefined]
    .filter((s): s is string => Boolean(s))
  const system = systemParts.join('\n\n')

  try {
    const message = await client.messages.create({
      model: req.model,
      max_tokens: req.maxTokens ?? 1024,
      messages: req.messages
        .filter((m): m is { role: 'user' | 'assistant'; content: string } => m.role !== 'system')
        .map((m) => ({ role: m.role, content: m.content })),
      ...(system ? { system } : {}),
      ...(req.temperature !== undefined && { temperature: req.temperature }),
    })

    const text = message.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n')

    return {
      text,
      tokensIn: message.usage.input_tokens,
      tokensOut: message.usage.output_tokens,
      raw: message,
    }
  } catch (err) {
    if (Anthropic.APIError && err instanceof Anthropic.APIError) {
      throw new LlmProviderError('anthropic', err.message, {
        status: err.status,
        name: err.name,
      })
    }
    throw new LlmProviderError(
      'anthropic',
      err instanceof Error ? err.message : String(err)
    )
  }
}
