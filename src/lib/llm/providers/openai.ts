/**
 * OpenAI / Azure OpenAI Provider — Chat Completions wrapper
 *
 * Thin adapter: takes an LlmRequest, calls Chat Completions (JSON mode when
 * requested) and returns { text, tokensIn, tokensOut, raw }.
 *
 * SDK-level retries are disabled; the classification invoker owns the retry
 * policy so attempts are not multiplied.
 *
 * Never logs secrets or full prompts.
 */

import OpenAI, { AzureOpenAI } from 'openai'
import type { LlmRequest, ProviderCredentials } from '../types'
import { LlmProviderError } from '../errors'
import type { ProviderResult } from './types'

type OpenAiCredentials = Extract<ProviderCredentials, { provider: 'openai' | 'azure' }>

function buildClient(creds: OpenAiCredentials): OpenAI {
  if (creds.provider === 'azure') {
    return new AzureOpenAI({
      endpoint: creds.endpoint,
      apiKey: creds.apiKey,
      apiVersion: creds.apiVersion,
      maxRetries: 0,
    })
  }
  return new OpenAI({ apiKey: creds.apiKey, maxRetries: 0 })
}

/**
 * @throws LlmProviderError on SDK/network errors
 */
export async function callOpenAi(req: LlmRequest, creds: OpenAiCredentials): Promise<ProviderResult> {
  const client = buildClient(creds)

  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = []
  if (req.system) messages.push({ role: 'system', content: req.system })
  for (const m of req.messages) {
    messages.push({ role: m.role, content: m.content })
  }

  try {
    const completion = await client.chat.completions.create({
      model: req.model,
      messages,
      ...(req.temperature !== undefined && { temperature: req.temperature }),
      ...(req.maxTokens !== undefined && { max_tokens: req.maxTokens }),
      ...(req.jsonMode && { response_format: { type: 'json_object' as const } }),
    })

    const text = completion.choices[0]?.message?.content ?? ''
    const tokensIn = completion.usage?.prompt_tokens ?? 0
    const tokensOut = completion.usage?.completion_tokens ?? 0

    return { text, tokensIn, tokensOut, raw: completion }
  } catch (err) {
    if (OpenAI.APIError && err instanceof OpenAI.APIError) {
      throw new LlmProviderError(creds.provider, err.message, {
        status: err.status,
        name: err.name,
      })
    }
    throw new LlmProviderError(
      creds.provider,
      err instanceof Error ? err.message : String(err)
    )
  }
}
