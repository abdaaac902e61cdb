/**
 * LLM Plumbing — Configuration
 *
 * Resolves the mode and provider credentials from an environment map.
 * Never logs secrets.
 */

import type { LlmMode, ProviderCredentials, ProviderId } from './types'
import { MissingApiKeyError } from './errors'

export type Env = Record<string, string | undefined>

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

/**
 * Defaults to 'dry_run' when LLM_MODE is unset or unrecognized.
 */
export function getLlmMode(env: Env): LlmMode {
  return read(env, 'LLM_MODE')?.toLowerCase() === 'real' ? 'real' : 'dry_run'
}

/**
 * @throws MissingApiKeyError if any credential the provider needs is unset
 */
export function getCredentials(env: Env, provider: ProviderId): ProviderCredentials {
  const need = (key: string): string => {
    const value = read(env, key)
    if (!value) throw new MissingApiKeyError(provider, key)
    return value
  }

  switch (provider) {
    case 'openai':
      return { provider, apiKey: need('OPENAI_API_KEY') }
    case 'azure':
      return {
        provider,
        endpoint: need('AZURE_OPENAI_ENDPOINT'),
        apiKey: need('AZURE_OPENAI_API_KEY'),
        apiVersion: need('AZURE_OPENAI_API_VERSION'),
      }
    case 'anthropic':
      return { provider, apiKey: need('ANTHROPIC_API_KEY') }
  }
}
