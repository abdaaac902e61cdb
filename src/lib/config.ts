/**
 * Application configuration.
 *
 * `loadConfig` validates the environment once at startup and returns a plain
 * object that is passed to every component. Nothing below the CLI reads
 * `process.env`.
 */

import { z } from 'zod'
import { ConfigError } from './errors'
import type { InstructionBackend } from './instructions'
import { getCredentials, getLlmMode, inferProvider } from './llm'
import type { Env, LlmMode, ProviderCredentials, ProviderId } from './llm'
import { DEFAULT_MAX_MESSAGE_CHARS } from './services/transcript'

export const DEFAULT_MODEL = 'gpt-4o-mini'

export interface AppConfig {
  databaseUrl: string
  model: string
  llm: {
    mode: LlmMode
    provider: ProviderId
    /** Resolved only in real mode */
    credentials?: ProviderCredentials
    maxTokens: number
    temperature: number
    minDelayMs: number
    maxUsdPerRun?: number
  }
  maxMessageChars: number
  firstUserSplitMarker?: string
  taxonomyPath: string
  instructions: {
    backend: InstructionBackend
    messageName: string
    sessionName: string
  }
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional())

const providerName = (value: unknown) =>
  typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value

const EnvSchema = z.object({
  DATABASE_URL: z.preprocess(blankToUndefined, z.string({ required_error: 'is required' }).trim()),
  CLASSIFIER_MODEL: optionalString,
  LLM_PROVIDER: z.preprocess(providerName, z.enum(['openai', 'azure', 'anthropic']).optional()),
  LLM_MIN_DELAY_MS: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(250)),
  LLM_MAX_USD_PER_RUN: z.preprocess(blankToUndefined, z.coerce.number().positive().optional()),
  CLASSIFIER_MAX_TOKENS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(1024)),
  CLASSIFIER_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0)),
  MAX_MESSAGE_CHARS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_MAX_MESSAGE_CHARS),
  ),
  // Not trimmed: surrounding whitespace can be part of the marker
  FIRST_USER_SPLIT_MARKER: z.preprocess(blankToUndefined, z.string().optional()),
  TAXONOMY_PATH: optionalString,
  AZURE_STORAGE_CONNECTION_STRING: optionalString,
  AZURE_STORAGE_CONTAINER: optionalString,
  INSTRUCTIONS_DIR: optionalString,
  INSTRUCTIONS_MESSAGE_NAME: optionalString,
  INSTRUCTIONS_SESSION_NAME: optionalString,
})

function instructionBackend(env: z.infer<typeof EnvSchema>): InstructionBackend {
  const connectionString = env.AZURE_STORAGE_CONNECTION_STRING
  const container = env.AZURE_STORAGE_CONTAINER
  if (connectionString && container) {
    return { kind: 'azure_blob', connectionString, container }
  }
  if (connectionString || container) {
    throw new ConfigError(
      'AZURE_STORAGE_CONNECTION_STRING and AZURE_STORAGE_CONTAINER must be set together',
    )
  }
  return { kind: 'file', dir: env.INSTRUCTIONS_DIR ?? 'instructions' }
}

/**
 * @throws ConfigError listing every invalid variable
 * @throws MissingApiKeyError in real mode when the provider's credentials are unset
 */
export function loadConfig(env: Env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues })
  }

  const vars = parsed.data
  const model = vars.CLASSIFIER_MODEL ?? DEFAULT_MODEL
  const mode = getLlmMode(env)
  const provider = vars.LLM_PROVIDER ?? inferProvider(model)

  return {
    databaseUrl: vars.DATABASE_URL,
    model,
    llm: {
      mode,
      provider,
      credentials: mode === 'real' ? getCredentials(env, provider) : undefined,
      maxTokens: vars.CLASSIFIER_MAX_TOKENS,
      temperature: vars.CLASSIFIER_TEMPERATURE,
      minDelayMs: vars.LLM_MIN_DELAY_MS,
      maxUsdPerRun: vars.LLM_MAX_USD_PER_RUN,
    },
    maxMessageChars: vars.MAX_MESSAGE_CHARS,
    firstUserSplitMarker: vars.FIRST_USER_SPLIT_MARKER,
    taxonomyPath: vars.TAXONOMY_PATH ?? 'config/categories.yaml',
    instructions: {
      backend: instructionBackend(vars),
      messageName: vars.INSTRUCTIONS_MESSAGE_NAME ?? 'message_instructions.txt',
      sessionName: vars.INSTRUCTIONS_SESSION_NAME ?? 'session_instructions.txt',
    },
  }
}
