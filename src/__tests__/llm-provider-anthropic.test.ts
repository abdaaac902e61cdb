import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { LlmRequest } from '../lib/llm/types'
import { LlmProviderError } from '../lib/llm/errors'

const { FakeAPIError } = vi.hoisted(() => {
  class FakeAPIError extends Error {
    readonly status: number | undefined

    constructor(status: number | undefined, message: string) {
      super(message)
      this.name = 'APIError'
      this.status = status
    }
  }
  return { FakeAPIError }
})

// Mock the @anthropic-ai/sdk module before importing the provider
vi.mock('@anthropic-ai/sdk', () => ({
  default: Object.assign(vi.fn(), { APIError: FakeAPIError }),
}))

import Anthropic from '@anthropic-ai/sdk'
import { callAnthropic } from '../lib/llm/providers/anthropic'

const MockAnthropic = vi.mocked(Anthropic)

const CREDS = { provider: 'anthropic' as const, apiKey: 'test-secret' }

function makeRequest(overrides?: Partial<LlmRequest>): LlmRequest {
  return {
    provider: 'anthropic',
    model: 'claude-3-5-haiku',
    messages: [{ role: 'user', content: 'Hello' }],
    ...overrides,
  }
}

async function providerError(pending: Promise<unknown>): Promise<LlmProviderError> {
  const err = await pending.then(
    () => undefined,
    (e: unknown) => e
  )
  if (!(err instanceof LlmProviderError)) throw new Error('expected LlmProviderError')
  return err
}

describe('callAnthropic', () => {
  let mockCreate: ReturnType<typeof vi.fn>

  beforeEach(() => {
    vi.clearAllMocks()
    mockCreate = vi.fn()
    MockAnthropic.mockImplementation(function () {
      return { messages: { create: mockCreate } }
    } as unknown as () => Anthropic)
  })

  it('joins text blocks and skips the rest', async () => {
    mockCreate.mockResolvedValue({
      content: [
        { type: 'text', text: '{"a":' },
        { type: 'tool_use', id: 't1', name: 'x', input: {} },
        { type: 'text', text: '1}' },
      ],
      usage: { input_tokens: 10, output_tokens: 7 },
    })

    const result = await callAnthropic(makeRequest(), CREDS)
    expect(result.text).toBe('{"a":\n1}')
    expect(result.tokensIn).toBe(10)
    expect(result.tokensOut).toBe(7)
  })

  it('adds the JSON directive to the system prompt in JSON mode', async () => {
    mockCreate.mockResolvedValue({ content: [], usage: { input_tokens: 1, output_tokens: 1 } })

    await callAnthropic(makeRequest({ system: 'Classify.', jsonMode: true, temperature: 0, maxTokens: 300 }), CREDS)

    expect(mockCreate).toHaveBeenCalledWith({
      model: 'claude-3-5-haiku',
      max_tokens: 300,
      messages: [{ role: 'user', content: 'Hello' }],
      system: 'Classify.\n\nRespond with a single JSON object and no other text.',
      temperature: 0,
    })
  })

  it('omits system when there is none and defaults max_tokens', async () => {
    mockCreate.mockResolvedValue({ content: [], usage: { input_tokens: 1, output_tokens: 1 } })

    await callAnthropic(makeRequest(), CREDS)

    const body = mockCreate.mock.calls[0][0]
    expect(body).not.toHaveProperty('system')
    expect(body.max_tokens).toBe(1024)
  })

  it('drops system-role messages from the conversation', async () => {
    mockCreate.mockResolvedValue({ content: [], usage: { input_tokens: 1, output_tokens: 1 } })

    await callAnthropic(
      makeRequest({
        messages: [
          { role: 'system', content: 'ignored' },
          { role: 'user', content: 'Hi' },
        ],
      }),
      CREDS
    )

    expect(mockCreate.mock.calls[0][0].messages).toEqual([{ role: 'user', content: 'Hi' }])
  })

  it('constructs the client with SDK retries disabled', async () => {
    mockCreate.mockResolvedValue({ content: [], usage: { input_tokens: 1, output_tokens: 1 } })

    await callAnthropic(makeRequest(), CREDS)

    expect(MockAnthropic).toHaveBeenCalledWith({ apiKey: 'test-secret', maxRetries: 0 })
  })

  describe('error handling', () => {
    it('keeps the HTTP status of API errors', async () => {
      mockCreate.mockRejectedValue(new FakeAPIError(529, 'Overloaded'))

      const err = await providerError(callAnthropic(makeRequest(), CREDS))
      expect(err.status).toBe(529)
      expect(err.retryable).toBe(true)
      expect(err.message).toBe('anthropic request failed: Overloaded')
    })

    it('wraps generic errors', async () => {
      mockCreate.mockRejectedValue(new Error('network timeout'))

      const err = await providerError(callAnthropic(makeRequest(), CREDS))
      expect(err.code).toBe('PROVIDER_ERROR')
      expect(err.message).toBe('anthropic request failed: network timeout')
    })
  })
})
