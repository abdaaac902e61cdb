import { describe, it, expect, beforeEach } from 'vitest'
import { runPipeline } from '../pipeline'
import type { PipelineDeps } from '../pipeline'
import { ModelInvoker } from '../../classify'
import type { InstructionSource } from '../../instructions'
import { BudgetExceededError, LlmProviderError } from '../../llm/errors'
import type { LlmCaller } from '../../llm/client'
import type { LlmRequest } from '../../llm/types'
import { createTaxonomy } from '../../taxonomy'
import { MemoryStore } from '../../../__tests__/fixtures/memory-store'

const taxonomy = createTaxonomy(['billing', 'shipping_delivery', 'other'])

interface FakeModelOptions {
  /** Session ids whose session-level call fails */
  failSessions?: Set<string>
  /** Error thrown for every call */
  throwAlways?: Error
}

/**
 * Answers from the request's dry-run hint: sessions are billing, messages
 * are shipping_delivery.
 */
function fakeModel(options: FakeModelOptions = {}) {
  const requests: LlmRequest[] = []
  const llm: LlmCaller = async (req) => {
    requests.push(req)
    if (options.throwAlways) throw options.throwAlways
    const hint = req.dryRun
    let text: string
    if (hint?.stage === 'classify_session') {
      if (options.failSessions?.has(hint.sessionId)) {
        throw new LlmProviderError('openai', 'bad request', { status: 400 })
      }
      text = JSON.stringify({
        session_id: hint.sessionId,
        primary_category: 'billing',
        scores: { billing: 0.9, other: 0.1 },
        rationale: 'Charge dispute.',
      })
    } else if (hint?.stage === 'classify_messages') {
      text = JSON.stringify({
        items: hint.expectedIds.map((id) => ({
          message_id: id,
          primary_category: 'shipping_delivery',
          scores: { shipping_delivery: 1 },
        })),
      })
    } else {
      text = 'unexpected'
    }
    return { text, tokensIn: 10, tokensOut: 10, costUsd: 0, dryRun: false }
  }
  return { llm, requests }
}

function recordingInstructions() {
  const loaded: string[] = []
  const source: InstructionSource = {
    async load(name) {
      loaded.push(name)
      return { text: `instructions for ${name}`, version: `v-${name}` }
    },
  }
  return { source, loaded }
}

function seedStore(): MemoryStore {
  return new MemoryStore()
    .addMessage({ id: 1, sessionId: 'A', role: 'user', content: 'Hi', timestamp: '2025-01-01T10:00:00.000Z' })
    .addMessage({ id: 2, sessionId: 'A', role: 'assistant', content: 'Hello!', timestamp: '2025-01-01T10:01:00.000Z' })
    .addMessage({ id: 3, sessionId: 'A', role: 'user', content: 'I was charged twice', timestamp: '2025-01-01T10:02:00.000Z' })
    .addMessage({ id: 10, sessionId: 'B', role: 'user', content: 'Where is my parcel?', timestamp: '2025-01-02T08:00:00.000Z' })
}

function stages(requests: LlmRequest[]): string[] {
  return requests.map((r) => {
    const hint = r.dryRun
    if (hint?.stage === 'classify_session') return `session:${hint.sessionId}`
    if (hint?.stage === 'classify_messages') return `messages:${hint.expectedIds.join(',')}`
    return 'other'
  })
}

describe('runPipeline', () => {
  let store: MemoryStore
  let model: ReturnType<typeof fakeModel>
  let instructions: ReturnType<typeof recordingInstructions>

  function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
    return {
      store,
      invoker: new ModelInvoker({
        llm: model.llm,
        provider: 'openai',
        model: 'gpt-4o-mini',
        maxTokens: 1024,
        temperature: 0,
      }),
      taxonomy,
      instructions: instructions.source,
      instructionNames: { session: 'session_instructions.txt', message: 'message_instructions.txt' },
      ...overrides,
    }
  }

  beforeEach(() => {
    store = seedStore()
    model = fakeModel()
    instructions = recordingInstructions()
  })

  it('classifies due sessions and their user messages, oldest first', async () => {
    const result = await runPipeline(deps())

    expect(result).toMatchObject({ sessionsProcessed: 2, messagesProcessed: 3, sessionsFailed: 0, sessionsSkipped: 0 })
    expect(stages(model.requests)).toEqual(['session:A', 'messages:1,3', 'session:B', 'messages:10'])
    expect(store.schemaEnsured).toBe(1)
    expect(instructions.loaded).toEqual(['session_instructions.txt', 'message_instructions.txt'])
    expect(model.requests[0].system).toBe('instructions for session_instructions.txt')
  })

  it('persists the session watermark and message rows', async () => {
    await runPipeline(deps())

    expect(store.sessionRows.get('A')?.record).toEqual({
      sessionId: 'A',
      primaryCategory: 'billing',
      scores: { billing: 0.9, shipping_delivery: 0, other: 0.1 },
      processedUpto: new Date('2025-01-01T10:02:00.000Z'),
      model: 'gpt-4o-mini',
      instructionsVersion: 'v-session_instructions.txt',
      notes: 'Charge dispute.',
    })
    expect(store.messageRows.get(3)?.record).toEqual({
      messageId: 3,
      sessionId: 'A',
      role: 'user',
      primaryCategory: 'shipping_delivery',
      scores: { billing: 0, shipping_delivery: 1, other: 0 },
      model: 'gpt-4o-mini',
      instructionsVersion: 'v-message_instructions.txt',
    })
    expect(store.messageRows.has(2)).toBe(false)
  })

  it('does nothing on a second pass without new messages', async () => {
    await runPipeline(deps())
    const writesAfterFirst = store.writes.length
    model.requests.length = 0

    const second = await runPipeline(deps())

    expect(second).toMatchObject({ sessionsProcessed: 0, messagesProcessed: 0 })
    expect(model.requests).toHaveLength(0)
    expect(store.writes).toHaveLength(writesAfterFirst)
  })

  it('reprocesses a session with a newer message, replacing its row and skipping classified messages', async () => {
    await runPipeline(deps())
    const firstRunAt = store.sessionRows.get('A')?.runAt
    store.addMessage({ id: 4, sessionId: 'A', role: 'user', content: 'Any update?', timestamp: '2025-01-03T09:00:00.000Z' })
    store.writes.length = 0
    model.requests.length = 0

    const result = await runPipeline(deps())

    expect(result).toMatchObject({ sessionsProcessed: 1, messagesProcessed: 1 })
    expect(stages(model.requests)).toEqual(['session:A', 'messages:4'])
    expect(store.writes).toEqual(['session:A', 'message:4'])
    expect(store.sessionRows.size).toBe(2)
    expect(store.sessionRows.get('A')?.record.processedUpto).toEqual(new Date('2025-01-03T09:00:00.000Z'))
    expect(store.sessionRows.get('A')?.runAt).not.toBe(firstRunAt)
  })

  it('reclassifies existing messages when forced', async () => {
    await runPipeline(deps())
    store.addMessage({ id: 4, sessionId: 'A', role: 'user', content: 'Any update?', timestamp: '2025-01-03T09:00:00.000Z' })
    model.requests.length = 0

    const result = await runPipeline(deps(), { reclassifyExistingMessages: true })

    expect(result.messagesProcessed).toBe(3)
    expect(stages(model.requests)).toEqual(['session:A', 'messages:1,3,4'])
    expect(store.messageRows.size).toBe(4)
  })

  it('chunks messages into batches of the configured size', async () => {
    for (let i = 0; i < 4; i++) {
      store.addMessage({
        id: 20 + i,
        sessionId: 'B',
        role: 'user',
        content: `follow-up ${i}`,
        timestamp: `2025-01-02T08:0${i + 1}:00.000Z`,
      })
    }

    const result = await runPipeline(deps(), { runSessionClassification: false, perSessionMessageBatchSize: 2 })

    expect(stages(model.requests)).toEqual(['messages:1,3', 'messages:10,20', 'messages:21,22', 'messages:23'])
    expect(result).toMatchObject({ sessionsProcessed: 0, messagesProcessed: 7 })
    expect(instructions.loaded).toEqual(['message_instructions.txt'])
    expect(store.sessionRows.size).toBe(0)
  })

  it('includes the configured roles', async () => {
    const result = await runPipeline(deps(), { roles: ['user', 'assistant'], runSessionClassification: false })

    expect(stages(model.requests)).toEqual(['messages:1,2,3', 'messages:10'])
    expect(result.messagesProcessed).toBe(4)
    expect(store.messageRows.get(2)?.record.role).toBe('assistant')
  })

  it('continues past a failing session and reports it', async () => {
    model = fakeModel({ failSessions: new Set(['A']) })

    const result = await runPipeline(deps())

    expect(result.sessionsFailed).toBe(1)
    expect(result.failures).toEqual([
      { sessionId: 'A', code: 'PROVIDER_ERROR', message: 'openai request failed: bad request' },
    ])
    expect(result).toMatchObject({ sessionsProcessed: 1, messagesProcessed: 1 })
    expect(store.sessionRows.has('A')).toBe(false)
    expect(store.sessionRows.has('B')).toBe(true)
  })

  it('aborts the pass when the spend cap is hit', async () => {
    model = fakeModel({ throwAlways: new BudgetExceededError(0.01, 1, 1) })

    await expect(runPipeline(deps())).rejects.toBeInstanceOf(BudgetExceededError)
    expect(store.writes).toEqual([])
  })

  it('skips sessions locked by another worker', async () => {
    store.lockedElsewhere.add('A')

    const result = await runPipeline(deps())

    expect(result).toMatchObject({ sessionsProcessed: 1, sessionsSkipped: 1, sessionsFailed: 0 })
    expect(stages(model.requests)).toEqual(['session:B', 'messages:10'])
  })

  it('writes nothing in dry-run mode but still counts', async () => {
    const result = await runPipeline(deps(), { dryRun: true })

    expect(result).toMatchObject({ sessionsProcessed: 2, messagesProcessed: 3 })
    expect(store.writes).toEqual([])
  })

  it('skips session classification when no message matches the roles', async () => {
    store = new MemoryStore().addMessage({
      id: 7,
      sessionId: 'bot-only',
      role: 'assistant',
      content: 'Welcome!',
      timestamp: '2025-01-01T00:00:00.000Z',
    })

    const result = await runPipeline(deps())

    expect(result).toMatchObject({ sessionsProcessed: 0, messagesProcessed: 0, sessionsFailed: 0 })
    expect(model.requests).toHaveLength(0)
  })

  it('strips the first-user marker and clips long messages in the transcript', async () => {
    store = new MemoryStore()
      .addMessage({
        id: 1,
        sessionId: 'S',
        role: 'user',
        content: 'SYSTEM PREAMBLE ### Please cancel my order',
        timestamp: '2025-01-01T00:00:00.000Z',
      })
      .addMessage({ id: 2, sessionId: 'S', role: 'user', content: 'x'.repeat(50), timestamp: '2025-01-01T00:01:00.000Z' })

    await runPipeline(deps({ firstUserSplitMarker: '###', maxMessageChars: 20 }), { runMessageClassification: false })

    const payload = JSON.parse(model.requests[0].messages[0].content)
    expect(payload.messages).toEqual([
      { role: 'user', content: 'Please cancel my ord', timestamp: '2025-01-01T00:00:00.000Z' },
      { role: 'user', content: 'x'.repeat(20), timestamp: '2025-01-01T00:01:00.000Z' },
    ])
  })
})
