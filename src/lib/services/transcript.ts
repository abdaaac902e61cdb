/**
 * Transcript preparation: turns stored messages into classifier input.
 */

import type { ClassificationRequestItem, TranscriptMessage } from '../classify'
import type { StoredMessage } from './store'

export const DEFAULT_MAX_MESSAGE_CHARS = 4000

/**
 * Drops everything up to and including the first occurrence of `marker` in
 * the first user message. Only that message is considered; the input array
 * is not mutated.
 */
export function stripFirstUserMarker(messages: readonly StoredMessage[], marker: string): StoredMessage[] {
  const index = messages.findIndex((m) => m.role === 'user')
  if (index === -1 || marker === '') return [...messages]

  const first = messages[index]
  const at = first.content?.indexOf(marker) ?? -1
  if (first.content === null || at === -1) return [...messages]

  const copy = [...messages]
  copy[index] = { ...first, content: first.content.slice(at + marker.length).trim() }
  return copy
}

/** Null content becomes the empty string; longer content is cut at `maxChars`. */
export function clipText(content: string | null, maxChars: number): string {
  return (content ?? '').slice(0, maxChars)
}

export function toTranscript(messages: readonly StoredMessage[], maxChars: number): TranscriptMessage[] {
  return messages.map((m) => ({
    role: m.role,
    content: clipText(m.content, maxChars),
    timestamp: m.timestamp.toISOString(),
  }))
}

export function toRequestItems(messages: readonly StoredMessage[], maxChars: number): ClassificationRequestItem[] {
  return messages.map((m) => ({ id: m.id, text: clipText(m.content, maxChars) }))
}

/**
 * Splits `items` into consecutive chunks of `size`. A missing or
 * non-positive size yields a single chunk.
 */
export function chunk<T>(items: readonly T[], size?: number): T[][] {
  if (items.length === 0) return []
  if (size === undefined || size <= 0) return [[...items]]

  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}
