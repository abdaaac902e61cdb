import type { Category, ScoreVector } from '../taxonomy'

/** One unit submitted for labeling. */
export interface ClassificationRequestItem {
  id: number
  text: string
}

export interface ClassificationResult {
  id: number
  primaryCategory: Category
  scores: ScoreVector
}

export interface SessionClassification {
  primaryCategory: Category
  scores: ScoreVector
  /** Model rationale, persisted as `notes` */
  notes: string | null
}

/** A transcript line as sent to the session classifier. */
export interface TranscriptMessage {
  role: string
  content: string
  timestamp: string
}

/**
 * Data-quality counters from one reconciliation. None of these are errors;
 * they record where a fallback was applied.
 */
export interface ReconcileReport {
  candidates: number
  discardedUnparsableId: number
  discardedForeignId: number
  discardedDuplicate: number
  defaultedCategory: number
  defaultedScores: number
  uniformFallback: number
  synthesized: number
}
