export { reconcile, reconcileWithReport, reconcileSession, coerceScores } from './reconcile'
export { parseModelJson, repairJson, extractJsonCandidates } from './jsonRepair'
export type { ParseOutcome } from './jsonRepair'
export { ModelInvoker, MAX_REPAIR_ESCALATIONS } from './invoker'
export type { ModelInvokerOptions, JsonRequest, InvokerUsage } from './invoker'
export { classifyMessages } from './messages'
export { classifySession } from './session'
export type {
  ClassificationRequestItem,
  ClassificationResult,
  SessionClassification,
  TranscriptMessage,
  ReconcileReport,
} from './types'
