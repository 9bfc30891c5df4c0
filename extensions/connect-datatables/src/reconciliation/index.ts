/**
 * Connect DataTables Reconciliation Module
 */

export { chunkRows, validateBatchSize, SERVICE_BATCH_CEILING } from "./chunker.js";
export { LockVersionCache } from "./lock-cache.js";
export {
  ConflictRetryManager,
  CONFLICT_RETRY_DEFAULTS,
  RETRIES_EXHAUSTED_MESSAGE,
  resolveConflictRetryConfig,
  type BatchExecution,
  type BatchRowResult,
  type ConflictRetryConfig,
  type ConflictRetryOptions,
} from "./conflict-retry.js";
export { OutcomeReporter, formatSummary } from "./reporter.js";
export { Reconciler, createReconciler, type ReconcilerOptions } from "./engine.js";
export { primaryKeyId, lockScopeForValue, lockScopesForRow } from "./keys.js";
