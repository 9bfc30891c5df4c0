/**
 * Amazon Connect DataTables
 *
 * Declarative deployment of Connect data tables:
 * - Table and attribute provisioning with validation rules
 * - Update-first reconciliation of row values with lock-version retries
 * - Post-deployment verification and cleanup
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  // Tables & attributes
  LockLevel,
  ValueKind,
  ValidationRule,
  AttributeSpec,
  TableSpec,
  TableHandle,

  // Rows
  ScalarValue,
  AttributeValue,
  ValuePair,
  DesiredRow,

  // Lock versions
  LockVersion,
  LockTokens,

  // Remote calls
  MutationOperation,
  RowMutation,
  RowResult,
  RemoteMutationApi,
  LockTokenSource,

  // Outcomes
  FailureReason,
  RowOutcome,
  ReconciliationPhase,
  RowFailure,
  PhaseStats,
  ReconciliationSummary,
} from "./types.js";

export { LOCK_LEVELS, VALUE_KINDS, NO_LOCK_VERSION } from "./types.js";

// =============================================================================
// Errors, Logging, Retry
// =============================================================================

export { ConfigurationError, DataTableError } from "./errors.js";
export { createConsoleLogger, silentLogger, type Logger, type ConsoleLoggerOptions } from "./logger.js";
export {
  withConnectRetry,
  isConflictError,
  isTransportError,
  isThrottlingError,
  formatErrorMessage,
  type RetryConfig,
  type ConnectRetryOptions,
} from "./retry.js";

// =============================================================================
// Connect Managers
// =============================================================================

export { createConnectClient, DEFAULT_REGION, type ConnectManagerConfig } from "./client.js";
export {
  DataTableManager,
  createDataTableManager,
  type DataTableSummary,
  type EnsureTableResult,
  type DataTableOperationResult,
} from "./tables/manager.js";
export {
  AttributeManager,
  createAttributeManager,
  formatValidation,
  type AttributeSummary,
  type AttributeResult,
} from "./attributes/manager.js";
export { ConnectValueManager, createConnectValueManager, classifyRow, encodeValue } from "./values/manager.js";

// =============================================================================
// Reconciliation, Configuration, Pipelines
// =============================================================================

export * from "./reconciliation/index.js";
export * from "./config/index.js";
export * from "./pipeline/index.js";
