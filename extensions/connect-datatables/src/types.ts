/**
 * Connect DataTables - Shared Types
 *
 * Desired-state model (tables, attributes, rows), the reconciliation
 * outcome model, and the contracts of the remote collaborators the
 * reconciliation engine talks to.
 */

// =============================================================================
// Tables & Attributes
// =============================================================================

/**
 * Optimistic-concurrency granularity enforced by the service
 */
export type LockLevel = "NONE" | "DATA_TABLE" | "PRIMARY_VALUE" | "ATTRIBUTE" | "VALUE";

export const LOCK_LEVELS: readonly LockLevel[] = [
  "NONE",
  "DATA_TABLE",
  "PRIMARY_VALUE",
  "ATTRIBUTE",
  "VALUE",
];

export type ValueKind = "TEXT" | "NUMBER" | "BOOLEAN" | "TEXT_LIST" | "NUMBER_LIST";

export const VALUE_KINDS: readonly ValueKind[] = [
  "TEXT",
  "NUMBER",
  "BOOLEAN",
  "TEXT_LIST",
  "NUMBER_LIST",
];

export interface ValidationRule {
  minLength?: number;
  maxLength?: number;
  /** Minimum number of items for list kinds */
  minValues?: number;
  /** Maximum number of items for list kinds */
  maxValues?: number;
  ignoreCase?: boolean;
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;
  enum?: {
    strict?: boolean;
    values: string[];
  };
}

export interface AttributeSpec {
  name: string;
  valueKind: ValueKind;
  primary: boolean;
  description?: string;
  validation?: ValidationRule;
}

export interface TableSpec {
  name: string;
  description?: string;
  timeZone: string;
  lockLevel: LockLevel;
  tags: Record<string, string>;
}

/**
 * What the engine needs to know about a provisioned table
 */
export interface TableHandle {
  id: string;
  name: string;
  lockLevel: LockLevel;
  /** Primary attribute names in declaration order */
  primaryKey: readonly string[];
}

// =============================================================================
// Desired Rows
// =============================================================================

export type ScalarValue = string | number | boolean;

export type AttributeValue = ScalarValue | readonly string[] | readonly number[];

export interface ValuePair {
  attributeName: string;
  value: AttributeValue;
}

export interface DesiredRow {
  primaryValues: readonly ValuePair[];
  attributes: readonly ValuePair[];
}

// =============================================================================
// Lock Versions
// =============================================================================

/**
 * Opaque lock token as returned by the service
 */
export type LockVersion = Readonly<Record<string, string>>;

/** Token sent when the table's lock level needs none */
export const NO_LOCK_VERSION: LockVersion = Object.freeze({});

/** Tokens for one batch call, keyed by lock scope */
export type LockTokens = ReadonlyMap<string, LockVersion>;

// =============================================================================
// Remote Calls
// =============================================================================

export type MutationOperation = "update" | "create";

export interface RowMutation {
  /** Primary-key identity of the row (see `primaryKeyId`) */
  key: string;
  row: DesiredRow;
}

export type RowResult =
  | { key: string; status: "success" }
  | { key: string; status: "validation-error"; message: string }
  | {
      key: string;
      status: "not-found";
      message: string;
      /** Attributes the service reported missing; all of them when absent */
      missingAttributes?: readonly string[];
    }
  | { key: string; status: "conflict"; message: string }
  /** The call carrying this row threw after earlier rows of the batch were sent */
  | { key: string; status: "error"; error: unknown };

export interface RemoteMutationApi {
  batchUpdate(table: TableHandle, mutations: readonly RowMutation[], tokens: LockTokens): Promise<RowResult[]>;
  batchCreate(table: TableHandle, mutations: readonly RowMutation[], tokens: LockTokens): Promise<RowResult[]>;
}

export interface LockTokenSource {
  fetchToken(table: TableHandle, level: LockLevel, scopeKey: string): Promise<LockVersion>;
}

// =============================================================================
// Outcomes
// =============================================================================

export type FailureReason = "validation" | "conflict-exhausted" | "transport" | "remote" | "cancelled";

export type RowOutcome =
  | { status: "updated" }
  | { status: "created" }
  | { status: "failed"; reason: FailureReason; message: string };

export type ReconciliationPhase = MutationOperation;

export interface RowFailure {
  /** Position of the row in the desired input */
  index: number;
  primaryValues: readonly ValuePair[];
  phase: ReconciliationPhase;
  reason: FailureReason;
  message: string;
}

export interface PhaseStats {
  batches: number;
  rows: number;
  /** Extra attempts spent on concurrency conflicts */
  retries: number;
}

export interface ReconciliationSummary {
  table: string;
  total: number;
  updated: number;
  created: number;
  failed: number;
  failures: RowFailure[];
  phases: Record<ReconciliationPhase, PhaseStats>;
  lockTokenFetches: number;
  durationMs: number;
}
