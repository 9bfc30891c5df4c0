/**
 * Mock Data Table Service
 *
 * In-memory stand-in for the remote mutation and lock-token APIs, used by
 * the tests in place of AWS. It keeps rows keyed by
 * primary key, versions every lock scope, rejects writes carrying stale
 * tokens, and can be told to inject conflicts, validation failures and
 * thrown errors.
 */

import type {
  AttributeValue,
  DesiredRow,
  LockLevel,
  LockTokenSource,
  LockTokens,
  LockVersion,
  MutationOperation,
  RemoteMutationApi,
  RowMutation,
  RowResult,
  TableHandle,
} from "../types.js";
import { lockScopeForValue, lockScopesForRow } from "./keys.js";

export type MockValidator = (value: AttributeValue) => string | undefined;

export type MockServiceConfig = {
  /** Rows present before the run */
  existing?: Array<{ key: string; row: DesiredRow }>;
  /** Per-attribute validators; a returned string rejects the value */
  validators?: Record<string, MockValidator>;
  /** Number of writes touching a scope to reject with a conflict */
  conflicts?: Record<string, number>;
  /** Only inject conflicts into this operation */
  conflictOperation?: MutationOperation;
  /** Errors thrown by the next matching calls, in order */
  thrown?: Array<{ operation: MutationOperation | "fetch"; error: unknown }>;
};

export type MockCall = {
  operation: MutationOperation;
  keys: string[];
  tokens: Map<string, LockVersion>;
};

export class MockDataTableService implements RemoteMutationApi, LockTokenSource {
  readonly calls: MockCall[] = [];
  readonly tokenFetches: Array<{ level: LockLevel; scopeKey: string }> = [];

  private readonly rows = new Map<string, Map<string, AttributeValue>>();
  private readonly versions = new Map<string, number>();
  private readonly conflicts: Map<string, number>;
  private readonly thrown: Array<{ operation: MutationOperation | "fetch"; error: unknown }>;

  constructor(private readonly config: MockServiceConfig = {}) {
    for (const { key, row } of config.existing ?? []) {
      this.rows.set(key, new Map(row.attributes.map((pair): [string, AttributeValue] => [pair.attributeName, pair.value])));
    }
    this.conflicts = new Map(Object.entries(config.conflicts ?? {}));
    this.thrown = [...(config.thrown ?? [])];
  }

  async fetchToken(_table: TableHandle, level: LockLevel, scopeKey: string): Promise<LockVersion> {
    this.tokenFetches.push({ level, scopeKey });
    this.throwIfQueued("fetch");
    return { Version: String(this.versionOf(scopeKey)) };
  }

  async batchUpdate(table: TableHandle, mutations: readonly RowMutation[], tokens: LockTokens): Promise<RowResult[]> {
    return this.apply("update", table, mutations, tokens);
  }

  async batchCreate(table: TableHandle, mutations: readonly RowMutation[], tokens: LockTokens): Promise<RowResult[]> {
    return this.apply("create", table, mutations, tokens);
  }

  /** Stored attribute values of a row, if present */
  stored(key: string): Record<string, AttributeValue> | undefined {
    const row = this.rows.get(key);
    return row ? Object.fromEntries(row) : undefined;
  }

  callsFor(operation: MutationOperation): MockCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  private apply(
    operation: MutationOperation,
    table: TableHandle,
    mutations: readonly RowMutation[],
    tokens: LockTokens,
  ): RowResult[] {
    this.calls.push({ operation, keys: mutations.map((m) => m.key), tokens: new Map(tokens) });
    this.throwIfQueued(operation);

    const results: RowResult[] = [];
    const written = new Set<string>();

    // Tokens are checked against versions as of the start of the call
    for (const { key, row } of mutations) {
      const scopes = lockScopesForRow(table, key, row);

      const injectable = this.config.conflictOperation === undefined || this.config.conflictOperation === operation;
      const conflict = scopes.find(
        (scope) => (injectable && this.consumeConflict(scope)) || this.isStale(scope, tokens),
      );
      if (conflict !== undefined) {
        results.push({ key, status: "conflict", message: `Concurrency conflict: lock version outdated for ${conflict}` });
        continue;
      }

      const invalid = this.validate(row);
      if (invalid) {
        results.push({ key, status: "validation-error", message: invalid });
        continue;
      }

      const stored = this.rows.get(key);
      if (operation === "update") {
        const missing = row.attributes.filter((pair) => !stored?.has(pair.attributeName)).map((pair) => pair.attributeName);
        if (missing.length > 0) {
          // Values are written one by one: the ones that exist still update
          if (stored) {
            for (const pair of row.attributes) {
              if (!stored.has(pair.attributeName)) continue;
              stored.set(pair.attributeName, pair.value);
              const scope = lockScopeForValue(table.lockLevel, key, pair.attributeName);
              if (scope !== undefined) written.add(scope);
            }
          }
          results.push({
            key,
            status: "not-found",
            message: "Value not found",
            ...(stored ? { missingAttributes: missing } : {}),
          });
          continue;
        }
      } else {
        const present = row.attributes.find((pair) => stored?.has(pair.attributeName));
        if (present) {
          results.push({ key, status: "validation-error", message: `Value already exists for ${present.attributeName}` });
          continue;
        }
      }

      const target = stored ?? new Map<string, AttributeValue>();
      for (const pair of row.attributes) target.set(pair.attributeName, pair.value);
      this.rows.set(key, target);
      for (const scope of scopes) written.add(scope);
      results.push({ key, status: "success" });
    }

    for (const scope of written) {
      this.versions.set(scope, this.versionOf(scope) + 1);
    }
    return results;
  }

  private validate(row: DesiredRow): string | undefined {
    for (const pair of row.attributes) {
      const message = this.config.validators?.[pair.attributeName]?.(pair.value);
      if (message) return message;
    }
    return undefined;
  }

  private consumeConflict(scope: string): boolean {
    const remaining = this.conflicts.get(scope) ?? 0;
    if (remaining <= 0) return false;
    this.conflicts.set(scope, remaining - 1);
    return true;
  }

  private isStale(scope: string, tokens: LockTokens): boolean {
    const token = tokens.get(scope);
    return token === undefined || token.Version !== String(this.versionOf(scope));
  }

  private versionOf(scope: string): number {
    return this.versions.get(scope) ?? 1;
  }

  private throwIfQueued(operation: MutationOperation | "fetch"): void {
    const index = this.thrown.findIndex((entry) => entry.operation === operation);
    if (index === -1) return;
    const [entry] = this.thrown.splice(index, 1);
    if (entry) throw entry.error;
  }
}
