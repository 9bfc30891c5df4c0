/**
 * Amazon Connect Data Table Value Manager
 *
 * Remote side of the reconciliation engine:
 * - Batch update and batch create of row values
 * - Lock version lookup per lock scope
 * - Failure classification (not found, concurrency conflict, validation)
 *
 * The service stores one value per (primary values, attribute) pair, so
 * every row is flattened into one entry per non-key attribute and entry
 * failures are folded back into one result per row.
 */

import {
  BatchCreateDataTableValueCommand,
  BatchUpdateDataTableValueCommand,
  ListDataTableAttributesCommand,
  ListDataTableValuesCommand,
  type ConnectClient,
} from "@aws-sdk/client-connect";

import { type ConnectManagerConfig, createConnectClient } from "../client.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { chunkRows, SERVICE_BATCH_CEILING } from "../reconciliation/chunker.js";
import { lockScopeForValue } from "../reconciliation/keys.js";
import { formatErrorMessage, isConflictMessage, withConnectRetry } from "../retry.js";
import {
  NO_LOCK_VERSION,
  type AttributeValue,
  type DesiredRow,
  type LockLevel,
  type LockTokenSource,
  type LockTokens,
  type LockVersion,
  type MutationOperation,
  type RemoteMutationApi,
  type RowMutation,
  type RowResult,
  type TableHandle,
} from "../types.js";

// ============================================================================
// API Shapes
// ============================================================================

export interface ApiPrimaryValue {
  AttributeName: string;
  Value: string;
}

export interface ApiLockVersion {
  DataTable?: string;
  Attribute?: string;
  PrimaryValues?: string;
  Value?: string;
}

export interface ApiValueEntry {
  PrimaryValues: ApiPrimaryValue[];
  AttributeName: string;
  Value: string;
  LockVersion: ApiLockVersion;
}

/** Entry of a batch response's `Failed` list */
interface FailedEntry {
  PrimaryValues?: ReadonlyArray<{ AttributeName?: string; Value?: string }>;
  AttributeName?: string;
  Message?: string;
}

const LOCK_VERSION_FIELDS = ["DataTable", "Attribute", "PrimaryValues", "Value"] as const;

const NOT_FOUND_PATTERN = /not found/i;

// ============================================================================
// Encoding
// ============================================================================

/**
 * Values travel as strings; list kinds as JSON arrays
 */
export function encodeValue(value: AttributeValue): string {
  return Array.isArray(value) ? JSON.stringify(value) : String(value);
}

export function toApiPrimaryValues(row: DesiredRow): ApiPrimaryValue[] {
  return row.primaryValues.map((pair) => ({ AttributeName: pair.attributeName, Value: encodeValue(pair.value) }));
}

export function toApiLockVersion(token: LockVersion): ApiLockVersion {
  const version: ApiLockVersion = {};
  for (const field of LOCK_VERSION_FIELDS) {
    const value = token[field];
    if (value !== undefined) version[field] = value;
  }
  return version;
}

export function fromApiLockVersion(version: ApiLockVersion | undefined): LockVersion {
  if (!version) return NO_LOCK_VERSION;
  const token: Record<string, string> = {};
  for (const field of LOCK_VERSION_FIELDS) {
    const value = version[field];
    if (value !== undefined) token[field] = value;
  }
  return token;
}

function entryId(primaryValues: ReadonlyArray<{ AttributeName?: string; Value?: string }>, attributeName: string): string {
  const pairs = primaryValues
    .map((pair): [string, string] => [pair.AttributeName ?? "", pair.Value ?? ""])
    .sort(([a], [b]) => a.localeCompare(b));
  return JSON.stringify([pairs, attributeName]);
}

// ============================================================================
// Value Manager
// ============================================================================

export type EntryFailure = { attributeName: string; message: string };

export interface EntryChunk {
  /** Rows with entries in this call */
  keys: string[];
  entries: ApiValueEntry[];
}

/**
 * Pack whole rows into calls of at most `ceiling` entries; the service
 * ceiling applies to value entries, not rows
 */
export function packEntries(
  rows: ReadonlyArray<{ key: string; entries: ApiValueEntry[] }>,
  ceiling: number = SERVICE_BATCH_CEILING,
): EntryChunk[] {
  const chunks: EntryChunk[] = [];
  let current: EntryChunk = { keys: [], entries: [] };
  const flush = () => {
    if (current.entries.length > 0) chunks.push(current);
    current = { keys: [], entries: [] };
  };

  for (const { key, entries } of rows) {
    if (current.entries.length + entries.length > ceiling) flush();
    if (entries.length <= ceiling) {
      current.keys.push(key);
      current.entries.push(...entries);
      continue;
    }
    // Too wide for one call
    for (const part of chunkRows(entries, ceiling)) chunks.push({ keys: [key], entries: part });
  }
  flush();
  return chunks;
}

export class ConnectValueManager implements RemoteMutationApi, LockTokenSource {
  private client: ConnectClient;
  private config: ConnectManagerConfig;
  private logger: Logger;

  constructor(config: ConnectManagerConfig) {
    this.config = config;
    this.logger = config.logger ?? silentLogger;
    this.client = createConnectClient(config);
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  async batchUpdate(table: TableHandle, mutations: readonly RowMutation[], tokens: LockTokens): Promise<RowResult[]> {
    return this.write("update", table, mutations, tokens);
  }

  async batchCreate(table: TableHandle, mutations: readonly RowMutation[], tokens: LockTokens): Promise<RowResult[]> {
    return this.write("create", table, mutations, tokens);
  }

  /**
   * Flatten rows into value entries, each carrying the token of its lock scope
   */
  buildEntries(table: TableHandle, mutations: readonly RowMutation[], tokens: LockTokens): ApiValueEntry[] {
    return mutations.flatMap(({ key, row }) => {
      const primaryValues = toApiPrimaryValues(row);
      return row.attributes.map((pair): ApiValueEntry => {
        const scope = lockScopeForValue(table.lockLevel, key, pair.attributeName);
        const token = scope === undefined ? NO_LOCK_VERSION : (tokens.get(scope) ?? NO_LOCK_VERSION);
        return {
          PrimaryValues: primaryValues,
          AttributeName: pair.attributeName,
          Value: encodeValue(pair.value),
          LockVersion: toApiLockVersion(token),
        };
      });
    });
  }

  /**
   * Rows never straddle two calls unless one row alone exceeds the ceiling.
   * A call that throws before anything was sent rejects the whole write; a
   * later one settles only its own rows and the unsent ones as errors.
   */
  private async write(
    operation: MutationOperation,
    table: TableHandle,
    mutations: readonly RowMutation[],
    tokens: LockTokens,
  ): Promise<RowResult[]> {
    const results = new Map<string, RowResult>();
    const sendable = mutations.filter((mutation) => {
      if (mutation.row.attributes.length > 0) return true;
      results.set(mutation.key, { key: mutation.key, status: "validation-error", message: "row has no attributes to write" });
      return false;
    });

    const owners = new Map<string, string>();
    for (const { key, row } of sendable) {
      const primaryValues = toApiPrimaryValues(row);
      for (const pair of row.attributes) owners.set(entryId(primaryValues, pair.attributeName), key);
    }

    const failures = new Map<string, EntryFailure[]>();
    const chunks = packEntries(
      sendable.map((mutation) => ({ key: mutation.key, entries: this.buildEntries(table, [mutation], tokens) })),
    );
    let interrupted: { error: unknown; keys: Set<string> } | undefined;

    for (const [position, chunk] of chunks.entries()) {
      let failed: FailedEntry[];
      try {
        failed = await this.sendChunk(operation, table, chunk.entries);
      } catch (error) {
        if (position === 0) throw error;
        this.logger.warn(
          `${table.name}: batch ${operation} call ${position + 1}/${chunks.length} failed: ${formatErrorMessage(error)}`,
        );
        interrupted = { error, keys: new Set(chunks.slice(position).flatMap((rest) => rest.keys)) };
        break;
      }

      for (const item of failed) {
        const attributeName = item.AttributeName ?? "";
        const owner = owners.get(entryId(item.PrimaryValues ?? [], attributeName));
        if (owner === undefined) {
          this.logger.warn(`${table.name}: ${operation} failure for unknown entry ${attributeName}: ${item.Message ?? ""}`);
          continue;
        }
        const list = failures.get(owner) ?? [];
        list.push({ attributeName, message: item.Message ?? "unknown error" });
        failures.set(owner, list);
      }
    }

    for (const { key } of sendable) {
      results.set(
        key,
        interrupted?.keys.has(key)
          ? { key, status: "error", error: interrupted.error }
          : classifyRow(key, failures.get(key) ?? []),
      );
    }

    return mutations.flatMap((mutation) => {
      const result = results.get(mutation.key);
      return result ? [result] : [];
    });
  }

  private async sendChunk(operation: MutationOperation, table: TableHandle, chunk: ApiValueEntry[]): Promise<FailedEntry[]> {
    const input = {
      InstanceId: this.config.instanceArn,
      DataTableId: table.id,
      Values: chunk,
    };
    this.logger.debug(`${table.name}: batch ${operation} of ${chunk.length} value(s)`);
    const response =
      operation === "update"
        ? await this.client.send(new BatchUpdateDataTableValueCommand(input))
        : await this.client.send(new BatchCreateDataTableValueCommand(input));
    return response.Failed ?? [];
  }

  // ==========================================================================
  // Lock Versions
  // ==========================================================================

  async fetchToken(table: TableHandle, level: LockLevel, scopeKey: string): Promise<LockVersion> {
    switch (level) {
      case "NONE":
        return NO_LOCK_VERSION;
      case "DATA_TABLE": {
        const attributes = await this.listAttributeVersions(table);
        return attributes[0]?.lockVersion ?? NO_LOCK_VERSION;
      }
      case "ATTRIBUTE": {
        const attributes = await this.listAttributeVersions(table);
        return attributes.find((attribute) => attribute.name === scopeKey)?.lockVersion ?? NO_LOCK_VERSION;
      }
      case "PRIMARY_VALUE":
        return this.findValueVersion(table, scopeKey);
      case "VALUE": {
        const split = scopeKey.lastIndexOf("]/");
        if (split === -1) return NO_LOCK_VERSION;
        return this.findValueVersion(table, scopeKey.slice(0, split + 1), scopeKey.slice(split + 2));
      }
    }
  }

  private async listAttributeVersions(table: TableHandle): Promise<Array<{ name: string; lockVersion: LockVersion }>> {
    const versions: Array<{ name: string; lockVersion: LockVersion }> = [];
    let nextToken: string | undefined;

    do {
      const response = await withConnectRetry(
        () =>
          this.client.send(
            new ListDataTableAttributesCommand({
              InstanceId: this.config.instanceArn,
              DataTableId: table.id,
              MaxResults: 100,
              NextToken: nextToken,
            }),
          ),
        { retry: this.config.retry, label: "ListDataTableAttributes" },
      );
      for (const attribute of response.Attributes ?? []) {
        versions.push({ name: attribute.Name ?? "", lockVersion: fromApiLockVersion(attribute.LockVersion) });
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return versions;
  }

  /**
   * Token of the stored value for a row (first attribute when none is named)
   */
  private async findValueVersion(table: TableHandle, rowKey: string, attributeName?: string): Promise<LockVersion> {
    const expected = parseRowKey(rowKey, table.primaryKey);
    if (!expected) return NO_LOCK_VERSION;
    const wanted = entryId(expected, "");

    let nextToken: string | undefined;
    do {
      const response = await withConnectRetry(
        () =>
          this.client.send(
            new ListDataTableValuesCommand({
              InstanceId: this.config.instanceArn,
              DataTableId: table.id,
              MaxResults: 100,
              NextToken: nextToken,
            }),
          ),
        { retry: this.config.retry, label: "ListDataTableValues" },
      );
      for (const value of response.Values ?? []) {
        if (entryId(value.PrimaryValues ?? [], "") !== wanted) continue;
        if (attributeName !== undefined && value.AttributeName !== attributeName) continue;
        return fromApiLockVersion(value.LockVersion);
      }
      nextToken = response.NextToken;
    } while (nextToken);

    // Row not stored yet
    return NO_LOCK_VERSION;
  }

  /**
   * Number of stored values in the first page of at most `limit`
   */
  async sampleValues(tableId: string, limit = 5): Promise<number> {
    const response = await withConnectRetry(
      () =>
        this.client.send(
          new ListDataTableValuesCommand({
            InstanceId: this.config.instanceArn,
            DataTableId: tableId,
            MaxResults: limit,
          }),
        ),
      { retry: this.config.retry, label: "ListDataTableValues" },
    );
    return response.Values?.length ?? 0;
  }
}

export function createConnectValueManager(config: ConnectManagerConfig): ConnectValueManager {
  return new ConnectValueManager(config);
}

/**
 * Fold a row's entry failures into one result
 */
export function classifyRow(key: string, failures: readonly EntryFailure[]): RowResult {
  if (failures.length === 0) return { key, status: "success" };

  const conflicts = failures.filter((failure) => isConflictMessage(failure.message));
  const missing = failures.filter((failure) => !isConflictMessage(failure.message) && NOT_FOUND_PATTERN.test(failure.message));
  const invalid = failures.filter((failure) => !conflicts.includes(failure) && !missing.includes(failure));

  // A value the service rejects will fail again on retry
  if (invalid.length > 0) {
    return {
      key,
      status: "validation-error",
      message: invalid.map((failure) => `${failure.attributeName}: ${failure.message}`).join("; "),
    };
  }
  const [conflict] = conflicts;
  if (conflict) {
    return { key, status: "conflict", message: conflict.message };
  }
  const [first] = missing;
  return {
    key,
    status: "not-found",
    message: first?.message ?? "Value not found",
    missingAttributes: missing.map((failure) => failure.attributeName),
  };
}

function parseRowKey(rowKey: string, primaryKey: readonly string[]): ApiPrimaryValue[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rowKey);
  } catch {
    return undefined;
  }
  if (!Array.isArray(parsed) || parsed.length !== primaryKey.length) return undefined;
  const values: unknown[] = parsed;
  return primaryKey.map((name, index) => {
    const value = values[index];
    return { AttributeName: name, Value: value === null || value === undefined ? "" : String(value) };
  });
}
