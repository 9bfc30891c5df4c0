/**
 * Reconciliation Engine - Update-first upsert of desired rows
 *
 * Phase UPDATE sends every desired row as an update. Rows the service
 * reports as not found are queued, and only once every update batch has
 * settled does phase CREATE resubmit them as creates. Rows rejected by
 * validation never reach the create phase, and there is no third phase.
 */

import { ConfigurationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type {
  DesiredRow,
  LockTokenSource,
  ReconciliationPhase,
  ReconciliationSummary,
  RemoteMutationApi,
  RowMutation,
  TableHandle,
} from "../types.js";
import { SERVICE_BATCH_CEILING, chunkRows, validateBatchSize } from "./chunker.js";
import {
  ConflictRetryManager,
  type BatchRowResult,
  type ConflictRetryConfig,
} from "./conflict-retry.js";
import { primaryKeyId } from "./keys.js";
import { LockVersionCache } from "./lock-cache.js";
import { OutcomeReporter, formatSummary } from "./reporter.js";

export interface ReconcilerOptions {
  /** Rows per batch call (default 25) */
  batchSize?: number;
  /** Largest batch the service accepts */
  batchCeiling?: number;
  /** Batches in flight at once within a phase (default 1) */
  concurrency?: number;
  retry?: Partial<ConflictRetryConfig>;
  logger?: Logger;
  /** Checked before each batch is dispatched */
  signal?: AbortSignal;
}

interface PendingRow extends RowMutation {
  index: number;
  /** The update phase already wrote some of this row's values */
  partiallyWritten?: boolean;
}

type SettleRow = (entry: PendingRow, result: BatchRowResult) => void;

export class Reconciler {
  private readonly batchSize: number;
  private readonly batchCeiling: number;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(
    private readonly api: RemoteMutationApi,
    private readonly tokenSource: LockTokenSource,
    private readonly options: ReconcilerOptions = {},
  ) {
    this.batchCeiling = options.batchCeiling ?? SERVICE_BATCH_CEILING;
    this.batchSize = options.batchSize ?? this.batchCeiling;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Reconcile `rows` against `table`; throws only ConfigurationError, before any remote call
   */
  async reconcile(table: TableHandle, rows: readonly DesiredRow[]): Promise<ReconciliationSummary> {
    const startedAt = Date.now();
    const batchSize = validateBatchSize(this.batchSize, this.batchCeiling);
    const pending = prepareRows(table, rows);

    // Token state lives for this run only
    const cache = new LockVersionCache(this.tokenSource);
    const retryManager = new ConflictRetryManager(this.api, cache, {
      retry: this.options.retry,
      logger: this.logger,
    });
    const reporter = new OutcomeReporter(table.name, rows);

    this.logger.info(`Phase 1: updating ${pending.length} row(s) in ${table.name}`);
    const toCreate: PendingRow[] = [];
    await this.runPhase("update", table, pending, batchSize, retryManager, reporter, (entry, result) => {
      switch (result.status) {
        case "success":
          reporter.record(entry.index, "update", { status: "updated" });
          break;
        case "not-found":
          toCreate.push(narrowToMissing(entry, result.missingAttributes));
          break;
        case "failed":
          this.logger.warn(`${table.name}: update of row ${entry.key} failed: ${result.message}`);
          reporter.record(entry.index, "update", { status: "failed", reason: result.reason, message: result.message });
          break;
      }
    });

    if (toCreate.length > 0) {
      this.logger.info(`Phase 2: creating ${toCreate.length} new row(s) in ${table.name}`);
      await this.runPhase("create", table, toCreate, batchSize, retryManager, reporter, (entry, result) => {
        switch (result.status) {
          case "success":
            // The key existed remotely, so the row was updated
            reporter.record(entry.index, "create", { status: entry.partiallyWritten ? "updated" : "created" });
            break;
          case "not-found":
            reporter.record(entry.index, "create", {
              status: "failed",
              reason: "remote",
              message: `create reported not found: ${result.message}`,
            });
            break;
          case "failed":
            this.logger.warn(`${table.name}: create of row ${entry.key} failed: ${result.message}`);
            reporter.record(entry.index, "create", { status: "failed", reason: result.reason, message: result.message });
            break;
        }
      });
    }

    const summary = reporter.summarize({
      lockTokenFetches: cache.fetchCount,
      durationMs: Date.now() - startedAt,
    });
    this.logger.info(`Value processing summary for ${formatSummary(summary)}`);
    return summary;
  }

  private async runPhase(
    phase: ReconciliationPhase,
    table: TableHandle,
    rows: readonly PendingRow[],
    batchSize: number,
    retryManager: ConflictRetryManager,
    reporter: OutcomeReporter,
    settle: SettleRow,
  ): Promise<void> {
    const batches = [...chunkRows(rows, batchSize)];
    const queue = batches.entries();

    const worker = async () => {
      for (let step = queue.next(); !step.done; step = queue.next()) {
        const [position, batch] = step.value;

        if (this.options.signal?.aborted) {
          for (const entry of batch) {
            reporter.record(entry.index, phase, {
              status: "failed",
              reason: "cancelled",
              message: "reconciliation cancelled before batch was sent",
            });
          }
          continue;
        }

        const execution = await retryManager.execute(phase, table, batch);
        reporter.recordBatch(phase, batch.length, execution.retries);

        for (const entry of batch) {
          const result: BatchRowResult = execution.results.get(entry.key) ?? {
            key: entry.key,
            status: "failed",
            reason: "remote",
            message: "no result recorded for row",
          };
          settle(entry, result);
        }

        this.logger.debug(
          `${table.name}: ${phase} batch ${position + 1}/${batches.length} settled (${batch.length} row(s), ${execution.attempts} attempt(s))`,
        );
      }
    };

    await Promise.all(Array.from({ length: Math.min(this.concurrency, batches.length) }, () => worker()));
  }
}

export function createReconciler(
  api: RemoteMutationApi,
  tokenSource: LockTokenSource,
  options?: ReconcilerOptions,
): Reconciler {
  return new Reconciler(api, tokenSource, options);
}

/**
 * Check the primary-key declaration against every row and key them
 */
function prepareRows(table: TableHandle, rows: readonly DesiredRow[]): PendingRow[] {
  const issues: string[] = [];
  const primary = new Set(table.primaryKey);

  if (table.primaryKey.length === 0) {
    issues.push(`table ${table.name} declares no primary attribute`);
  }
  if (primary.size !== table.primaryKey.length) {
    issues.push(`table ${table.name} lists a primary attribute more than once`);
  }

  const seen = new Map<string, number>();
  const pending: PendingRow[] = [];

  rows.forEach((row, index) => {
    const where = `row ${index}`;
    const primaryNames = row.primaryValues.map((pair) => pair.attributeName);

    for (const name of table.primaryKey) {
      const count = primaryNames.filter((candidate) => candidate === name).length;
      if (count === 0) issues.push(`${where}: missing primary value for ${name}`);
      if (count > 1) issues.push(`${where}: primary value for ${name} given ${count} times`);
    }
    for (const name of primaryNames) {
      if (!primary.has(name)) issues.push(`${where}: ${name} is not a primary attribute`);
    }

    const attributeNames = new Set<string>();
    for (const pair of row.attributes) {
      if (primary.has(pair.attributeName)) {
        issues.push(`${where}: primary attribute ${pair.attributeName} listed among non-key attributes`);
      }
      if (attributeNames.has(pair.attributeName)) {
        issues.push(`${where}: attribute ${pair.attributeName} given more than once`);
      }
      attributeNames.add(pair.attributeName);
    }

    const key = primaryKeyId(row, table.primaryKey);
    const previous = seen.get(key);
    if (previous !== undefined) {
      issues.push(`${where}: primary key ${key} duplicates row ${previous}`);
    } else {
      seen.set(key, index);
    }

    pending.push({ index, key, row });
  });

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid desired rows for table ${table.name}`, issues);
  }
  return pending;
}

/**
 * Limit a create to the attributes the service reported missing, flagging
 * rows whose other values the update already wrote
 */
function narrowToMissing(entry: PendingRow, missing: readonly string[] | undefined): PendingRow {
  if (!missing || missing.length === 0) return entry;
  const attributes = entry.row.attributes.filter((pair) => missing.includes(pair.attributeName));
  if (attributes.length === 0 || attributes.length === entry.row.attributes.length) return entry;
  return { ...entry, partiallyWritten: true, row: { primaryValues: entry.row.primaryValues, attributes } };
}
