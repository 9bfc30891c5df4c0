/**
 * Conflict Retry Manager
 *
 * Runs one batch call as a bounded state machine:
 * attempt -> conflict? -> invalidate + refresh tokens -> attempt n+1,
 * ending in per-row results or exhausted failures. Only concurrency
 * conflicts are retried (and transport errors when configured to share
 * the same budget); validation and other remote errors settle at once.
 */

import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import {
  computeBackoffDelay,
  formatErrorMessage,
  isConflictError,
  isTransportError,
  sleep,
} from "../retry.js";
import type {
  FailureReason,
  LockTokens,
  LockVersion,
  MutationOperation,
  RemoteMutationApi,
  RowMutation,
  RowResult,
  TableHandle,
} from "../types.js";
import { lockScopesForRow } from "./keys.js";
import type { LockVersionCache } from "./lock-cache.js";

export type ConflictRetryConfig = {
  /** Total attempts per batch, first call included */
  maxAttempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitter: number;
  /** Let timeouts and connection errors consume the conflict budget */
  retryTransportErrors: boolean;
};

export const CONFLICT_RETRY_DEFAULTS: ConflictRetryConfig = {
  maxAttempts: 3,
  minDelayMs: 200,
  maxDelayMs: 2_000,
  jitter: 0.2,
  retryTransportErrors: false,
};

export const RETRIES_EXHAUSTED_MESSAGE = "concurrency conflict, retries exhausted";

export type BatchRowResult =
  | { key: string; status: "success" }
  | { key: string; status: "not-found"; message: string; missingAttributes?: readonly string[] }
  | { key: string; status: "failed"; reason: FailureReason; message: string };

export interface BatchExecution {
  results: Map<string, BatchRowResult>;
  attempts: number;
  retries: number;
}

export interface ConflictRetryOptions {
  retry?: Partial<ConflictRetryConfig>;
  logger?: Logger;
}

type RetryCause = { kind: "conflict" } | { kind: "transport"; message: string };

type Retryable = { mutation: RowMutation; cause: RetryCause };

interface AttemptOutcome {
  settled: BatchRowResult[];
  retry: Retryable[];
}

export function resolveConflictRetryConfig(overrides: Partial<ConflictRetryConfig> = {}): ConflictRetryConfig {
  const maxAttempts = Math.max(1, Math.round(overrides.maxAttempts ?? CONFLICT_RETRY_DEFAULTS.maxAttempts));
  const minDelayMs = Math.max(0, Math.round(overrides.minDelayMs ?? CONFLICT_RETRY_DEFAULTS.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides.maxDelayMs ?? CONFLICT_RETRY_DEFAULTS.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides.jitter ?? CONFLICT_RETRY_DEFAULTS.jitter));
  return {
    maxAttempts,
    minDelayMs,
    maxDelayMs,
    jitter,
    retryTransportErrors: overrides.retryTransportErrors ?? CONFLICT_RETRY_DEFAULTS.retryTransportErrors,
  };
}

export class ConflictRetryManager {
  private readonly config: ConflictRetryConfig;
  private readonly logger: Logger;

  constructor(
    private readonly api: RemoteMutationApi,
    private readonly cache: LockVersionCache,
    options: ConflictRetryOptions = {},
  ) {
    this.config = resolveConflictRetryConfig(options.retry);
    this.logger = options.logger ?? silentLogger;
  }

  async execute(
    operation: MutationOperation,
    table: TableHandle,
    mutations: readonly RowMutation[],
  ): Promise<BatchExecution> {
    const results = new Map<string, BatchRowResult>();
    let pending = mutations.map((mutation): Retryable => ({ mutation, cause: { kind: "conflict" } }));
    let attempts = 0;

    while (pending.length > 0 && attempts < this.config.maxAttempts) {
      attempts += 1;
      if (attempts > 1) {
        const delayMs = computeBackoffDelay(attempts - 1, {
          attempts: this.config.maxAttempts,
          minDelayMs: this.config.minDelayMs,
          maxDelayMs: this.config.maxDelayMs,
          jitter: this.config.jitter,
        });
        this.logger.info(
          `${table.name}: retrying ${pending.length} ${operation}(s), attempt ${attempts}/${this.config.maxAttempts} in ${delayMs}ms`,
        );
        await sleep(delayMs);
      }

      const batch = pending.map((entry) => entry.mutation);
      const outcome = await this.attempt(operation, table, batch);

      for (const result of outcome.settled) {
        results.set(result.key, result);
      }

      // Writes advance the service's tokens (a partial not-found wrote the values
      // that existed); conflicts prove ours stale
      const written = outcome.settled
        .filter((result) => result.status === "success" || (result.status === "not-found" && result.missingAttributes))
        .map((result) => result.key);
      this.invalidateScopes(table, batch.filter((m) => written.includes(m.key)));
      this.invalidateScopes(table, outcome.retry.map((entry) => entry.mutation));

      pending = outcome.retry;
    }

    for (const { mutation, cause } of pending) {
      results.set(
        mutation.key,
        cause.kind === "conflict"
          ? { key: mutation.key, status: "failed", reason: "conflict-exhausted", message: RETRIES_EXHAUSTED_MESSAGE }
          : {
              key: mutation.key,
              status: "failed",
              reason: "transport",
              message: `transport error, retries exhausted: ${cause.message}`,
            },
      );
    }

    return { results, attempts, retries: Math.max(0, attempts - 1) };
  }

  private async attempt(
    operation: MutationOperation,
    table: TableHandle,
    batch: readonly RowMutation[],
  ): Promise<AttemptOutcome> {
    let tokens: LockTokens;
    try {
      tokens = await this.resolveTokens(table, batch);
    } catch (err) {
      return this.failBatch(batch, err, "lock version fetch failed");
    }

    let rowResults: RowResult[];
    try {
      rowResults =
        operation === "update"
          ? await this.api.batchUpdate(table, batch, tokens)
          : await this.api.batchCreate(table, batch, tokens);
    } catch (err) {
      if (isConflictError(err)) {
        this.logger.warn(`${table.name}: batch ${operation} rejected with a concurrency conflict`);
        return { settled: [], retry: batch.map((mutation): Retryable => ({ mutation, cause: { kind: "conflict" } })) };
      }
      return this.failBatch(batch, err, `batch ${operation} failed`);
    }

    const byKey = new Map(rowResults.map((result): [string, RowResult] => [result.key, result]));
    const outcome: AttemptOutcome = { settled: [], retry: [] };
    const interrupted = new Map<unknown, RowMutation[]>();

    for (const mutation of batch) {
      const result = byKey.get(mutation.key);
      if (!result) {
        outcome.settled.push({
          key: mutation.key,
          status: "failed",
          reason: "remote",
          message: `no result returned for row in batch ${operation}`,
        });
        continue;
      }

      switch (result.status) {
        case "success":
          outcome.settled.push({ key: result.key, status: "success" });
          break;
        case "conflict":
          outcome.retry.push({ mutation, cause: { kind: "conflict" } });
          break;
        case "not-found":
          outcome.settled.push({
            key: result.key,
            status: "not-found",
            message: result.message,
            ...(result.missingAttributes ? { missingAttributes: result.missingAttributes } : {}),
          });
          break;
        case "validation-error":
          outcome.settled.push({
            key: result.key,
            status: "failed",
            reason: "validation",
            message: `validation error: ${result.message}`,
          });
          break;
        case "error": {
          const rows = interrupted.get(result.error) ?? [];
          rows.push(mutation);
          interrupted.set(result.error, rows);
          break;
        }
      }
    }

    // Rows the call never settled take the thrown error, as a whole batch would
    for (const [err, rows] of interrupted) {
      const failure: AttemptOutcome = isConflictError(err)
        ? { settled: [], retry: rows.map((mutation): Retryable => ({ mutation, cause: { kind: "conflict" } })) }
        : this.failBatch(rows, err, `batch ${operation} failed`);
      outcome.settled.push(...failure.settled);
      outcome.retry.push(...failure.retry);
    }

    return outcome;
  }

  private failBatch(batch: readonly RowMutation[], err: unknown, context: string): AttemptOutcome {
    const message = formatErrorMessage(err);
    const transport = isTransportError(err);

    if (transport && this.config.retryTransportErrors) {
      this.logger.warn(`${context}: ${message} (will retry)`);
      return {
        settled: [],
        retry: batch.map((mutation): Retryable => ({ mutation, cause: { kind: "transport", message } })),
      };
    }

    this.logger.error(`${context}: ${message}`);
    const reason: FailureReason = transport ? "transport" : "remote";
    return {
      settled: batch.map(
        (mutation): BatchRowResult => ({ key: mutation.key, status: "failed", reason, message: `${context}: ${message}` }),
      ),
      retry: [],
    };
  }

  private async resolveTokens(table: TableHandle, batch: readonly RowMutation[]): Promise<LockTokens> {
    const scopes = new Set(batch.flatMap((mutation) => lockScopesForRow(table, mutation.key, mutation.row)));
    const entries = await Promise.all(
      [...scopes].map(async (scope): Promise<[string, LockVersion]> => [
        scope,
        await this.cache.get(table, table.lockLevel, scope),
      ]),
    );
    return new Map(entries);
  }

  private invalidateScopes(table: TableHandle, mutations: readonly RowMutation[]): void {
    for (const mutation of mutations) {
      for (const scope of lockScopesForRow(table, mutation.key, mutation.row)) {
        this.cache.invalidate(table, table.lockLevel, scope);
      }
    }
  }
}
