/**
 * Outcome Reporter
 *
 * Folds per-row outcomes from both phases into a ReconciliationSummary.
 * No remote calls.
 */

import type {
  DesiredRow,
  PhaseStats,
  ReconciliationPhase,
  ReconciliationSummary,
  RowFailure,
  RowOutcome,
} from "../types.js";

interface RecordedOutcome {
  phase: ReconciliationPhase;
  outcome: RowOutcome;
}

export class OutcomeReporter {
  private readonly outcomes = new Map<number, RecordedOutcome>();
  private readonly phases: Record<ReconciliationPhase, PhaseStats> = {
    update: { batches: 0, rows: 0, retries: 0 },
    create: { batches: 0, rows: 0, retries: 0 },
  };

  constructor(
    private readonly tableName: string,
    private readonly rows: readonly DesiredRow[],
  ) {}

  /**
   * Record the final outcome of the row at `index`; a row settles exactly once
   */
  record(index: number, phase: ReconciliationPhase, outcome: RowOutcome): void {
    if (index < 0 || index >= this.rows.length) {
      throw new RangeError(`Row index ${index} out of range`);
    }
    const existing = this.outcomes.get(index);
    if (existing) {
      throw new Error(
        `Row ${index} already settled as ${existing.outcome.status} in ${existing.phase} phase`,
      );
    }
    this.outcomes.set(index, { phase, outcome });
  }

  hasOutcome(index: number): boolean {
    return this.outcomes.has(index);
  }

  recordBatch(phase: ReconciliationPhase, rows: number, retries: number): void {
    const stats = this.phases[phase];
    stats.batches += 1;
    stats.rows += rows;
    stats.retries += retries;
  }

  summarize(extra: { lockTokenFetches: number; durationMs: number }): ReconciliationSummary {
    let updated = 0;
    let created = 0;
    const failures: RowFailure[] = [];

    this.rows.forEach((row, index) => {
      const recorded: RecordedOutcome = this.outcomes.get(index) ?? {
        phase: "update",
        outcome: { status: "failed", reason: "remote", message: "no outcome recorded" },
      };
      const { outcome } = recorded;
      switch (outcome.status) {
        case "updated":
          updated += 1;
          break;
        case "created":
          created += 1;
          break;
        case "failed":
          failures.push({
            index,
            primaryValues: row.primaryValues,
            phase: recorded.phase,
            reason: outcome.reason,
            message: outcome.message,
          });
          break;
      }
    });

    return {
      table: this.tableName,
      total: this.rows.length,
      updated,
      created,
      failed: failures.length,
      failures,
      phases: {
        update: { ...this.phases.update },
        create: { ...this.phases.create },
      },
      lockTokenFetches: extra.lockTokenFetches,
      durationMs: extra.durationMs,
    };
  }
}

/**
 * One-line human summary
 */
export function formatSummary(summary: ReconciliationSummary): string {
  return `${summary.table}: ${summary.updated} updated, ${summary.created} created, ${summary.failed} failed, ${summary.total} total`;
}
