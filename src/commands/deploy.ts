/**
 * `datatables deploy`: provision tables and attributes, then upsert values.
 *
 * Exits with 1 when a table failed or any row could not be written.
 */

import {
  DeploymentPipeline,
  type AttributeResult,
  type DeploymentReport,
  type TableDeploymentResult,
} from "../../extensions/connect-datatables/src/index.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";
import { type CommandDeps, type CommonCommandOptions, loadCommandContext } from "./context.js";

export type DeployCommandOptions = CommonCommandOptions & {
  batchSize?: number;
  maxAttempts?: number;
  concurrency?: number;
};

const STATUS_ICONS: Record<TableDeploymentResult["status"], string> = {
  created: "[OK]",
  existing: "[SKIP]",
  failed: "[FAIL]",
};

function formatAttributes(results: readonly AttributeResult[]): string {
  const count = (status: AttributeResult["status"]) => results.filter((result) => result.status === status).length;
  return `Attributes: ${count("created")} created, ${count("skipped")} skipped, ${count("failed")} failed`;
}

export function formatTableResult(result: TableDeploymentResult): string[] {
  const lines = [`${STATUS_ICONS[result.status]} ${result.table}: ${result.status}`];
  if (result.status === "existing") lines.push("  - Data table already exists");
  if (result.error) lines.push(`  - Error: ${result.error}`);
  for (const issue of result.issues ?? []) lines.push(`    ${issue}`);
  if (result.attributes.length > 0) lines.push(`  - ${formatAttributes(result.attributes)}`);
  for (const attribute of result.attributes) {
    if (attribute.status === "failed") lines.push(`    ${attribute.name}: ${attribute.error}`);
  }

  if (result.values?.status === "skipped") {
    lines.push(`  - Values: skipped (${result.values.reason})`);
  } else if (result.values?.status === "reconciled") {
    const { summary } = result.values;
    lines.push(
      `  - Values: ${summary.updated} updated, ${summary.created} created, ${summary.failed} failed, ${summary.total} total`,
    );
    for (const failure of summary.failures) {
      const key = failure.primaryValues.map((pair) => `${pair.attributeName}=${String(pair.value)}`).join(", ");
      lines.push(`    row ${failure.index} (${key}) failed in ${failure.phase} phase: ${failure.message}`);
    }
  }
  return lines;
}

export function formatDeploymentReport(report: DeploymentReport): string[] {
  const lines = ["Deployment Results:", "=".repeat(50)];
  for (const result of report.tables) lines.push(...formatTableResult(result));
  return lines;
}

export async function deployCommand(
  opts: DeployCommandOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<DeploymentReport> {
  const { loaded, logger, services } = await loadCommandContext(opts, deps);

  // First Ctrl-C stops dispatching batches; a second one kills the process
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("Interrupted: waiting for in-flight batches, remaining rows will be cancelled");
    controller.abort();
  };
  const onExternalAbort = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  if (deps.signal?.aborted) controller.abort();
  deps.signal?.addEventListener("abort", onExternalAbort, { once: true });

  let report: DeploymentReport;
  try {
    report = await new DeploymentPipeline(services, {
      batchSize: opts.batchSize,
      maxAttempts: opts.maxAttempts,
      concurrency: opts.concurrency,
      signal: controller.signal,
      logger,
    }).deploy(loaded);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    deps.signal?.removeEventListener("abort", onExternalAbort);
  }

  if (opts.json) {
    runtime.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatDeploymentReport(report)) runtime.log(line);
  }

  if (!report.succeeded) runtime.exit(1);
  return report;
}
