import { cleanupTables, type TableCleanupResult } from "../../extensions/connect-datatables/src/index.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";
import { type CommandDeps, type CommonCommandOptions, loadCommandContext } from "./context.js";

export function formatCleanupResult(result: TableCleanupResult): string {
  switch (result.status) {
    case "deleted":
      return `[OK] ${result.table}: deleted`;
    case "not_found":
      return `[SKIP] ${result.table}: not found`;
    case "failed":
      return `[FAIL] ${result.table}: ${result.error}`;
  }
}

export async function cleanupCommand(
  opts: CommonCommandOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<TableCleanupResult[]> {
  const { loaded, logger, services } = await loadCommandContext(opts, deps);
  const results = await cleanupTables(loaded.config, services.tables, logger);

  if (opts.json) {
    runtime.log(JSON.stringify(results, null, 2));
  } else {
    for (const result of results) runtime.log(formatCleanupResult(result));
  }

  if (results.some((result) => result.status === "failed")) runtime.exit(1);
  return results;
}
