import { verifyTables, type TableVerification } from "../../extensions/connect-datatables/src/index.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";
import { type CommandDeps, type CommonCommandOptions, loadCommandContext } from "./context.js";

export function formatVerification(result: TableVerification): string[] {
  switch (result.status) {
    case "missing":
      return [`[FAIL] ${result.table}: not found`];
    case "failed":
      return [`[FAIL] ${result.table}: ${result.error}`];
    case "found": {
      const attributes = result.attributes.map(
        (attribute) => `${attribute.name} (${attribute.valueType ?? "unknown"}${attribute.primary ? ", primary" : ""})`,
      );
      return [
        `[OK] ${result.table} (${result.tableId})`,
        `  - Attributes: ${attributes.length > 0 ? attributes.join(", ") : "none"}`,
        `  - Primary keys: ${result.primaryKeys.length > 0 ? result.primaryKeys.join(", ") : "none"}`,
        `  - Sampled values: ${result.sampledValues}`,
      ];
    }
  }
}

export async function verifyCommand(
  opts: CommonCommandOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<TableVerification[]> {
  const { loaded, logger, services } = await loadCommandContext(opts, deps);
  const results = await verifyTables(loaded.config, services, logger);

  if (opts.json) {
    runtime.log(JSON.stringify(results, null, 2));
  } else {
    for (const result of results) {
      for (const line of formatVerification(result)) runtime.log(line);
    }
  }

  if (results.some((result) => result.status !== "found")) runtime.exit(1);
  return results;
}
