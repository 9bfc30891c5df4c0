import { InvalidArgumentError } from "commander";

import { ConfigurationError, formatErrorMessage } from "../../extensions/connect-datatables/src/index.js";
import type { RuntimeEnv } from "../runtime.js";

/**
 * Run a command action, reporting any thrown error and exiting with 1
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      runtime.error(`[FAIL] Configuration error: ${error.message}`);
      for (const issue of error.issues) runtime.error(`  - ${issue}`);
    } else {
      runtime.error(`[FAIL] Pipeline failed: ${formatErrorMessage(error)}`);
    }
    runtime.exit(1);
  }
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
