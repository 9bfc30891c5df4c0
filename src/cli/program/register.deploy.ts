import type { Command } from "commander";

import { deployCommand } from "../../commands/deploy.js";
import { defaultRuntime } from "../../runtime.js";
import { parsePositiveInt, runCommandWithRuntime } from "../cli-utils.js";
import { addCommonOptions, readCommonOptions } from "./common.js";

export function registerDeployCommand(program: Command) {
  addCommonOptions(
    program
      .command("deploy")
      .description("Create data tables and attributes, then upsert their values")
      .option("--batch-size <n>", "Rows per batch call (1-25)", parsePositiveInt)
      .option("--max-attempts <n>", "Attempts per batch on lock version conflicts", parsePositiveInt)
      .option("--concurrency <n>", "Batches in flight per phase", parsePositiveInt),
  ).action(async (opts: Record<string, unknown>) => {
    await runCommandWithRuntime(defaultRuntime, async () => {
      await deployCommand(
        {
          ...readCommonOptions(opts),
          batchSize: typeof opts.batchSize === "number" ? opts.batchSize : undefined,
          maxAttempts: typeof opts.maxAttempts === "number" ? opts.maxAttempts : undefined,
          concurrency: typeof opts.concurrency === "number" ? opts.concurrency : undefined,
        },
        defaultRuntime,
      );
    });
  });
}
