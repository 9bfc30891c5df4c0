import type { Command } from "commander";

import { cleanupCommand } from "../../commands/cleanup.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { addCommonOptions, readCommonOptions } from "./common.js";

export function registerCleanupCommand(program: Command) {
  addCommonOptions(program.command("cleanup").description("Delete every configured data table")).action(
    async (opts: Record<string, unknown>) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await cleanupCommand(readCommonOptions(opts), defaultRuntime);
      });
    },
  );
}
