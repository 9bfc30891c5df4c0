import type { Command } from "commander";

import { verifyCommand } from "../../commands/verify.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { addCommonOptions, readCommonOptions } from "./common.js";

export function registerVerifyCommand(program: Command) {
  addCommonOptions(
    program.command("verify").description("Check that the configured tables, attributes and values exist"),
  ).action(async (opts: Record<string, unknown>) => {
    await runCommandWithRuntime(defaultRuntime, async () => {
      await verifyCommand(readCommonOptions(opts), defaultRuntime);
    });
  });
}
