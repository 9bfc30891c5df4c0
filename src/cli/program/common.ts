import type { Command } from "commander";

import type { CommonCommandOptions } from "../../commands/context.js";

export function addCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "Deployment config file (default: config/data_tables_config.json)")
    .option("--region <region>", "AWS region (default: config, then AWS_REGION, then ca-central-1)")
    .option("--json", "Output JSON instead of human-friendly text")
    .option("--verbose", "Log debug output");
}

export function readCommonOptions(opts: Record<string, unknown>): CommonCommandOptions {
  return {
    config: typeof opts.config === "string" ? opts.config : undefined,
    region: typeof opts.region === "string" ? opts.region : undefined,
    json: Boolean(opts.json),
    verbose: Boolean(opts.verbose),
  };
}
