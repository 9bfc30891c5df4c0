import { Command } from "commander";

import { VERSION } from "../version.js";
import { registerCleanupCommand } from "./program/register.cleanup.js";
import { registerDeployCommand } from "./program/register.deploy.js";
import { registerVerifyCommand } from "./program/register.verify.js";

export function buildProgram(): Command {
  const program = new Command("datatables");
  program.description("Deploy Amazon Connect data tables from JSON configuration").version(VERSION);

  registerDeployCommand(program);
  registerVerifyCommand(program);
  registerCleanupCommand(program);
  return program;
}
