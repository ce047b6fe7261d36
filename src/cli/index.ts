import { Command } from "commander";

import { registerCheckCommand } from "./check.js";
import { registerDepsCommand } from "./deps.js";
import { registerGlobalFlags } from "./flags.js";
import { registerLedgerCommand } from "./ledger.js";
import { registerRunCommand } from "./run.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("cellsync")
    .description("Notebook state reconciliation: what ran, what is stale, what to re-run")
    .version("0.1.0");

  registerGlobalFlags(program);
  registerCheckCommand(program);
  registerDepsCommand(program);
  registerRunCommand(program);
  registerLedgerCommand(program);

  return program;
}
