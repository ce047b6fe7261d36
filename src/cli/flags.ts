import { InvalidArgumentError, type Command } from "commander";
import { z } from "zod";

import { createAppContext, type AppContext } from "../app/context.js";

// =============================================================================
// GLOBAL OPTIONS
// =============================================================================

const GlobalOptionsSchema = z
  .object({
    home: z.string().optional(),
    config: z.string().optional(),
    debug: z.boolean().optional(),
    json: z.boolean().optional(),
  })
  .passthrough();

export type GlobalOptions = {
  home?: string;
  config?: string;
  debug: boolean;
  useJson: boolean;
};

export function registerGlobalFlags(program: Command): void {
  program
    .option("--home <dir>", "cellsync home (default: $CELLSYNC_HOME or ./.cellsync)")
    .option("--config <path>", "Config file (default: <home>/config.yaml)")
    .option("--debug", "Show error details and stacks", false);
}

export function resolveGlobalOptions(command: Command): GlobalOptions {
  const opts = GlobalOptionsSchema.parse(command.optsWithGlobals());
  return {
    home: opts.home,
    config: opts.config,
    debug: opts.debug ?? false,
    useJson: opts.json ?? false,
  };
}

export function contextFromCommand(command: Command): AppContext {
  const globals = resolveGlobalOptions(command);
  return createAppContext({ home: globals.home, configPath: globals.config });
}

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

export function parseCellIndex(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Cell index must be a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of seconds.");
  }
  return seconds;
}

export function parseNameList(value: string): string[] {
  return value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}
