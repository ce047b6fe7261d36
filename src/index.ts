#!/usr/bin/env node
import { CommanderError, type Command } from "commander";

import { resolveDebugFlagFromArgv } from "./core/logger.js";
import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { emitJsonError, toUserFacingError } from "./cli/output.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

// Subcommands copy settings only when created, so apply to the whole tree.
function configureCliErrorHandling(command: Command): void {
  command.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  command.exitOverride();
  command.commands.forEach(configureCliErrorHandling);
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return program.getOptionValue("debug") === true;
}

function resolveJsonEnabled(argv: string[]): boolean {
  const end = argv.indexOf("--");
  return (end === -1 ? argv : argv.slice(0, end)).includes("--json");
}

function resolveExitCode(error: unknown): number {
  if (error instanceof CommanderError && Number.isFinite(error.exitCode)) {
    return error.exitCode;
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    if (resolveJsonEnabled(argv)) {
      emitJsonError(error);
    } else {
      const debug = resolveDebugEnabled(argv, program);
      console.error(renderCliError(toUserFacingError(error), { debug }));
    }
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

// Allow `node dist/src/index.js` direct execution
if (import.meta.url === `file://${process.argv[1]}`) {
  void main(process.argv);
}
