import type { Command } from "commander";

import { createLedger, createSessionLogger, type AppContext } from "../app/context.js";
import { inspectDocument } from "../app/inspect.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { DocumentAdapter } from "../notebook/document.js";
import type { InteractiveExecutor } from "../notebook/executor.js";
import { PythonSubprocessExecutor } from "../notebook/python-executor.js";
import type { ExecutionLedger } from "../state/ledger.js";
import { selectTargets, type TargetSelection } from "../state/replay-planner.js";
import { ReplaySession, type ReplayResult } from "../state/replay-session.js";

import { contextFromCommand, parseCellIndex, parseSeconds, resolveGlobalOptions } from "./flags.js";
import { emitResult } from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunCommandOptions = {
  selection: TargetSelection;
  timeoutSeconds?: number;
  useJson: boolean;
};

export type ClosableExecutor = InteractiveExecutor & { close?(): Promise<void> };

export type RunCommandDeps = {
  adapter?: DocumentAdapter;
  ledger?: ExecutionLedger;
  createExecutor?: (ctx: AppContext) => ClosableExecutor;
  signal?: AbortSignal;
};

export type ExecutedCellReport = {
  cell: number;
  durationMs: number;
  stdout: string;
  stderr: string;
  result: string | null;
  outputsMatch: boolean | null;
  recorded: boolean;
};

export type RunReport = {
  document: string;
  status: ReplayResult["status"];
  targets: number[];
  plan: number[];
  executed: ExecutedCellReport[];
  persistFailures: { cell: number | null; message: string }[];
  emptyReason: "no_targets" | "all_warm" | null;
  failure: {
    cell: number;
    isTarget: boolean;
    kind: "error" | "timeout" | "interrupted";
    errorKind: string;
    errorDetail: string;
    traceback: string[];
    suggestions: string[];
    skipped: number[];
  } | null;
};

type RunFlags = {
  cell?: number;
  from?: number;
  to?: number;
  all?: boolean;
  stale?: boolean;
  timeout?: number;
};

// =============================================================================
// COMMAND
// =============================================================================

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Re-execute cells and everything they depend on, in document order")
    .argument("<notebook>", "Path to the .ipynb document")
    .option("--cell <n>", "Run one cell and its upstream", parseCellIndex)
    .option("--from <n>", "Run every code cell from this index on", parseCellIndex)
    .option("--to <n>", "Run every code cell up to this index", parseCellIndex)
    .option("--all", "Run every code cell", false)
    .option("--stale", "Run every stale cell", false)
    .option("--timeout <seconds>", "Per-cell timeout (default: execution.timeout_seconds)", parseSeconds)
    .option("--json", "Emit JSON output envelope", false)
    .action(async (notebook: string, opts: RunFlags, command: Command) => {
      const ctx = contextFromCommand(command);
      await runCommand(ctx, notebook, {
        selection: resolveSelection(opts),
        timeoutSeconds: opts.timeout,
        useJson: resolveGlobalOptions(command).useJson,
      });
    });
}

export function resolveSelection(flags: RunFlags): TargetSelection {
  const selections: TargetSelection[] = [];
  if (flags.cell !== undefined) selections.push({ kind: "cell", cell: flags.cell });
  if (flags.from !== undefined) selections.push({ kind: "from", cell: flags.from });
  if (flags.to !== undefined) selections.push({ kind: "to", cell: flags.to });
  if (flags.all) selections.push({ kind: "all" });
  if (flags.stale) selections.push({ kind: "stale" });

  const [selection] = selections;
  if (selections.length !== 1 || !selection) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Choose what to run.",
      message: "Pass exactly one of --cell, --from, --to, --all or --stale.",
    });
  }
  return selection;
}

export async function runCommand(
  ctx: AppContext,
  documentPath: string,
  options: RunCommandOptions,
  deps: RunCommandDeps = {},
): Promise<RunReport> {
  const ledger = deps.ledger ?? createLedger(ctx);
  const inspection = await inspectDocument(ctx, documentPath, { adapter: deps.adapter, ledger });
  const { document, graph, statuses, reconcileOptions } = inspection;
  const targets = selectTargets(document, options.selection, statuses);

  const executor = (deps.createExecutor ?? createPythonExecutor)(ctx);
  const logger = createSessionLogger(ctx, document.path);
  const interrupt = deps.signal ? null : createInterruptHandler();
  const timeoutSeconds = options.timeoutSeconds ?? ctx.config.execution.timeout_seconds;

  let result: ReplayResult;
  try {
    const session = new ReplaySession({
      document,
      graph,
      executor,
      ledger,
      logger,
      reconcileOptions,
    });
    result = await session.run(targets, {
      timeoutMs: Math.round(timeoutSeconds * 1000),
      signal: deps.signal ?? interrupt?.signal,
    });
  } finally {
    interrupt?.cleanup();
    logger.close();
    await executor.close?.();
  }

  const report = toRunReport(document.path, result);
  emitResult(report, { useJson: options.useJson }, renderRunReport);
  if (result.status === "failed") {
    process.exitCode = 1;
  }
  return report;
}

function createPythonExecutor(ctx: AppContext): ClosableExecutor {
  return new PythonSubprocessExecutor({
    python: ctx.config.execution.python,
    directivePrefixes: ctx.config.directive_prefixes,
  });
}

// Ctrl-C interrupts the running cell instead of killing the CLI.
function createInterruptHandler(): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);
  return {
    signal: controller.signal,
    cleanup: () => {
      process.removeListener("SIGINT", onSigint);
    },
  };
}

// =============================================================================
// REPORT
// =============================================================================

export function toRunReport(documentPath: string, result: ReplayResult): RunReport {
  if (result.status === "empty") {
    return {
      document: documentPath,
      status: "empty",
      targets: result.targets,
      plan: [],
      executed: [],
      persistFailures: [],
      emptyReason: result.reason,
      failure: null,
    };
  }

  return {
    document: documentPath,
    status: result.status,
    targets: result.targets,
    plan: result.plan,
    executed: result.executed.map((cell) => ({
      cell: cell.cell,
      durationMs: cell.outcome.output.durationMs,
      stdout: cell.outcome.output.stdout,
      stderr: cell.outcome.output.stderr,
      result: cell.outcome.output.result,
      outputsMatch: cell.outputsMatch,
      recorded: cell.recorded,
    })),
    persistFailures: result.persistFailures.map((err) => ({
      cell: err.cellIndex,
      message: err.message,
    })),
    emptyReason: null,
    failure:
      result.status === "failed"
        ? {
            cell: result.failedCell,
            isTarget: result.failedTarget,
            kind: result.failure.failure,
            errorKind: result.failure.errorKind,
            errorDetail: result.failure.errorDetail,
            traceback: result.failure.traceback,
            suggestions: result.suggestions,
            skipped: result.skipped,
          }
        : null,
  };
}

export function renderRunReport(report: RunReport): string[] {
  if (report.status === "empty") {
    return [
      report.emptyReason === "no_targets"
        ? "Nothing to run: no code cells selected."
        : "Nothing to run: every required cell is already current.",
    ];
  }

  const lines = [`Plan: ${report.plan.join(", ")}`];
  for (const cell of report.executed) {
    const comparison =
      cell.outputsMatch === null ? "" : cell.outputsMatch ? ", outputs match" : ", outputs differ";
    lines.push(`Cell ${cell.cell}: ok (${cell.durationMs} ms${comparison})`);
    if (cell.stdout) lines.push(indent(cell.stdout));
    if (cell.result !== null) lines.push(indent(cell.result));
  }

  const failure = report.failure;
  if (failure) {
    const role = failure.isTarget ? "" : " (upstream of the requested cells)";
    lines.push(
      `Cell ${failure.cell}: failed [${failure.kind}]${role} ${failure.errorKind}: ${failure.errorDetail}`,
    );
    if (failure.suggestions.length > 0) {
      lines.push(`  Did you mean: ${failure.suggestions.join(", ")}?`);
    }
    if (failure.skipped.length > 0) {
      lines.push(`  Skipped: ${failure.skipped.join(", ")}`);
    }
  }

  for (const persist of report.persistFailures) {
    lines.push(`Warning: ledger not updated for cell ${persist.cell ?? "?"}: ${persist.message}`);
  }
  return lines;
}

function indent(text: string): string {
  return text
    .replace(/\n$/, "")
    .split("\n")
    .map((line) => `  | ${line}`)
    .join("\n");
}
