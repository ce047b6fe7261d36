import type { Command } from "commander";

import { createSessionLogger, type AppContext } from "../app/context.js";
import { inspectDocument, type InspectOptions } from "../app/inspect.js";
import { logSessionEvent } from "../core/logger.js";
import {
  describeIssue,
  recordedExecutionOrder,
  summarizeStatuses,
  type ReconciledStatus,
  type StatusSummary,
} from "../state/reconciler.js";
import { selectTargets } from "../state/replay-planner.js";

import { contextFromCommand, parseCellIndex, parseNameList, resolveGlobalOptions } from "./flags.js";
import { emitResult } from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type CheckCommandOptions = {
  cell?: number;
  liveNames?: string[];
  useJson: boolean;
};

export type CheckReport = {
  document: string;
  summary: StatusSummary;
  executionOrder: { cell: number; recordedRunOrder: number }[];
  cells: ReconciledStatus[];
};

// =============================================================================
// COMMAND
// =============================================================================

export function registerCheckCommand(program: Command): void {
  program
    .command("check")
    .description("Report per-cell execution state, staleness and undefined names")
    .argument("<notebook>", "Path to the .ipynb document")
    .option("--cell <n>", "Only report this cell", parseCellIndex)
    .option("--live-names <names>", "Comma-separated names bound in the live session", parseNameList)
    .option("--json", "Emit JSON output envelope", false)
    .action(async (notebook: string, opts: { cell?: number; liveNames?: string[] }, command: Command) => {
      const ctx = contextFromCommand(command);
      await checkCommand(ctx, notebook, {
        cell: opts.cell,
        liveNames: opts.liveNames,
        useJson: resolveGlobalOptions(command).useJson,
      });
    });
}

export async function checkCommand(
  ctx: AppContext,
  documentPath: string,
  options: CheckCommandOptions,
  deps: Omit<InspectOptions, "liveNames"> = {},
): Promise<CheckReport> {
  const inspection = await inspectDocument(ctx, documentPath, {
    ...deps,
    liveNames: options.liveNames ?? null,
  });
  const { document, statuses } = inspection;

  let reported = [...statuses.values()];
  if (options.cell !== undefined) {
    const [index] = selectTargets(document, { kind: "cell", cell: options.cell });
    reported = reported.filter((status) => status.index === index);
  }

  const summary = summarizeStatuses(new Map(reported.map((status) => [status.index, status])));
  const report: CheckReport = {
    document: document.path,
    summary,
    executionOrder: recordedExecutionOrder(document),
    cells: reported,
  };

  const logger = createSessionLogger(ctx, document.path);
  logSessionEvent(logger, "check.summary", {
    cell: options.cell,
    payload: {
      cells: summary.cells,
      errors: summary.errors,
      warnings: summary.warnings,
      stale: summary.stale,
      never_executed: summary.neverExecuted,
    },
  });
  logger.close();

  emitResult(report, { useJson: options.useJson }, renderCheckReport);
  if (summary.errors > 0) {
    process.exitCode = 1;
  }
  return report;
}

// =============================================================================
// TEXT OUTPUT
// =============================================================================

export function renderCheckReport(report: CheckReport): string[] {
  const lines = [report.document];

  for (const status of report.cells) {
    const state = status.isStale ? `stale (${status.staleReason ?? "unknown"})` : "ok";
    lines.push(`Cell ${status.index}: ${state}`);
    for (const issue of status.issues) {
      lines.push(`  ${issue.severity}: ${describeIssue(issue)}`);
    }
    for (const note of status.notes) {
      lines.push(`  note: ${note.kind.replace("_", " ")}: ${note.detail}`);
    }
  }

  const { summary } = report;
  lines.push(
    `Summary: ${plural(summary.cells, "code cell")}, ${plural(summary.errors, "error")}, ` +
      `${plural(summary.warnings, "warning")}, ${summary.stale} stale, ` +
      `${summary.neverExecuted} never executed.`,
  );
  return lines;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
