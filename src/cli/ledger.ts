import type { Command } from "commander";

import { createLedger, type AppContext } from "../app/context.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { ExecutionLedger, LedgerCellRecord } from "../state/ledger.js";

import { contextFromCommand, resolveGlobalOptions } from "./flags.js";
import { emitResult } from "./output.js";

export type LedgerShowReport =
  | { scope: "all"; ledger: string; documents: { document: string; cells: number }[] }
  | { scope: "document"; ledger: string; document: string; entries: LedgerCellRecord[] };

export type LedgerResetReport = {
  ledger: string;
  document: string | null;
  removed: number;
};

// =============================================================================
// COMMAND
// =============================================================================

export function registerLedgerCommand(program: Command): void {
  const ledger = program.command("ledger").description("Inspect or reset the execution ledger");

  ledger
    .command("show")
    .description("List recorded cells, for one notebook or all of them")
    .argument("[notebook]", "Path to the .ipynb document")
    .option("--json", "Emit JSON output envelope", false)
    .action(async (notebook: string | undefined, _opts: unknown, command: Command) => {
      const ctx = contextFromCommand(command);
      await ledgerShowCommand(ctx, notebook, { useJson: resolveGlobalOptions(command).useJson });
    });

  ledger
    .command("reset")
    .description("Delete recorded executions, for one notebook or the whole ledger")
    .argument("[notebook]", "Path to the .ipynb document")
    .option("--yes", "Confirm the reset", false)
    .option("--json", "Emit JSON output envelope", false)
    .action(async (notebook: string | undefined, opts: { yes: boolean }, command: Command) => {
      const ctx = contextFromCommand(command);
      await ledgerResetCommand(ctx, notebook, {
        yes: opts.yes,
        useJson: resolveGlobalOptions(command).useJson,
      });
    });
}

// =============================================================================
// HANDLERS
// =============================================================================

export async function ledgerShowCommand(
  ctx: AppContext,
  documentPath: string | undefined,
  options: { useJson: boolean },
  ledger: ExecutionLedger = createLedger(ctx),
): Promise<LedgerShowReport> {
  let report: LedgerShowReport;
  if (documentPath === undefined) {
    const documents = [];
    for (const document of await ledger.listDocuments()) {
      documents.push({ document, cells: (await ledger.entries(document)).length });
    }
    report = { scope: "all", ledger: ledger.storePath, documents };
  } else {
    report = {
      scope: "document",
      ledger: ledger.storePath,
      document: await ledger.documentKey(documentPath),
      entries: await ledger.entries(documentPath),
    };
  }

  emitResult(report, { useJson: options.useJson }, renderLedgerShow);
  return report;
}

export async function ledgerResetCommand(
  ctx: AppContext,
  documentPath: string | undefined,
  options: { yes: boolean; useJson: boolean },
  ledger: ExecutionLedger = createLedger(ctx),
): Promise<LedgerResetReport> {
  const scope = documentPath === undefined ? "the whole ledger" : documentPath;
  if (!options.yes) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Reset not confirmed.",
      message: `This deletes every execution record for ${scope}.`,
      next: "Re-run with --yes.",
    });
  }

  const removed = await ledger.reset(documentPath);
  const report: LedgerResetReport = {
    ledger: ledger.storePath,
    document: documentPath === undefined ? null : await ledger.documentKey(documentPath),
    removed,
  };

  emitResult(report, { useJson: options.useJson }, (result) => [
    `Removed ${result.removed} ${result.removed === 1 ? "entry" : "entries"} from ${result.ledger}.`,
  ]);
  return report;
}

export function renderLedgerShow(report: LedgerShowReport): string[] {
  if (report.scope === "all") {
    if (report.documents.length === 0) return [`Ledger ${report.ledger} is empty.`];
    return report.documents.map(
      (entry) => `${entry.document}: ${entry.cells} ${entry.cells === 1 ? "cell" : "cells"}`,
    );
  }

  if (report.entries.length === 0) return [`No recorded cells for ${report.document}.`];
  return [
    report.document,
    ...report.entries.map(
      (record) => `Cell ${record.cellIndex}: ${record.entry.codeHash} at ${record.entry.recordedAt}`,
    ),
  ];
}
