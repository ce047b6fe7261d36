import { analyzeCell, type AnalysisNote, type CellAnalysis } from "../analysis/analyzer.js";
import { buildBuiltinSet } from "../analysis/builtins.js";
import { buildDependencyGraph, type DependencyGraph } from "../analysis/graph.js";
import type { ProjectConfig } from "../core/config.js";
import { codeCells, type DocumentAdapter, type DocumentSnapshot } from "../notebook/document.js";
import { IpynbDocumentAdapter } from "../notebook/ipynb.js";
import type { ExecutionLedger, LedgerSnapshot } from "../state/ledger.js";
import {
  reconcile,
  summarizeStatuses,
  type ReconcileOptions,
  type ReconciledStatus,
  type StatusSummary,
} from "../state/reconciler.js";

import { createLedger, type AppContext } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type DocumentInspection = {
  document: DocumentSnapshot;
  analyses: Map<number, CellAnalysis>;
  graph: DependencyGraph;
  ledgerSnapshot: LedgerSnapshot;
  reconcileOptions: ReconcileOptions;
  statuses: Map<number, ReconciledStatus>;
  summary: StatusSummary;
};

export type InspectOptions = {
  liveNames?: readonly string[] | null;
  adapter?: DocumentAdapter;
  ledger?: ExecutionLedger;
};

// =============================================================================
// PIPELINE
// =============================================================================

// document -> analyzer -> graph; graph + ledger snapshot + document -> statuses.
export async function inspectDocument(
  ctx: AppContext,
  documentPath: string,
  options: InspectOptions = {},
): Promise<DocumentInspection> {
  const adapter = options.adapter ?? new IpynbDocumentAdapter();
  const ledger = options.ledger ?? createLedger(ctx);

  const document = await adapter.load(documentPath);
  const analyses = analyzeDocument(document, ctx.config);
  const graph = buildDependencyGraph(
    [...analyses].map(([index, analysis]) => ({ index, analysis })),
  );
  const ledgerSnapshot = await ledger.snapshot(document.path);
  const reconcileOptions = reconcileOptionsFor(ctx.config, analyses, options.liveNames ?? null);
  const statuses = reconcile({ document, graph, ledger: ledgerSnapshot, options: reconcileOptions });

  return {
    document,
    analyses,
    graph,
    ledgerSnapshot,
    reconcileOptions,
    statuses,
    summary: summarizeStatuses(statuses),
  };
}

export function analyzeDocument(
  document: DocumentSnapshot,
  config: ProjectConfig,
): Map<number, CellAnalysis> {
  const builtins = buildBuiltinSet(config.extra_builtins);
  const analyses = new Map<number, CellAnalysis>();
  for (const cell of codeCells(document)) {
    analyses.set(
      cell.index,
      analyzeCell(cell.source, { builtins, directivePrefixes: config.directive_prefixes }),
    );
  }
  return analyses;
}

export function reconcileOptionsFor(
  config: ProjectConfig,
  analyses: ReadonlyMap<number, CellAnalysis>,
  liveNames: readonly string[] | null,
): ReconcileOptions {
  const notes = new Map<number, AnalysisNote | null>();
  for (const [index, analysis] of analyses) {
    notes.set(index, analysis.note);
  }

  return {
    ambientNames: config.ambient_names,
    ambientPatterns: config.ambient_patterns,
    liveNames,
    notes,
  };
}
