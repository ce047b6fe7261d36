/*
Purpose: merge document counters, ledger entries and live-session names into one status per
code cell, and classify what is wrong with each.
Assumptions: the graph was built from the same document snapshot; the ledger view was taken
once for this invocation. reconcile() is pure: same inputs, same map.
Usage: const statuses = reconcile({ document, graph, ledger: await ledger.snapshot(path) });
*/

import { minimatch } from "minimatch";

import type { AnalysisNote } from "../analysis/analyzer.js";
import type { DependencyGraph } from "../analysis/graph.js";
import { DEFAULT_AMBIENT_NAMES, DEFAULT_AMBIENT_PATTERNS } from "../core/config.js";
import { codeCells, type Cell, type DocumentSnapshot } from "../notebook/document.js";

import { codeHash, type LedgerView } from "./ledger.js";

// =============================================================================
// TYPES
// =============================================================================

export type IssueSeverity = "error" | "warning";

export type StalenessKind = "code_modified" | "stale_upstream" | "never_executed";

export type CellIssue =
  | {
      kind: "code_modified";
      severity: "warning";
      cellIndex: number;
      recordedHash: string;
      currentHash: string;
    }
  | {
      kind: "stale_upstream";
      severity: "warning";
      cellIndex: number;
      upstreamCell: number;
      name: string | null;
      rootCell: number | null;
    }
  | { kind: "never_executed"; severity: "warning"; cellIndex: number }
  | {
      kind: "out_of_order";
      severity: "warning";
      cellIndex: number;
      recordedRunOrder: number;
      producers: { cell: number; recordedRunOrder: number }[];
    }
  | {
      kind: "undefined_name";
      severity: "error";
      cellIndex: number;
      name: string;
      definedLaterIn: number | null;
    }
  | {
      kind: "possibly_undefined_name";
      severity: "warning";
      cellIndex: number;
      name: string;
      pattern: string;
    }
  | { kind: "session_only_name"; severity: "warning"; cellIndex: number; name: string };

export type IssueKind = CellIssue["kind"];

export type ReconciledStatus = {
  index: number;
  everExecuted: boolean;
  executedVia: { document: boolean; ledger: boolean };
  isStale: boolean;
  staleReason: StalenessKind | null;
  issues: CellIssue[];
  upstream: number[];
  downstream: number[];
  notes: AnalysisNote[];
};

export type ReconcileOptions = {
  ambientNames?: Iterable<string>;
  ambientPatterns?: readonly string[];
  // Names bound in a live session, when one is available.
  liveNames?: Iterable<string> | null;
  // Analysis notes per cell index, copied onto the statuses.
  notes?: ReadonlyMap<number, AnalysisNote | null>;
};

export type ReconcileInput = {
  document: DocumentSnapshot;
  graph: DependencyGraph;
  ledger: LedgerView;
  options?: ReconcileOptions;
};

const STALENESS_KINDS: readonly StalenessKind[] = ["code_modified", "stale_upstream", "never_executed"];

// =============================================================================
// RECONCILE
// =============================================================================

export function reconcile(input: ReconcileInput): Map<number, ReconciledStatus> {
  const { document, graph, ledger } = input;
  const options = input.options ?? {};
  const ambientNames = new Set(options.ambientNames ?? DEFAULT_AMBIENT_NAMES);
  const ambientPatterns = options.ambientPatterns ?? DEFAULT_AMBIENT_PATTERNS;
  const liveNames = options.liveNames ? new Set(options.liveNames) : null;

  const cells = codeCells(document).sort((a, b) => a.index - b.index);
  const cellByIndex = new Map(cells.map((cell) => [cell.index, cell]));
  const statuses = new Map<number, ReconciledStatus>();
  // Cells stale for their own reasons (edited or never run), as opposed to inherited.
  const ownStale = new Set<number>();

  for (const cell of cells) {
    const executedVia = {
      document: cell.recordedRunOrder !== null,
      ledger: ledger.wasEverExecuted(cell.index),
    };
    const everExecuted = executedVia.document || executedVia.ledger;
    const upstream = graph.upstream(cell.index);
    const issues: CellIssue[] = [];

    const modified = codeModifiedIssue(cell, ledger);
    if (modified) issues.push(modified);

    const inherited = staleUpstreamIssue(cell.index, graph, statuses, ownStale, upstream);
    if (inherited) issues.push(inherited);

    if (!everExecuted) {
      issues.push({ kind: "never_executed", severity: "warning", cellIndex: cell.index });
    }

    if (modified || !everExecuted) {
      ownStale.add(cell.index);
    }

    const outOfOrder = outOfOrderIssue(cell, upstream, cellByIndex);
    if (outOfOrder) issues.push(outOfOrder);

    for (const name of graph.unresolvedReferences(cell.index)) {
      const issue = classifyUnresolvedName(cell.index, name, {
        graph,
        ambientNames,
        ambientPatterns,
        liveNames,
      });
      if (issue) issues.push(issue);
    }

    const staleReason =
      STALENESS_KINDS.find((kind) => issues.some((issue) => issue.kind === kind)) ?? null;
    const note = options.notes?.get(cell.index) ?? null;

    statuses.set(cell.index, {
      index: cell.index,
      everExecuted,
      executedVia,
      isStale: staleReason !== null,
      staleReason,
      issues,
      upstream,
      downstream: graph.downstream(cell.index),
      notes: note ? [note] : [],
    });
  }

  return statuses;
}

// =============================================================================
// CLASSIFIERS
// =============================================================================

function codeModifiedIssue(cell: Cell, ledger: LedgerView): CellIssue | null {
  const entry = ledger.entry(cell.index);
  if (!entry || !ledger.isStale(cell.index, cell.source)) return null;
  return {
    kind: "code_modified",
    severity: "warning",
    cellIndex: cell.index,
    recordedHash: entry.codeHash,
    currentHash: codeHash(cell.source),
  };
}

function staleUpstreamIssue(
  index: number,
  graph: DependencyGraph,
  statuses: ReadonlyMap<number, ReconciledStatus>,
  ownStale: ReadonlySet<number>,
  upstream: readonly number[],
): CellIssue | null {
  // directUpstream is ascending, so the first stale one is the lowest.
  const staleProducer = graph
    .directUpstream(index)
    .find((producer) => statuses.get(producer)?.isStale === true);
  if (staleProducer === undefined) return null;

  return {
    kind: "stale_upstream",
    severity: "warning",
    cellIndex: index,
    upstreamCell: staleProducer,
    name: graph.edgeNames(staleProducer, index)[0] ?? null,
    rootCell: upstream.find((cell) => ownStale.has(cell)) ?? null,
  };
}

function outOfOrderIssue(
  cell: Cell,
  upstream: readonly number[],
  cellByIndex: ReadonlyMap<number, Cell>,
): CellIssue | null {
  const own = cell.recordedRunOrder;
  if (own === null) return null;

  const producers: { cell: number; recordedRunOrder: number }[] = [];
  for (const producerIndex of upstream) {
    const recorded = cellByIndex.get(producerIndex)?.recordedRunOrder ?? null;
    if (recorded !== null && recorded > own) {
      producers.push({ cell: producerIndex, recordedRunOrder: recorded });
    }
  }

  if (producers.length === 0) return null;
  return {
    kind: "out_of_order",
    severity: "warning",
    cellIndex: cell.index,
    recordedRunOrder: own,
    producers,
  };
}

type NameContext = {
  graph: DependencyGraph;
  ambientNames: ReadonlySet<string>;
  ambientPatterns: readonly string[];
  liveNames: ReadonlySet<string> | null;
};

function classifyUnresolvedName(
  cellIndex: number,
  name: string,
  context: NameContext,
): CellIssue | null {
  if (context.ambientNames.has(name)) return null;

  if (context.liveNames?.has(name)) {
    return { kind: "session_only_name", severity: "warning", cellIndex, name };
  }

  const pattern = context.ambientPatterns.find((candidate) => minimatch(name, candidate));
  if (pattern !== undefined) {
    return { kind: "possibly_undefined_name", severity: "warning", cellIndex, name, pattern };
  }

  const later = context.graph.definersOf(name).find((definer) => definer > cellIndex);
  return {
    kind: "undefined_name",
    severity: "error",
    cellIndex,
    name,
    definedLaterIn: later ?? null,
  };
}

// =============================================================================
// SUMMARIES
// =============================================================================

export type StatusSummary = {
  cells: number;
  errors: number;
  warnings: number;
  stale: number;
  neverExecuted: number;
  consistent: boolean;
};

export function summarizeStatuses(statuses: ReadonlyMap<number, ReconciledStatus>): StatusSummary {
  let errors = 0;
  let warnings = 0;
  let stale = 0;
  let neverExecuted = 0;

  for (const status of statuses.values()) {
    if (status.isStale) stale += 1;
    if (!status.everExecuted) neverExecuted += 1;
    for (const issue of status.issues) {
      if (issue.severity === "error") errors += 1;
      else warnings += 1;
    }
  }

  return {
    cells: statuses.size,
    errors,
    warnings,
    stale,
    neverExecuted,
    consistent: errors === 0,
  };
}

// Code cells with a recorded counter, in the order the document says they ran.
export function recordedExecutionOrder(
  document: DocumentSnapshot,
): { cell: number; recordedRunOrder: number }[] {
  const ran: { cell: number; recordedRunOrder: number }[] = [];
  for (const cell of codeCells(document)) {
    if (cell.recordedRunOrder !== null) {
      ran.push({ cell: cell.index, recordedRunOrder: cell.recordedRunOrder });
    }
  }
  return ran.sort((a, b) => a.recordedRunOrder - b.recordedRunOrder || a.cell - b.cell);
}

export function describeIssue(issue: CellIssue): string {
  switch (issue.kind) {
    case "code_modified":
      return "code modified since last run";
    case "stale_upstream": {
      const via = issue.name ? ` via '${issue.name}'` : "";
      const root =
        issue.rootCell !== null && issue.rootCell !== issue.upstreamCell
          ? ` (root cause: cell ${issue.rootCell})`
          : "";
      return `depends on stale cell ${issue.upstreamCell}${via}${root}`;
    }
    case "never_executed":
      return "never executed";
    case "out_of_order": {
      const cited = issue.producers
        .map((producer) => `cell ${producer.cell} [${producer.recordedRunOrder}]`)
        .join(", ");
      return `executed out of order: ran as [${issue.recordedRunOrder}] before upstream ${cited}`;
    }
    case "undefined_name":
      return issue.definedLaterIn === null
        ? `uses undefined name '${issue.name}'`
        : `uses '${issue.name}' before it is defined in cell ${issue.definedLaterIn}`;
    case "possibly_undefined_name":
      return `uses '${issue.name}', which may come from the session (matches ${issue.pattern})`;
    case "session_only_name":
      return `uses '${issue.name}', which exists only in the live session`;
  }
}
