import type { DependencyGraph } from "../analysis/graph.js";
import { CellIndexError, type CellIndexRange } from "../core/errors.js";
import { sortedNumbers } from "../core/utils.js";
import { codeCells, type DocumentSnapshot } from "../notebook/document.js";

import type { ReconciledStatus } from "./reconciler.js";

// =============================================================================
// PLAN
// =============================================================================

export type PlanReplayInput = {
  graph: DependencyGraph;
  statuses?: ReadonlyMap<number, ReconciledStatus>;
  targets: Iterable<number>;
  // Cells the live session already ran with their current source.
  warm: ReadonlySet<number>;
};

// Targets plus everything they depend on, minus warm cells that are still current,
// in document order (a valid topological order of the graph).
export function planReplay(input: PlanReplayInput): number[] {
  const targets = [...new Set(input.targets)];
  if (targets.length === 0) return [];

  const required = new Set<number>();
  for (const target of targets) {
    input.graph.assertKnown(target);
    required.add(target);
    for (const producer of input.graph.upstream(target)) {
      required.add(producer);
    }
  }

  const isCurrent = (index: number): boolean =>
    input.warm.has(index) && input.statuses?.get(index)?.isStale !== true;

  return sortedNumbers([...required].filter((index) => !isCurrent(index)));
}

// =============================================================================
// TARGET SELECTION
// =============================================================================

export type TargetSelection =
  | { kind: "cell"; cell: number }
  | { kind: "from"; cell: number }
  | { kind: "to"; cell: number }
  | { kind: "all" }
  | { kind: "stale" };

export function selectTargets(
  document: DocumentSnapshot,
  selection: TargetSelection,
  statuses?: ReadonlyMap<number, ReconciledStatus>,
): number[] {
  const code = codeCells(document).map((cell) => cell.index);

  switch (selection.kind) {
    case "cell": {
      const cell = requireCell(document, selection.cell);
      if (cell.kind !== "code") {
        throw new CellIndexError("CELL_NOT_CODE", selection.cell, documentRange(document));
      }
      return [cell.index];
    }
    case "from":
      requireCell(document, selection.cell);
      return code.filter((index) => index >= selection.cell);
    case "to":
      requireCell(document, selection.cell);
      return code.filter((index) => index <= selection.cell);
    case "all":
      return code;
    case "stale":
      return code.filter((index) => statuses?.get(index)?.isStale === true);
  }
}

function requireCell(document: DocumentSnapshot, index: number): DocumentSnapshot["cells"][number] {
  const cell = document.cells.find((candidate) => candidate.index === index);
  if (!cell) {
    throw new CellIndexError("CELL_OUT_OF_RANGE", index, documentRange(document));
  }
  return cell;
}

function documentRange(document: DocumentSnapshot): CellIndexRange | null {
  const indices = sortedNumbers(document.cells.map((cell) => cell.index));
  if (indices.length === 0) return null;
  return { first: indices[0], last: indices[indices.length - 1] };
}
