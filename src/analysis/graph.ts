// Dependency graph across the code cells of one document.
// Purpose: link each reference to the latest earlier cell defining it and answer
// upstream/downstream queries. Assumes cells are scanned in ascending index order.

import { CellIndexError, type CellIndexRange } from "../core/errors.js";
import { sortedNumbers } from "../core/utils.js";

import type { CellAnalysis } from "./analyzer.js";

export type GraphCell = {
  index: number;
  analysis: Pick<CellAnalysis, "definitions" | "references">;
};

export type DependencyEdge = {
  from: number;
  to: number;
  names: string[];
};

type Direction = "up" | "down";

// =============================================================================
// GRAPH
// =============================================================================

export class DependencyGraph {
  private readonly edgeByPair = new Map<string, DependencyEdge>();
  private readonly direct = {
    up: new Map<number, Set<number>>(),
    down: new Map<number, Set<number>>(),
  };
  private readonly closure = {
    up: new Map<number, number[]>(),
    down: new Map<number, number[]>(),
  };

  constructor(
    readonly indices: readonly number[],
    edges: DependencyEdge[],
    private readonly unresolved: Map<number, string[]>,
    private readonly definers: Map<string, number[]>,
  ) {
    for (const index of indices) {
      this.direct.up.set(index, new Set());
      this.direct.down.set(index, new Set());
    }
    for (const edge of edges) {
      this.edgeByPair.set(pairKey(edge.from, edge.to), edge);
      this.direct.up.get(edge.to)?.add(edge.from);
      this.direct.down.get(edge.from)?.add(edge.to);
    }
  }

  has(index: number): boolean {
    return this.direct.up.has(index);
  }

  edges(): DependencyEdge[] {
    return [...this.edgeByPair.values()].sort((a, b) => a.from - b.from || a.to - b.to);
  }

  edgeNames(from: number, to: number): string[] {
    return this.edgeByPair.get(pairKey(from, to))?.names ?? [];
  }

  directUpstream(index: number): number[] {
    return sortedNumbers(this.neighbours(index, "up"));
  }

  directDownstream(index: number): number[] {
    return sortedNumbers(this.neighbours(index, "down"));
  }

  upstream(index: number): number[] {
    return this.transitive(index, "up");
  }

  downstream(index: number): number[] {
    return this.transitive(index, "down");
  }

  // References no earlier cell defines.
  unresolvedReferences(index: number): string[] {
    this.assertKnown(index);
    return this.unresolved.get(index) ?? [];
  }

  definersOf(name: string): number[] {
    return this.definers.get(name) ?? [];
  }

  validRange(): CellIndexRange | null {
    if (this.indices.length === 0) return null;
    return { first: this.indices[0], last: this.indices[this.indices.length - 1] };
  }

  assertKnown(index: number): void {
    if (!this.has(index)) {
      throw new CellIndexError("CELL_OUT_OF_RANGE", index, this.validRange());
    }
  }

  private neighbours(index: number, direction: Direction): Set<number> {
    const found = this.direct[direction].get(index);
    if (!found) {
      throw new CellIndexError("CELL_OUT_OF_RANGE", index, this.validRange());
    }
    return found;
  }

  private transitive(index: number, direction: Direction): number[] {
    const cached = this.closure[direction].get(index);
    if (cached) return cached;

    const seen = new Set<number>();
    const queue = [...this.neighbours(index, direction)];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.neighbours(next, direction));
    }

    const result = sortedNumbers(seen);
    this.closure[direction].set(index, result);
    return result;
  }
}

// =============================================================================
// BUILD
// =============================================================================

export function buildDependencyGraph(cells: GraphCell[]): DependencyGraph {
  const ordered = [...cells].sort((a, b) => a.index - b.index);
  for (let i = 1; i < ordered.length; i++) {
    if (ordered[i].index === ordered[i - 1].index) {
      throw new CellIndexError("CELL_DUPLICATE", ordered[i].index, {
        first: ordered[0].index,
        last: ordered[ordered.length - 1].index,
      });
    }
  }

  const latestDefiner = new Map<string, number>();
  const definers = new Map<string, number[]>();
  const unresolved = new Map<number, string[]>();
  const edges = new Map<string, DependencyEdge>();

  for (const cell of ordered) {
    const missing: string[] = [];

    for (const name of cell.analysis.references) {
      const producer = latestDefiner.get(name);
      if (producer === undefined) {
        missing.push(name);
        continue;
      }
      const key = pairKey(producer, cell.index);
      const edge = edges.get(key) ?? { from: producer, to: cell.index, names: [] };
      if (!edge.names.includes(name)) edge.names.push(name);
      edges.set(key, edge);
    }

    // Definitions update the map only after this cell's references are matched.
    for (const name of cell.analysis.definitions) {
      latestDefiner.set(name, cell.index);
      const list = definers.get(name) ?? [];
      list.push(cell.index);
      definers.set(name, list);
    }

    unresolved.set(cell.index, [...new Set(missing)].sort());
  }

  for (const edge of edges.values()) {
    edge.names.sort();
  }

  return new DependencyGraph(
    ordered.map((cell) => cell.index),
    [...edges.values()],
    unresolved,
    definers,
  );
}

function pairKey(from: number, to: number): string {
  return `${from}->${to}`;
}
