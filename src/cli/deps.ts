import type { Command } from "commander";

import type { AppContext } from "../app/context.js";
import { inspectDocument, type InspectOptions } from "../app/inspect.js";
import type { DependencyEdge } from "../analysis/graph.js";
import { selectTargets } from "../state/replay-planner.js";

import { contextFromCommand, parseCellIndex, resolveGlobalOptions } from "./flags.js";
import { emitResult } from "./output.js";

export type CellDependencies = {
  index: number;
  definitions: string[];
  references: string[];
  unresolved: string[];
  directUpstream: number[];
  directDownstream: number[];
  upstream: number[];
  downstream: number[];
};

export type DepsReport = {
  document: string;
  focus: number | null;
  edges: DependencyEdge[];
  cells: CellDependencies[];
};

export function registerDepsCommand(program: Command): void {
  program
    .command("deps")
    .description("Show the producer -> consumer graph between code cells")
    .argument("<notebook>", "Path to the .ipynb document")
    .option("--cell <n>", "Only show this cell's neighbourhood", parseCellIndex)
    .option("--json", "Emit JSON output envelope", false)
    .action(async (notebook: string, opts: { cell?: number }, command: Command) => {
      const ctx = contextFromCommand(command);
      await depsCommand(ctx, notebook, {
        cell: opts.cell,
        useJson: resolveGlobalOptions(command).useJson,
      });
    });
}

export async function depsCommand(
  ctx: AppContext,
  documentPath: string,
  options: { cell?: number; useJson: boolean },
  deps: InspectOptions = {},
): Promise<DepsReport> {
  const { document, analyses, graph } = await inspectDocument(ctx, documentPath, deps);

  const indices =
    options.cell === undefined
      ? [...analyses.keys()]
      : selectTargets(document, { kind: "cell", cell: options.cell });

  const cells = indices.map((index): CellDependencies => {
    const analysis = analyses.get(index);
    return {
      index,
      definitions: analysis?.definitions ?? [],
      references: analysis?.references ?? [],
      unresolved: graph.unresolvedReferences(index),
      directUpstream: graph.directUpstream(index),
      directDownstream: graph.directDownstream(index),
      upstream: graph.upstream(index),
      downstream: graph.downstream(index),
    };
  });

  const edges =
    options.cell === undefined
      ? graph.edges()
      : graph.edges().filter((edge) => edge.from === options.cell || edge.to === options.cell);

  const report: DepsReport = {
    document: document.path,
    focus: options.cell ?? null,
    edges,
    cells,
  };
  emitResult(report, { useJson: options.useJson }, renderDepsReport);
  return report;
}

export function renderDepsReport(report: DepsReport): string[] {
  const lines = [report.document];

  const [cell] = report.cells;
  if (report.focus !== null && cell) {
    lines.push(`Cell ${cell.index}`);
    lines.push(`  defines: ${listOrNone(cell.definitions)}`);
    lines.push(`  reads: ${listOrNone(cell.references)}`);
    lines.push(`  upstream: ${listOrNone(cell.upstream.map(String))}`);
    lines.push(`  downstream: ${listOrNone(cell.downstream.map(String))}`);
    lines.push(`  unresolved: ${listOrNone(cell.unresolved)}`);
    return lines;
  }

  if (report.edges.length === 0) {
    lines.push("No dependencies between cells.");
  }
  for (const edge of report.edges) {
    lines.push(`${edge.from} -> ${edge.to}: ${edge.names.join(", ")}`);
  }
  for (const entry of report.cells) {
    if (entry.unresolved.length > 0) {
      lines.push(`Cell ${entry.index} reads names no earlier cell defines: ${entry.unresolved.join(", ")}`);
    }
  }
  return lines;
}

function listOrNone(values: string[]): string {
  return values.length === 0 ? "(none)" : values.join(", ");
}
