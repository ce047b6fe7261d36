import { describe, expect, it } from "vitest";

import { analyzeCell } from "../analysis/analyzer.js";
import { buildDependencyGraph } from "../analysis/graph.js";
import type { Cell, DocumentSnapshot } from "../notebook/document.js";

import { LedgerSnapshot, codeHash, type LedgerEntry } from "./ledger.js";
import {
  describeIssue,
  reconcile,
  recordedExecutionOrder,
  summarizeStatuses,
  type ReconcileOptions,
} from "./reconciler.js";

// =============================================================================
// HELPERS
// =============================================================================

type CellInput = string | { source: string; runOrder?: number | null; kind?: Cell["kind"] };

const RECORDED_AT = "2026-01-02T03:04:05.000Z";

function makeDocument(inputs: CellInput[]): DocumentSnapshot {
  return {
    path: "/work/analysis.ipynb",
    cells: inputs.map((input, index) => {
      const cell = typeof input === "string" ? { source: input } : input;
      return {
        index,
        kind: cell.kind ?? "code",
        source: cell.source,
        recordedRunOrder: cell.runOrder ?? null,
        outputFingerprints: [],
      };
    }),
  };
}

function ledgerWith(entries: Record<number, string>): LedgerSnapshot {
  const cells = new Map<number, LedgerEntry>();
  for (const [index, source] of Object.entries(entries)) {
    cells.set(Number(index), { codeHash: codeHash(source), recordedAt: RECORDED_AT });
  }
  return new LedgerSnapshot("/work/analysis.ipynb", cells);
}

function run(document: DocumentSnapshot, ledger: LedgerSnapshot, options?: ReconcileOptions) {
  const graph = buildDependencyGraph(
    document.cells
      .filter((cell) => cell.kind === "code")
      .map((cell) => ({ index: cell.index, analysis: analyzeCell(cell.source) })),
  );
  return reconcile({ document, graph, ledger, options });
}

// =============================================================================
// TESTS
// =============================================================================

describe("reconcile", () => {
  it("reports an undefined name as an error citing the cell", () => {
    const statuses = run(makeDocument(["print(q)"]), ledgerWith({}));

    expect(statuses.get(0)?.issues).toEqual([
      { kind: "never_executed", severity: "warning", cellIndex: 0 },
      { kind: "undefined_name", severity: "error", cellIndex: 0, name: "q", definedLaterIn: null },
    ]);
  });

  it("points at a later definer of an undefined name", () => {
    const statuses = run(
      makeDocument([
        { source: "print(q)", runOrder: 1 },
        { source: "q = 1", runOrder: 2 },
      ]),
      ledgerWith({}),
    );

    expect(statuses.get(0)?.issues).toEqual([
      { kind: "undefined_name", severity: "error", cellIndex: 0, name: "q", definedLaterIn: 1 },
    ]);
  });

  it("treats a cell as executed when either the document or the ledger says so", () => {
    const statuses = run(
      makeDocument([{ source: "a = 1", runOrder: 3 }, "b = 2", "c = 3"]),
      ledgerWith({ 1: "b = 2" }),
    );

    expect(statuses.get(0)).toMatchObject({
      everExecuted: true,
      executedVia: { document: true, ledger: false },
      isStale: false,
    });
    expect(statuses.get(1)).toMatchObject({
      everExecuted: true,
      executedVia: { document: false, ledger: true },
      isStale: false,
    });
    expect(statuses.get(2)).toMatchObject({
      everExecuted: false,
      isStale: true,
      staleReason: "never_executed",
    });
  });

  it("reports clean cells as not stale", () => {
    const statuses = run(makeDocument(["x = 1", "y = x"]), ledgerWith({ 0: "x = 1", 1: "y = x" }));

    expect(statuses.get(1)).toEqual({
      index: 1,
      everExecuted: true,
      executedVia: { document: false, ledger: true },
      isStale: false,
      staleReason: null,
      issues: [],
      upstream: [0],
      downstream: [],
      notes: [],
    });
  });

  it("propagates an edit downstream and names the root cell", () => {
    const statuses = run(
      makeDocument(["x = 1", "y = x", "z = y"]),
      ledgerWith({ 0: "x = 0", 1: "y = x", 2: "z = y" }),
    );

    expect(statuses.get(0)?.issues).toEqual([
      {
        kind: "code_modified",
        severity: "warning",
        cellIndex: 0,
        recordedHash: codeHash("x = 0"),
        currentHash: codeHash("x = 1"),
      },
    ]);
    expect(statuses.get(1)?.issues).toEqual([
      {
        kind: "stale_upstream",
        severity: "warning",
        cellIndex: 1,
        upstreamCell: 0,
        name: "x",
        rootCell: 0,
      },
    ]);
    expect(statuses.get(2)).toMatchObject({
      isStale: true,
      staleReason: "stale_upstream",
      issues: [{ kind: "stale_upstream", upstreamCell: 1, name: "y", rootCell: 0 }],
    });
  });

  it("cites the lowest stale producer and the lexically first shared name", () => {
    const statuses = run(
      makeDocument(["b = 1\na = 2", "c = 3", "print(a, b, c)"]),
      ledgerWith({ 2: "print(a, b, c)" }),
    );

    expect(statuses.get(2)?.issues).toEqual([
      {
        kind: "stale_upstream",
        severity: "warning",
        cellIndex: 2,
        upstreamCell: 0,
        name: "a",
        rootCell: 0,
      },
    ]);
  });

  it("flags a consumer that ran before its producer", () => {
    const statuses = run(
      makeDocument([
        { source: "x = 1", runOrder: 5 },
        { source: "y = x", runOrder: 2 },
      ]),
      ledgerWith({}),
    );

    expect(statuses.get(1)?.issues).toEqual([
      {
        kind: "out_of_order",
        severity: "warning",
        cellIndex: 1,
        recordedRunOrder: 2,
        producers: [{ cell: 0, recordedRunOrder: 5 }],
      },
    ]);
    expect(statuses.get(1)?.isStale).toBe(false);
  });

  it("softens ambient, pattern-matched and session-only names", () => {
    const statuses = run(
      makeDocument([{ source: "print(In, _i3, frame)", runOrder: 1 }]),
      ledgerWith({}),
      { liveNames: ["frame"] },
    );

    expect(statuses.get(0)?.issues).toEqual([
      {
        kind: "possibly_undefined_name",
        severity: "warning",
        cellIndex: 0,
        name: "_i3",
        pattern: "_i*",
      },
      { kind: "session_only_name", severity: "warning", cellIndex: 0, name: "frame" },
    ]);
  });

  it("skips prose cells and copies analysis notes", () => {
    const document = makeDocument([{ source: "# Title", kind: "prose" }, "x = (", "y = 1"]);
    const statuses = run(document, ledgerWith({}), {
      notes: new Map([[1, { kind: "parse_failed", detail: "'(' was never closed (line 1)" }]]),
    });

    expect([...statuses.keys()]).toEqual([1, 2]);
    expect(statuses.get(1)?.notes).toEqual([
      { kind: "parse_failed", detail: "'(' was never closed (line 1)" },
    ]);
    expect(statuses.get(2)?.notes).toEqual([]);
  });

  it("is idempotent", () => {
    const document = makeDocument([
      { source: "x = 1", runOrder: 4 },
      { source: "y = x + z", runOrder: 1 },
      "print(y)",
    ]);
    const ledger = ledgerWith({ 0: "x = 2" });

    expect(run(document, ledger)).toEqual(run(document, ledger));
  });
});

describe("summarizeStatuses", () => {
  it("counts issues and cells", () => {
    const statuses = run(
      makeDocument([{ source: "x = 1", runOrder: 1 }, "print(x, q)"]),
      ledgerWith({}),
    );

    expect(summarizeStatuses(statuses)).toEqual({
      cells: 2,
      errors: 1,
      warnings: 1,
      stale: 1,
      neverExecuted: 1,
      consistent: false,
    });
  });

  it("stays consistent when only warnings remain", () => {
    const statuses = run(makeDocument([{ source: "x = 1", runOrder: 1 }, "print(x)"]), ledgerWith({}));

    expect(summarizeStatuses(statuses)).toEqual({
      cells: 2,
      errors: 0,
      warnings: 1,
      stale: 1,
      neverExecuted: 1,
      consistent: true,
    });
  });
});

describe("recordedExecutionOrder", () => {
  it("lists code cells by recorded counter", () => {
    const document = makeDocument([
      { source: "a = 1", runOrder: 7 },
      { source: "notes", kind: "prose" },
      { source: "b = 2", runOrder: 2 },
      "c = 3",
    ]);

    expect(recordedExecutionOrder(document)).toEqual([
      { cell: 2, recordedRunOrder: 2 },
      { cell: 0, recordedRunOrder: 7 },
    ]);
  });
});

describe("describeIssue", () => {
  it("renders a stale upstream with its root cause", () => {
    expect(
      describeIssue({
        kind: "stale_upstream",
        severity: "warning",
        cellIndex: 3,
        upstreamCell: 2,
        name: "df",
        rootCell: 0,
      }),
    ).toBe("depends on stale cell 2 via 'df' (root cause: cell 0)");
  });
});
