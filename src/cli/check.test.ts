import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  loggedLines,
  makeTemporaryDirectory,
  removeTemporaryDirectories,
  writeNotebook,
} from "../../test/helpers/notebooks.js";
import { createAppContext } from "../app/context.js";
import { CellIndexError } from "../core/errors.js";

import { checkCommand } from "./check.js";
import { depsCommand } from "./deps.js";

afterEach(() => {
  removeTemporaryDirectories();
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

function setup() {
  const directory = makeTemporaryDirectory("cellsync-check-");
  const ctx = createAppContext({ home: path.join(directory, "home"), sessionId: "test" });
  const notebook = writeNotebook(directory, [
    { source: "x = 1", executionCount: 1 },
    { source: "## Notes", kind: "markdown" },
    "print(q)",
  ]);
  return { ctx, notebook };
}

describe("checkCommand", () => {
  it("prints per-cell state and fails on undefined names", async () => {
    const { ctx, notebook } = setup();
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await checkCommand(ctx, notebook, { useJson: false });

    expect(loggedLines(logSpy)).toEqual([
      notebook,
      "Cell 0: ok",
      "Cell 2: stale (never_executed)",
      "  warning: never executed",
      "  error: uses undefined name 'q'",
      "Summary: 2 code cells, 1 error, 1 warning, 1 stale, 1 never executed.",
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("emits a JSON envelope", async () => {
    const { ctx, notebook } = setup();
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await checkCommand(ctx, notebook, { useJson: true });

    const envelope = JSON.parse(loggedLines(logSpy)[0]);
    expect(envelope.ok).toBe(true);
    expect(envelope.result.summary).toEqual({
      cells: 2,
      errors: 1,
      warnings: 1,
      stale: 1,
      neverExecuted: 1,
      consistent: false,
    });
    expect(envelope.result.executionOrder).toEqual([{ cell: 0, recordedRunOrder: 1 }]);
  });

  it("limits the report to one cell", async () => {
    const { ctx, notebook } = setup();
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    const report = await checkCommand(ctx, notebook, { cell: 0, useJson: false });

    expect(report.cells.map((status) => status.index)).toEqual([0]);
    expect(report.summary.errors).toBe(0);
    expect(process.exitCode).toBeUndefined();
  });

  it("downgrades names bound in the live session", async () => {
    const { ctx, notebook } = setup();
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    const report = await checkCommand(ctx, notebook, { liveNames: ["q"], useJson: false });

    expect(report.cells[1]?.issues.map((issue) => issue.kind)).toEqual([
      "never_executed",
      "session_only_name",
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("rejects a prose cell", async () => {
    const { ctx, notebook } = setup();

    await expect(checkCommand(ctx, notebook, { cell: 1, useJson: false })).rejects.toBeInstanceOf(
      CellIndexError,
    );
  });

  it("logs a check.summary event", async () => {
    const { ctx, notebook } = setup();
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    await checkCommand(ctx, notebook, { useJson: false });

    const logPath = path.join(ctx.home, "logs", "session-test.jsonl");
    const event = JSON.parse(fs.readFileSync(logPath, "utf8").trim());
    expect(event).toMatchObject({
      type: "check.summary",
      session_id: "test",
      document: notebook,
      payload: { cells: 2, errors: 1, warnings: 1, stale: 1, never_executed: 1 },
    });
  });
});

describe("depsCommand", () => {
  it("prints edges and unresolved names", async () => {
    const directory = makeTemporaryDirectory("cellsync-deps-");
    const ctx = createAppContext({ home: path.join(directory, "home") });
    const notebook = writeNotebook(directory, ["a = 1\nb = 2", "c = a + b", "print(c, d)"]);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await depsCommand(ctx, notebook, { useJson: false });

    expect(loggedLines(logSpy)).toEqual([
      notebook,
      "0 -> 1: a, b",
      "1 -> 2: c",
      "Cell 2 reads names no earlier cell defines: d",
    ]);
  });

  it("describes one cell's neighbourhood", async () => {
    const directory = makeTemporaryDirectory("cellsync-deps-");
    const ctx = createAppContext({ home: path.join(directory, "home") });
    const notebook = writeNotebook(directory, ["a = 1\nb = 2", "c = a + b", "print(c, d)"]);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await depsCommand(ctx, notebook, { cell: 1, useJson: false });

    expect(loggedLines(logSpy)).toEqual([
      notebook,
      "Cell 1",
      "  defines: c",
      "  reads: a, b",
      "  upstream: 0",
      "  downstream: 2",
      "  unresolved: (none)",
    ]);
  });
});
