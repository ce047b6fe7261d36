import fs from "node:fs";
import fsPromises from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { LedgerPersistError } from "../core/errors.js";

import { ExecutionLedger, codeHash } from "./ledger.js";

const temporaryDirectories: string[] = [];

afterEach(() => {
  vi.restoreAllMocks();
  for (const directoryPath of temporaryDirectories) {
    fs.rmSync(directoryPath, { recursive: true, force: true });
  }
  temporaryDirectories.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

const FIXED_NOW = new Date("2026-01-02T03:04:05.000Z");

function makeTemporaryDirectory(): string {
  const directoryPath = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "ledger-")));
  temporaryDirectories.push(directoryPath);
  return directoryPath;
}

function createLedger(
  directory: string,
  overrides: { warn?: (message: string) => void; retries?: number; staleAfterMs?: number } = {},
): ExecutionLedger {
  return new ExecutionLedger({
    storePath: path.join(directory, "home", "ledger.json"),
    warn: overrides.warn ?? (() => undefined),
    now: () => FIXED_NOW,
    lock: {
      retries: overrides.retries ?? 400,
      retryDelayMs: 2,
      staleAfterMs: overrides.staleAfterMs ?? 30_000,
    },
  });
}

function readStoreJson(ledger: ExecutionLedger): unknown {
  return JSON.parse(fs.readFileSync(ledger.storePath, "utf8"));
}

// =============================================================================
// TESTS
// =============================================================================

describe("ExecutionLedger", () => {
  it("round-trips a recorded cell and normalizes line endings in the hash", async () => {
    const directory = makeTemporaryDirectory();
    const ledger = createLedger(directory);
    const notebook = path.join(directory, "analysis.ipynb");

    const entry = await ledger.record(notebook, 2, "x = 1\ny = 2");

    expect(entry).toEqual({ codeHash: codeHash("x = 1\ny = 2"), recordedAt: FIXED_NOW.toISOString() });
    expect(await ledger.wasEverExecuted(notebook, 2)).toBe(true);
    expect(await ledger.wasEverExecuted(notebook, 1)).toBe(false);
    expect(await ledger.isStale(notebook, 2, "x = 1\r\ny = 2")).toBe(false);
    expect(await ledger.isStale(notebook, 2, "x = 1\ny = 3")).toBe(true);
    expect(await ledger.isStale(notebook, 1, "x = 1\ny = 2")).toBe(true);
  });

  it("writes the versioned JSON layout", async () => {
    const directory = makeTemporaryDirectory();
    const ledger = createLedger(directory);
    const notebook = path.join(directory, "analysis.ipynb");

    await ledger.record(notebook, 0, "import os");

    expect(readStoreJson(ledger)).toEqual({
      schemaVersion: 1,
      updatedAt: FIXED_NOW.toISOString(),
      documents: {
        [notebook]: {
          cells: {
            "0": { codeHash: codeHash("import os"), recordedAt: FIXED_NOW.toISOString() },
          },
        },
      },
    });
  });

  it("treats different spellings of one document as the same key", async () => {
    const directory = makeTemporaryDirectory();
    const ledger = createLedger(directory);
    const notebook = path.join(directory, "analysis.ipynb");
    fs.writeFileSync(notebook, "{}");
    fs.mkdirSync(path.join(directory, "nested"));
    const linked = path.join(directory, "linked.ipynb");
    fs.symlinkSync(notebook, linked);

    await ledger.record(path.join(directory, "nested", "..", "analysis.ipynb"), 0, "a = 1");

    expect(await ledger.wasEverExecuted(notebook, 0)).toBe(true);
    expect(await ledger.wasEverExecuted(linked, 0)).toBe(true);
    expect(await ledger.listDocuments()).toEqual([notebook]);
  });

  it("keys a cwd-relative spelling the same as the absolute path", async () => {
    const directory = makeTemporaryDirectory();
    const ledger = createLedger(directory);
    const notebook = path.join(directory, "nb.ipynb");
    fs.writeFileSync(notebook, "{}");
    const relative = `.${path.sep}${path.relative(process.cwd(), notebook)}`;

    await ledger.record(relative, 0, "a = 1");

    expect(await ledger.isStale(notebook, 0, "a = 1")).toBe(false);
    expect(await ledger.documentKey(relative)).toBe(notebook);
  });

  it("reports an unresolvable document path as a persist failure", async () => {
    const directory = makeTemporaryDirectory();
    const ledger = createLedger(directory);
    const notebook = path.join(directory, "analysis.ipynb");
    vi.spyOn(fsPromises, "realpath").mockRejectedValueOnce(
      Object.assign(new Error("permission denied"), { code: "EACCES" }),
    );

    const failure = ledger.record(notebook, 0, "a = 1");
    await expect(failure).rejects.toBeInstanceOf(LedgerPersistError);
    await expect(failure).rejects.toMatchObject({
      code: "LEDGER_PERSIST_FAILED",
      documentKey: notebook,
      cellIndex: 0,
    });
    expect(await ledger.wasEverExecuted(notebook, 0)).toBe(false);
  });

  it("leaves the previous store intact when the rename fails", async () => {
    const directory = makeTemporaryDirectory();
    const ledger = createLedger(directory);
    const notebook = path.join(directory, "analysis.ipynb");
    await ledger.record(notebook, 0, "a = 1");
    const before = fs.readFileSync(ledger.storePath, "utf8");

    vi.spyOn(fsPromises, "rename").mockRejectedValueOnce(new Error("disk full"));

    const failure = ledger.record(notebook, 1, "b = a");
    await expect(failure).rejects.toBeInstanceOf(LedgerPersistError);
    await expect(failure).rejects.toMatchObject({
      code: "LEDGER_PERSIST_FAILED",
      documentKey: notebook,
      cellIndex: 1,
    });

    expect(fs.readFileSync(ledger.storePath, "utf8")).toBe(before);
    expect(fs.readdirSync(path.dirname(ledger.storePath))).toEqual(["ledger.json"]);
    expect(await ledger.wasEverExecuted(notebook, 1)).toBe(false);
  });

  it("loses no update when two instances record concurrently", async () => {
    const directory = makeTemporaryDirectory();
    const first = createLedger(directory);
    const second = createLedger(directory);
    const notebook = path.join(directory, "analysis.ipynb");

    await Promise.all(
      [0, 1, 2, 3, 4, 5].map((index) =>
        (index % 2 === 0 ? first : second).record(notebook, index, `v${index} = ${index}`),
      ),
    );

    const entries = await first.entries(notebook);
    expect(entries.map((record) => record.cellIndex)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(entries[3]?.entry.codeHash).toBe(codeHash("v3 = 3"));
  });

  it("removes a stale lock with a warning", async () => {
    const directory = makeTemporaryDirectory();
    const warnings: string[] = [];
    const ledger = createLedger(directory, {
      warn: (message) => warnings.push(message),
      staleAfterMs: 1_000,
    });
    const lockPath = `${ledger.storePath}.lock`;
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, "12345\n");
    const anHourAgo = new Date(Date.now() - 60 * 60 * 1000);
    fs.utimesSync(lockPath, anHourAgo, anHourAgo);

    await ledger.record(path.join(directory, "analysis.ipynb"), 0, "a = 1");

    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Warning: removing stale lock .*ledger\.json\.lock/);
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it("fails with LedgerPersistError when a live lock is never released", async () => {
    const directory = makeTemporaryDirectory();
    const ledger = createLedger(directory, { retries: 2 });
    const lockPath = `${ledger.storePath}.lock`;
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, "12345\n");

    await expect(ledger.record(path.join(directory, "analysis.ipynb"), 0, "a = 1")).rejects.toThrow(
      /Timed out acquiring lock .* after 3 attempts/,
    );
  });

  it("treats an unparsable store as empty and warns", async () => {
    const directory = makeTemporaryDirectory();
    const warnings: string[] = [];
    const ledger = createLedger(directory, { warn: (message) => warnings.push(message) });
    fs.mkdirSync(path.dirname(ledger.storePath), { recursive: true });
    fs.writeFileSync(ledger.storePath, "{not json");

    const snapshot = await ledger.snapshot(path.join(directory, "analysis.ipynb"));

    expect(snapshot.indices()).toEqual([]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain("is not valid JSON");
  });

  it("drops invalid document and cell entries but keeps the rest", async () => {
    const directory = makeTemporaryDirectory();
    const warnings: string[] = [];
    const ledger = createLedger(directory, { warn: (message) => warnings.push(message) });
    const notebook = path.join(directory, "analysis.ipynb");
    const valid = { codeHash: codeHash("a = 1"), recordedAt: FIXED_NOW.toISOString() };
    fs.mkdirSync(path.dirname(ledger.storePath), { recursive: true });
    fs.writeFileSync(
      ledger.storePath,
      JSON.stringify({
        schemaVersion: 1,
        updatedAt: FIXED_NOW.toISOString(),
        documents: {
          [notebook]: { cells: { "0": valid, "1": { codeHash: "md5:abc" }, "-2": valid } },
          "/elsewhere/broken.ipynb": "oops",
        },
      }),
    );

    const snapshot = await ledger.snapshot(notebook);

    expect(snapshot.indices()).toEqual([0]);
    expect(snapshot.entry(0)).toEqual(valid);
    expect(warnings).toEqual([
      `Warning: dropping invalid ledger entry for cell 1 of ${notebook}.`,
      `Warning: dropping invalid ledger entry for cell -2 of ${notebook}.`,
      "Warning: dropping invalid ledger entry for document /elsewhere/broken.ipynb.",
    ]);
  });

  it("resets one document or the whole ledger", async () => {
    const directory = makeTemporaryDirectory();
    const ledger = createLedger(directory);
    const first = path.join(directory, "first.ipynb");
    const second = path.join(directory, "second.ipynb");
    await ledger.record(first, 0, "a = 1");
    await ledger.record(first, 1, "b = 2");
    await ledger.record(second, 0, "c = 3");

    expect(await ledger.reset(first)).toBe(2);
    expect(await ledger.listDocuments()).toEqual([second]);
    expect(await ledger.reset(first)).toBe(0);

    expect(await ledger.reset()).toBe(1);
    expect(await ledger.listDocuments()).toEqual([]);
  });
});
