import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { DocumentLoadError } from "../core/errors.js";

import { fingerprintOutputs } from "./document.js";
import { IpynbDocumentAdapter, parseNotebook } from "./ipynb.js";

const NOTEBOOK = {
  nbformat: 4,
  nbformat_minor: 5,
  metadata: {},
  cells: [
    { cell_type: "markdown", metadata: {}, source: ["# Title\n", "text"] },
    {
      cell_type: "code",
      metadata: {},
      execution_count: 3,
      source: ["x = 1\n", "print(x)"],
      outputs: [
        { output_type: "stream", name: "stdout", text: ["1\n"] },
        { output_type: "execute_result", execution_count: 3, data: { "text/plain": "1" }, metadata: {} },
      ],
    },
    { cell_type: "code", metadata: {}, execution_count: null, source: "y = x", outputs: [] },
  ],
};

describe("parseNotebook", () => {
  it("maps nbformat cells to snapshot cells", () => {
    const snapshot = parseNotebook(JSON.stringify(NOTEBOOK), "demo.ipynb");

    expect(snapshot.path).toBe("demo.ipynb");
    expect(snapshot.cells.map((cell) => [cell.index, cell.kind, cell.recordedRunOrder])).toEqual([
      [0, "prose", null],
      [1, "code", 3],
      [2, "code", null],
    ]);
    expect(snapshot.cells[0].source).toBe("# Title\ntext");
    expect(snapshot.cells[1].source).toBe("x = 1\nprint(x)");
    expect(snapshot.cells[1].outputFingerprints).toEqual(
      fingerprintOutputs({ stdout: "1\n", stderr: "", results: ["1"], errors: [] }),
    );
    expect(snapshot.cells[2].outputFingerprints).toEqual([]);
  });

  it("rejects documents without a cell list", () => {
    expect(() => parseNotebook('{"nbformat": 4}', "bad.ipynb")).toThrow(DocumentLoadError);
    expect(() => parseNotebook("{not json", "bad.ipynb")).toThrow(
      "Notebook at bad.ipynb is not valid JSON.",
    );
  });
});

describe("IpynbDocumentAdapter", () => {
  it("reads the file on every load", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cellsync-ipynb-"));
    const file = path.join(dir, "nb.ipynb");
    const adapter = new IpynbDocumentAdapter();

    fs.writeFileSync(file, JSON.stringify(NOTEBOOK));
    expect((await adapter.load(file)).cells).toHaveLength(3);

    fs.writeFileSync(file, JSON.stringify({ ...NOTEBOOK, cells: NOTEBOOK.cells.slice(0, 1) }));
    expect((await adapter.load(file)).cells).toHaveLength(1);
  });

  it("reports missing files as not found", async () => {
    const missing = path.join(os.tmpdir(), "cellsync-missing", "nb.ipynb");

    await expect(new IpynbDocumentAdapter().load(missing)).rejects.toMatchObject({
      code: "DOCUMENT_NOT_FOUND",
      path: missing,
    });
  });
});
