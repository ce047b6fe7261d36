import fse from "fs-extra";
import { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { DocumentLoadError } from "../core/errors.js";
import { isMissingFileError } from "../core/utils.js";

import {
  fingerprintOutputs,
  type Cell,
  type DocumentAdapter,
  type DocumentSnapshot,
  type OutputText,
} from "./document.js";

// =============================================================================
// NBFORMAT SCHEMA
// =============================================================================

const MultilineText = z.union([z.string(), z.array(z.string())]);

const OutputSchema = z
  .object({
    output_type: z.string(),
    name: z.string().optional(),
    text: MultilineText.optional(),
    data: z.record(z.unknown()).optional(),
    ename: z.string().optional(),
    evalue: z.string().optional(),
  })
  .passthrough();

const CellSchema = z
  .object({
    cell_type: z.string(),
    source: MultilineText,
    execution_count: z.number().int().nullable().optional(),
    outputs: z.array(OutputSchema).optional(),
  })
  .passthrough();

const NotebookSchema = z
  .object({
    nbformat: z.number().int().optional(),
    cells: z.array(CellSchema),
  })
  .passthrough();

type NotebookOutput = z.infer<typeof OutputSchema>;
type NotebookCell = z.infer<typeof CellSchema>;

// =============================================================================
// ADAPTER
// =============================================================================

export class IpynbDocumentAdapter implements DocumentAdapter {
  async load(documentPath: string): Promise<DocumentSnapshot> {
    let raw: string;
    try {
      raw = await fse.readFile(documentPath, "utf8");
    } catch (err) {
      if (isMissingFileError(err)) {
        throw new DocumentLoadError(
          "DOCUMENT_NOT_FOUND",
          documentPath,
          `Notebook not found at ${documentPath}.`,
          err,
        );
      }
      throw new DocumentLoadError(
        "DOCUMENT_INVALID",
        documentPath,
        `Failed to read notebook at ${documentPath}.`,
        err,
      );
    }

    return parseNotebook(raw, documentPath);
  }
}

export function parseNotebook(raw: string, documentPath: string): DocumentSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new DocumentLoadError(
      "DOCUMENT_INVALID",
      documentPath,
      `Notebook at ${documentPath} is not valid JSON.`,
      err,
    );
  }

  const parsed = NotebookSchema.safeParse(json);
  if (!parsed.success) {
    throw new DocumentLoadError(
      "DOCUMENT_INVALID",
      documentPath,
      `Notebook at ${documentPath} is not a valid nbformat document:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  return {
    path: documentPath,
    cells: parsed.data.cells.map((cell, index) => toCell(cell, index)),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function toCell(cell: NotebookCell, index: number): Cell {
  const isCode = cell.cell_type === "code";
  return {
    index,
    kind: isCode ? "code" : "prose",
    source: joinText(cell.source),
    recordedRunOrder: isCode ? (cell.execution_count ?? null) : null,
    outputFingerprints: isCode ? fingerprintOutputs(collectOutputText(cell.outputs ?? [])) : [],
  };
}

function collectOutputText(outputs: NotebookOutput[]): OutputText {
  const text: OutputText = { stdout: "", stderr: "", results: [], errors: [] };

  for (const output of outputs) {
    switch (output.output_type) {
      case "stream": {
        const chunk = joinText(output.text ?? "");
        if (output.name === "stderr") text.stderr += chunk;
        else text.stdout += chunk;
        break;
      }
      case "execute_result":
      case "display_data": {
        const plain = output.data?.["text/plain"];
        const parsed = MultilineText.safeParse(plain);
        if (parsed.success) text.results.push(joinText(parsed.data));
        break;
      }
      case "error":
        text.errors.push(`${output.ename ?? ""}: ${output.evalue ?? ""}`);
        break;
    }
  }

  return text;
}

function joinText(value: string | string[]): string {
  return Array.isArray(value) ? value.join("") : value;
}
