import { normalizeLineEndings, sha256Digest } from "../core/utils.js";

export type CellKind = "code" | "prose";

// Immutable view of one cell as the document records it.
export type Cell = {
  readonly index: number;
  readonly kind: CellKind;
  readonly source: string;
  readonly recordedRunOrder: number | null;
  readonly outputFingerprints: readonly string[];
};

export type DocumentSnapshot = {
  // Path as given by the caller; ledger keys are canonicalized separately.
  readonly path: string;
  readonly cells: readonly Cell[];
};

export interface DocumentAdapter {
  load(documentPath: string): Promise<DocumentSnapshot>;
}

export function codeCells(document: DocumentSnapshot): Cell[] {
  return document.cells.filter((cell) => cell.kind === "code");
}

// =============================================================================
// OUTPUT FINGERPRINTS
// =============================================================================

export type OutputText = {
  stdout: string;
  stderr: string;
  results: string[];
  errors: string[];
};

// Order-insensitive: the same textual outputs always give the same fingerprints.
export function fingerprintOutputs(text: OutputText): string[] {
  const parts = [
    text.stdout ? `stdout:${text.stdout}` : null,
    text.stderr ? `stderr:${text.stderr}` : null,
    ...text.results.map((result) => `result:${result}`),
    ...text.errors.map((error) => `error:${error}`),
  ];

  return parts
    .filter((part): part is string => part !== null)
    .map((part) => sha256Digest(normalizeLineEndings(part)))
    .sort();
}
