export class CellSyncError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CellSyncError";
  }
}

export class ConfigError extends CellSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type DocumentLoadErrorCode = "DOCUMENT_NOT_FOUND" | "DOCUMENT_INVALID";

export class DocumentLoadError extends CellSyncError {
  constructor(
    public readonly code: DocumentLoadErrorCode,
    public readonly path: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "DocumentLoadError";
  }
}

export type CellIndexRange = { first: number; last: number };

export type CellIndexErrorCode = "CELL_OUT_OF_RANGE" | "CELL_NOT_CODE" | "CELL_DUPLICATE";

export class CellIndexError extends CellSyncError {
  constructor(
    public readonly code: CellIndexErrorCode,
    public readonly cellIndex: number,
    public readonly validRange: CellIndexRange | null,
  ) {
    super(describeCellIndexError(code, cellIndex, validRange));
    this.name = "CellIndexError";
  }
}

export class LedgerPersistError extends CellSyncError {
  public readonly code = "LEDGER_PERSIST_FAILED";

  constructor(
    public readonly documentKey: string,
    public readonly cellIndex: number | null,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "LedgerPersistError";
  }
}

export class AnalysisSyntaxError extends CellSyncError {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`${message} (line ${line})`);
    this.name = "AnalysisSyntaxError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  document: "DOCUMENT_ERROR",
  input: "INPUT_ERROR",
  ledger: "LEDGER_ERROR",
  execution: "EXECUTION_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeCellIndexError(
  code: CellIndexErrorCode,
  cellIndex: number,
  validRange: CellIndexRange | null,
): string {
  const rangeText = validRange
    ? `valid indices are ${validRange.first}-${validRange.last}`
    : "the document has no cells";

  switch (code) {
    case "CELL_OUT_OF_RANGE":
      return `Cell index ${cellIndex} is out of range (${rangeText}).`;
    case "CELL_NOT_CODE":
      return `Cell ${cellIndex} is not a code cell (${rangeText}).`;
    case "CELL_DUPLICATE":
      return `Cell index ${cellIndex} appears more than once.`;
  }
}
