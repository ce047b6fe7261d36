import {
  CellIndexError,
  DocumentLoadError,
  LedgerPersistError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import type { JsonObject } from "../core/logger.js";

// =============================================================================
// JSON SHAPES
// =============================================================================

export type CliJsonError = {
  code: string;
  message: string;
  details: JsonObject | null;
};

export type CliJsonEnvelope<T> = { ok: true; result: T } | { ok: false; error: CliJsonError };

export type CliOutputOptions = {
  useJson: boolean;
};

// =============================================================================
// OUTPUT EMITTERS
// =============================================================================

export function emitResult<T>(
  result: T,
  output: CliOutputOptions,
  renderText: (result: T) => string[],
): void {
  if (output.useJson) {
    writeJson({ ok: true, result });
    return;
  }

  for (const line of renderText(result)) {
    console.log(line);
  }
}

export function emitJsonError(error: unknown): void {
  writeJson({ ok: false, error: toJsonError(error) });
}

function writeJson<T>(envelope: CliJsonEnvelope<T>): void {
  console.log(JSON.stringify(envelope, null, 2));
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

// Domain errors become UserFacingErrors so the renderer can show a title and a next step.
export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError) return error;

  if (error instanceof DocumentLoadError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.document,
      title: "Notebook could not be loaded.",
      message: error.message,
      next: error.code === "DOCUMENT_NOT_FOUND" ? "Check the notebook path." : undefined,
      cause: error,
    });
  }

  if (error instanceof CellIndexError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid cell selection.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof LedgerPersistError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.ledger,
      title: "Ledger update failed.",
      message: error.message,
      hint: "The ledger lives under CELLSYNC_HOME; check free space and permissions.",
      cause: error,
    });
  }

  return error;
}

export function toJsonError(error: unknown): CliJsonError {
  if (error instanceof CellIndexError) {
    return {
      code: error.code,
      message: error.message,
      details: {
        cell: error.cellIndex,
        valid_range: error.validRange
          ? { first: error.validRange.first, last: error.validRange.last }
          : null,
      },
    };
  }
  if (error instanceof DocumentLoadError) {
    return { code: error.code, message: error.message, details: { path: error.path } };
  }
  if (error instanceof LedgerPersistError) {
    return {
      code: error.code,
      message: error.message,
      details: { document: error.documentKey, cell: error.cellIndex },
    };
  }
  if (error instanceof UserFacingError) {
    return { code: error.code, message: error.message, details: null };
  }
  return { code: USER_FACING_ERROR_CODES.unknown, message: formatErrorMessage(error), details: null };
}
