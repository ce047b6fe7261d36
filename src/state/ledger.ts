import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

import fse from "fs-extra";
import { z } from "zod";

import { formatErrorMessage } from "../core/error-format.js";
import { LedgerPersistError } from "../core/errors.js";
import { ledgerLockPath } from "../core/paths.js";
import { isMissingFileError, normalizeLineEndings, sha256Digest, sortedNumbers } from "../core/utils.js";

import { DEFAULT_LOCK_OPTIONS, withFileLock, type FileLockOptions } from "./lock.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const LEDGER_SCHEMA_VERSION = 1;

export const LedgerEntrySchema = z
  .object({
    codeHash: z.string().regex(/^sha256:[0-9a-f]{64}$/),
    recordedAt: z.string().datetime(),
  })
  .strict();

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

const LedgerFileSchema = z.object({
  schemaVersion: z.literal(LEDGER_SCHEMA_VERSION),
  updatedAt: z.string().optional(),
  documents: z.record(z.unknown()),
});

const DocumentEntrySchema = z.object({
  cells: z.record(z.unknown()),
});

const CELL_KEY_PATTERN = /^(0|[1-9][0-9]*)$/;

type LedgerStore = Map<string, Map<number, LedgerEntry>>;

export type LedgerCellRecord = {
  cellIndex: number;
  entry: LedgerEntry;
};

// =============================================================================
// VIEW
// =============================================================================

// Read-only view of one document's entries, taken once per invocation.
export interface LedgerView {
  isStale(cellIndex: number, currentSource: string): boolean;
  wasEverExecuted(cellIndex: number): boolean;
  entry(cellIndex: number): LedgerEntry | null;
}

export class LedgerSnapshot implements LedgerView {
  constructor(
    readonly documentKey: string,
    private readonly cells: ReadonlyMap<number, LedgerEntry>,
  ) {}

  isStale(cellIndex: number, currentSource: string): boolean {
    const entry = this.cells.get(cellIndex);
    return !entry || entry.codeHash !== codeHash(currentSource);
  }

  wasEverExecuted(cellIndex: number): boolean {
    return this.cells.has(cellIndex);
  }

  entry(cellIndex: number): LedgerEntry | null {
    return this.cells.get(cellIndex) ?? null;
  }

  indices(): number[] {
    return sortedNumbers(this.cells.keys());
  }
}

export function codeHash(source: string): string {
  return sha256Digest(normalizeLineEndings(source));
}

// =============================================================================
// LEDGER
// =============================================================================

export type ExecutionLedgerOptions = {
  storePath: string;
  lock?: Partial<FileLockOptions>;
  warn?: (message: string) => void;
  now?: () => Date;
};

export class ExecutionLedger {
  readonly storePath: string;
  private readonly lockOptions: FileLockOptions;
  private readonly warn: (message: string) => void;
  private readonly now: () => Date;

  constructor(options: ExecutionLedgerOptions) {
    this.storePath = path.resolve(options.storePath);
    this.warn = options.warn ?? ((message: string) => console.warn(message));
    this.lockOptions = { ...DEFAULT_LOCK_OPTIONS, ...options.lock, warn: this.warn };
    this.now = options.now ?? (() => new Date());
  }

  async record(documentPath: string, cellIndex: number, source: string): Promise<LedgerEntry> {
    let key: string;
    try {
      key = await this.documentKey(documentPath);
    } catch (err) {
      throw new LedgerPersistError(
        path.resolve(documentPath),
        cellIndex,
        `Failed to record cell ${cellIndex}: cannot resolve ${documentPath}: ${formatErrorMessage(err)}`,
        err,
      );
    }

    if (!Number.isInteger(cellIndex) || cellIndex < 0) {
      throw new LedgerPersistError(
        key,
        cellIndex,
        `Cannot record cell ${cellIndex}: cell indices are non-negative integers.`,
      );
    }

    const entry: LedgerEntry = {
      codeHash: codeHash(source),
      recordedAt: this.now().toISOString(),
    };

    try {
      await this.mutate((store) => {
        const cells = store.get(key) ?? new Map<number, LedgerEntry>();
        cells.set(cellIndex, entry);
        store.set(key, cells);
        return true;
      });
    } catch (err) {
      throw new LedgerPersistError(
        key,
        cellIndex,
        `Failed to record cell ${cellIndex} of ${key} in ${this.storePath}: ${formatErrorMessage(err)}`,
        err,
      );
    }

    return entry;
  }

  async isStale(documentPath: string, cellIndex: number, currentSource: string): Promise<boolean> {
    return (await this.snapshot(documentPath)).isStale(cellIndex, currentSource);
  }

  async wasEverExecuted(documentPath: string, cellIndex: number): Promise<boolean> {
    return (await this.snapshot(documentPath)).wasEverExecuted(cellIndex);
  }

  async snapshot(documentPath: string): Promise<LedgerSnapshot> {
    const key = await this.documentKey(documentPath);
    const store = await this.readStore();
    return new LedgerSnapshot(key, store.get(key) ?? new Map());
  }

  async listDocuments(): Promise<string[]> {
    const store = await this.readStore();
    return [...store.keys()].sort();
  }

  async entries(documentPath: string): Promise<LedgerCellRecord[]> {
    const snapshot = await this.snapshot(documentPath);
    return snapshot.indices().flatMap((cellIndex) => {
      const entry = snapshot.entry(cellIndex);
      return entry ? [{ cellIndex, entry }] : [];
    });
  }

  // Removes every entry, or only those of one document; returns how many were removed.
  async reset(documentPath?: string): Promise<number> {
    const key = documentPath === undefined ? null : await this.documentKey(documentPath);
    let removed = 0;

    try {
      await this.mutate((store) => {
        if (key === null) {
          for (const cells of store.values()) removed += cells.size;
          store.clear();
        } else {
          removed = store.get(key)?.size ?? 0;
          store.delete(key);
        }
        return removed > 0;
      });
    } catch (err) {
      throw new LedgerPersistError(
        key ?? "*",
        null,
        `Failed to reset ${this.storePath}: ${formatErrorMessage(err)}`,
        err,
      );
    }

    return removed;
  }

  // Ledger keys are absolute, symlink-free paths so that different spellings of one
  // document share entries.
  async documentKey(documentPath: string): Promise<string> {
    const resolved = path.resolve(documentPath);
    try {
      return await fs.realpath(resolved);
    } catch (err) {
      if (!isMissingFileError(err)) throw err;
    }

    try {
      return path.join(await fs.realpath(path.dirname(resolved)), path.basename(resolved));
    } catch (err) {
      if (!isMissingFileError(err)) throw err;
      return resolved;
    }
  }

  // ===========================================================================
  // STORE IO
  // ===========================================================================

  private async mutate(change: (store: LedgerStore) => boolean): Promise<void> {
    await withFileLock(ledgerLockPath(this.storePath), this.lockOptions, async () => {
      const store = await this.readStore();
      if (change(store)) {
        await this.writeStore(store);
      }
    });
  }

  private async readStore(): Promise<LedgerStore> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (err) {
      if (!isMissingFileError(err)) {
        this.warn(
          `Warning: cannot read ledger ${this.storePath}: ${formatErrorMessage(err)}; treating it as empty.`,
        );
      }
      return new Map();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.warn(
        `Warning: ledger ${this.storePath} is not valid JSON (${formatErrorMessage(err)}); treating it as empty.`,
      );
      return new Map();
    }

    const parsed = LedgerFileSchema.safeParse(json);
    if (!parsed.success) {
      this.warn(
        `Warning: ledger ${this.storePath} has an unsupported layout; treating it as empty.`,
      );
      return new Map();
    }

    return this.parseDocuments(parsed.data.documents);
  }

  private parseDocuments(documents: Record<string, unknown>): LedgerStore {
    const store: LedgerStore = new Map();

    for (const [documentKey, value] of Object.entries(documents)) {
      const document = DocumentEntrySchema.safeParse(value);
      if (!document.success) {
        this.warn(`Warning: dropping invalid ledger entry for document ${documentKey}.`);
        continue;
      }

      const cells = new Map<number, LedgerEntry>();
      for (const [cellKey, cellValue] of Object.entries(document.data.cells)) {
        const entry = LedgerEntrySchema.safeParse(cellValue);
        if (!CELL_KEY_PATTERN.test(cellKey) || !entry.success) {
          this.warn(`Warning: dropping invalid ledger entry for cell ${cellKey} of ${documentKey}.`);
          continue;
        }
        cells.set(Number(cellKey), entry.data);
      }
      store.set(documentKey, cells);
    }

    return store;
  }

  private async writeStore(store: LedgerStore): Promise<void> {
    const documents: Record<string, { cells: Record<string, LedgerEntry> }> = {};
    for (const documentKey of [...store.keys()].sort()) {
      const cells = store.get(documentKey) ?? new Map<number, LedgerEntry>();
      const serialized: Record<string, LedgerEntry> = {};
      for (const cellIndex of sortedNumbers(cells.keys())) {
        const entry = cells.get(cellIndex);
        if (entry) serialized[String(cellIndex)] = entry;
      }
      documents[documentKey] = { cells: serialized };
    }

    await writeJsonFileAtomic(this.storePath, {
      schemaVersion: LEDGER_SCHEMA_VERSION,
      updatedAt: this.now().toISOString(),
      documents,
    });
  }
}

// =============================================================================
// IO HELPERS
// =============================================================================

async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const temporaryPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(temporaryPath, "w");
  let closed = false;

  try {
    await handle.writeFile(`${JSON.stringify(data, null, 2)}\n`, "utf8");
    await handle.sync();
    await handle.close();
    closed = true;
    await fs.rename(temporaryPath, filePath);
  } catch (error) {
    if (!closed) await handle.close();
    await fse.remove(temporaryPath);
    throw error;
  }
}
