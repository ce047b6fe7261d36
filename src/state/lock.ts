import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { errorCode, isMissingFileError, sleep } from "../core/utils.js";

export type FileLockOptions = {
  retries: number;
  retryDelayMs: number;
  staleAfterMs: number;
  warn?: (message: string) => void;
};

export const DEFAULT_LOCK_OPTIONS: FileLockOptions = {
  retries: 400,
  retryDelayMs: 25,
  staleAfterMs: 30_000,
};

export class LockTimeoutError extends Error {
  constructor(
    public readonly lockPath: string,
    attempts: number,
  ) {
    super(`Timed out acquiring lock ${lockPath} after ${attempts} attempts`);
    this.name = "LockTimeoutError";
  }
}

// Runs fn while holding an exclusive lock file; the file is created with `wx` so only one
// process can hold it, and a lock older than staleAfterMs is treated as abandoned.
// The file holds the owner's pid and a random token identifying this acquisition.
export async function withFileLock<T>(
  lockPath: string,
  options: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const release = await acquireFileLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}

export async function acquireFileLock(
  lockPath: string,
  options: FileLockOptions,
): Promise<() => Promise<void>> {
  const warn = options.warn ?? ((message: string) => console.warn(message));
  await fse.ensureDir(path.dirname(lockPath));

  const token = randomUUID();
  const attempts = options.retries + 1;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      const handle = await fs.open(lockPath, "wx");
      try {
        await handle.writeFile(`${process.pid}\n${token}\n`, "utf8");
      } finally {
        await handle.close();
      }
      return () => releaseFileLock(lockPath, token, warn);
    } catch (err) {
      if (errorCode(err) !== "EEXIST") {
        throw err;
      }
    }

    if (await removeIfStale(lockPath, options.staleAfterMs, warn)) {
      continue;
    }
    await sleep(options.retryDelayMs);
  }

  throw new LockTimeoutError(lockPath, attempts);
}

async function removeIfStale(
  lockPath: string,
  staleAfterMs: number,
  warn: (message: string) => void,
): Promise<boolean> {
  let ageMs: number;
  let staleToken: string | null;
  try {
    const stat = await fs.stat(lockPath);
    ageMs = Date.now() - stat.mtimeMs;
    if (ageMs <= staleAfterMs) return false;
    staleToken = await readLockToken(lockPath);
  } catch (err) {
    // Released between our open and stat; retry right away.
    if (isMissingFileError(err)) return true;
    throw err;
  }
  if (staleToken === null) return true;

  // Move the lock aside before deleting it, so a lock another waiter took after our
  // check is never the one removed.
  const tombstone = `${lockPath}.${randomUUID()}.stale`;
  try {
    await fs.rename(lockPath, tombstone);
  } catch (err) {
    if (isMissingFileError(err)) return true;
    throw err;
  }

  if ((await readLockToken(tombstone)) !== staleToken) {
    await restoreLock(tombstone, lockPath);
    return false;
  }

  warn(`Warning: removing stale lock ${lockPath} (age ${Math.round(ageMs)}ms).`);
  await fs.rm(tombstone, { force: true });
  return true;
}

async function restoreLock(tombstone: string, lockPath: string): Promise<void> {
  try {
    await fs.link(tombstone, lockPath);
  } catch (err) {
    if (errorCode(err) !== "EEXIST") throw err;
  }
  await fs.rm(tombstone, { force: true });
}

// Second line of the lock file; null when the file is gone.
async function readLockToken(filePath: string): Promise<string | null> {
  try {
    const [, token = ""] = (await fs.readFile(filePath, "utf8")).split("\n");
    return token;
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
}

async function releaseFileLock(
  lockPath: string,
  token: string,
  warn: (message: string) => void,
): Promise<void> {
  try {
    const current = await readLockToken(lockPath);
    if (current === null) return;
    if (current !== token) {
      warn(`Warning: lock ${lockPath} is now held by another process; leaving it in place.`);
      return;
    }
    await fs.rm(lockPath, { force: true });
  } catch (err) {
    warn(`Warning: failed to release lock ${lockPath}: ${formatErrorMessage(err)}`);
  }
}
