import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  home: string;
};

export type ResolveHomeOptions = {
  home?: string;
  cwd?: string;
};

export const HOME_ENV_VAR = "CELLSYNC_HOME";
export const HOME_DIR_NAME = ".cellsync";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveHome(opts: ResolveHomeOptions = {}): string {
  if (opts.home) {
    return path.resolve(opts.home);
  }

  const fromEnv = process.env[HOME_ENV_VAR];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  return path.join(path.resolve(opts.cwd ?? process.cwd()), HOME_DIR_NAME);
}

export function createPathsContext(opts: ResolveHomeOptions = {}): PathsContext {
  return { home: resolveHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function configPath(paths: PathsContext): string {
  return path.join(paths.home, "config.yaml");
}

export function ledgerPath(paths: PathsContext, override?: string): string {
  if (override) {
    return path.resolve(paths.home, override);
  }
  return path.join(paths.home, "ledger.json");
}

export function ledgerLockPath(storePath: string): string {
  return `${storePath}.lock`;
}

export function logsDir(paths: PathsContext): string {
  return path.join(paths.home, "logs");
}

export function sessionLogPath(paths: PathsContext, sessionId: string): string {
  return path.join(logsDir(paths), `session-${sessionId}.jsonl`);
}
