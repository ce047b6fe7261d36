/**
 * AppContext resolves the cellsync home, config and ledger location without mutating globals.
 * Purpose: make CELLSYNC_HOME and the config explicit for CLI commands and tests.
 * Usage: const ctx = createAppContext({ home: opts.home, configPath: opts.config });
 */

import type { ProjectConfig } from "../core/config.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { JsonlLogger } from "../core/logger.js";
import {
  configPath as defaultConfigPath,
  createPathsContext,
  ledgerPath,
  sessionLogPath,
  type PathsContext,
} from "../core/paths.js";
import { defaultSessionId } from "../core/utils.js";
import { ExecutionLedger } from "../state/ledger.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  home: string;
  paths: PathsContext;
  configPath: string;
  config: ProjectConfig;
  ledgerPath: string;
  sessionId: string;
};

export type CreateAppContextInput = {
  home?: string;
  configPath?: string;
  cwd?: string;
  sessionId?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput = {}): AppContext {
  const paths = createPathsContext({ home: input.home, cwd: input.cwd });
  const configPath = input.configPath ?? defaultConfigPath(paths);
  const config = loadProjectConfig(configPath, { required: input.configPath !== undefined });

  return {
    home: paths.home,
    paths,
    configPath,
    config,
    ledgerPath: ledgerPath(paths, config.ledger_path),
    sessionId: input.sessionId ?? defaultSessionId(),
  };
}

export function createLedger(
  ctx: AppContext,
  warn?: (message: string) => void,
): ExecutionLedger {
  return new ExecutionLedger({
    storePath: ctx.ledgerPath,
    warn,
    lock: {
      retries: ctx.config.lock.retries,
      retryDelayMs: ctx.config.lock.retry_delay_ms,
      staleAfterMs: ctx.config.lock.stale_after_ms,
    },
  });
}

export function createSessionLogger(ctx: AppContext, documentPath: string): JsonlLogger {
  return new JsonlLogger(sessionLogPath(ctx.paths, ctx.sessionId), {
    sessionId: ctx.sessionId,
    document: documentPath,
  });
}
