/*
Purpose: drive one live executor session through replay plans, keeping the ledger and the
session's warm set current after each cell.
Assumptions: the document snapshot and graph describe the notebook as it is now; the executor
keeps its namespace between calls.
Usage: const session = new ReplaySession({ document, graph, executor, ledger });
       const result = await session.run([3], { timeoutMs: 60_000 });
*/

import type { DependencyGraph } from "../analysis/graph.js";
import { formatErrorMessage } from "../core/error-format.js";
import { LedgerPersistError } from "../core/errors.js";
import { logSessionEvent, type JsonObject, type JsonlLogger } from "../core/logger.js";
import { extractUndefinedName, findSimilarNames } from "../core/suggestions.js";
import type { Cell, DocumentSnapshot } from "../notebook/document.js";
import {
  outcomeFingerprints,
  type ExecutionFailure,
  type ExecutionSuccess,
  type InteractiveExecutor,
} from "../notebook/executor.js";

import type { ExecutionLedger } from "./ledger.js";
import { reconcile, type ReconcileOptions } from "./reconciler.js";
import { planReplay } from "./replay-planner.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReplayLedger = Pick<ExecutionLedger, "record" | "snapshot">;

export type ExecutedCell = {
  cell: number;
  outcome: ExecutionSuccess;
  // null when the document had no recorded outputs to compare against.
  outputsMatch: boolean | null;
  recorded: boolean;
};

export type ReplayEmpty = {
  status: "empty";
  reason: "no_targets" | "all_warm";
  targets: number[];
};

export type ReplayCompleted = {
  status: "completed";
  targets: number[];
  plan: number[];
  executed: ExecutedCell[];
  persistFailures: LedgerPersistError[];
};

export type ReplayFailed = {
  status: "failed";
  targets: number[];
  plan: number[];
  executed: ExecutedCell[];
  persistFailures: LedgerPersistError[];
  failedCell: number;
  // True when the failing cell is one of the requested targets rather than a producer.
  failedTarget: boolean;
  failure: ExecutionFailure;
  suggestions: string[];
  skipped: number[];
};

export type ReplayResult = ReplayEmpty | ReplayCompleted | ReplayFailed;

export type ReplayRunOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type ReplaySessionOptions = {
  document: DocumentSnapshot;
  graph: DependencyGraph;
  executor: InteractiveExecutor;
  ledger: ReplayLedger;
  logger?: JsonlLogger | null;
  reconcileOptions?: ReconcileOptions;
  warn?: (message: string) => void;
};

// =============================================================================
// SESSION
// =============================================================================

export class ReplaySession {
  private readonly warmCells = new Set<number>();
  private warmGeneration: number | undefined;
  private readonly cellByIndex: Map<number, Cell>;
  private readonly warn: (message: string) => void;

  constructor(private readonly options: ReplaySessionOptions) {
    this.cellByIndex = new Map(options.document.cells.map((cell) => [cell.index, cell]));
    this.warn = options.warn ?? ((message: string) => console.warn(message));
    this.warmGeneration = options.executor.generation;
  }

  get warm(): ReadonlySet<number> {
    return this.warmCells;
  }

  async run(targets: Iterable<number>, runOptions: ReplayRunOptions = {}): Promise<ReplayResult> {
    const { document, graph, executor, ledger } = this.options;
    const targetList = [...new Set(targets)].sort((a, b) => a - b);

    if (targetList.length === 0) {
      this.log("replay.complete", { payload: { status: "empty", reason: "no_targets" } });
      return { status: "empty", reason: "no_targets", targets: [] };
    }

    this.syncWithExecutor();
    const statuses = reconcile({
      document,
      graph,
      ledger: await ledger.snapshot(document.path),
      options: this.options.reconcileOptions,
    });
    const plan = planReplay({ graph, statuses, targets: targetList, warm: this.warmCells });
    this.log("replay.plan", {
      payload: { targets: targetList, plan, warm: [...this.warmCells].sort((a, b) => a - b) },
    });

    if (plan.length === 0) {
      this.log("replay.complete", { payload: { status: "empty", reason: "all_warm" } });
      return { status: "empty", reason: "all_warm", targets: targetList };
    }

    const executed: ExecutedCell[] = [];
    const persistFailures: LedgerPersistError[] = [];

    for (const [position, index] of plan.entries()) {
      const cell = this.requireCell(index);
      this.log("cell.execute.start", { cell: index });

      const outcome = await executor.execute(cell.source, {
        timeoutMs: runOptions.timeoutMs,
        signal: runOptions.signal,
      });

      this.syncWithExecutor();

      if (outcome.status === "failure") {
        if (outcome.failure === "error") {
          // The namespace may hold partial state from the failed cell.
          this.warmCells.delete(index);
        } else {
          // An interrupted cell can stop anywhere, and a forced kill loses the namespace.
          this.resetWarm("interrupted");
        }
        const suggestions = await this.suggestionsFor(outcome);
        this.log("cell.execute.failed", {
          cell: index,
          payload: {
            failure: outcome.failure,
            error_kind: outcome.errorKind,
            error_detail: outcome.errorDetail,
            duration_ms: outcome.output.durationMs,
          },
        });

        const result: ReplayFailed = {
          status: "failed",
          targets: targetList,
          plan,
          executed,
          persistFailures,
          failedCell: index,
          failedTarget: targetList.includes(index),
          failure: outcome,
          suggestions,
          skipped: plan.slice(position + 1),
        };
        this.log("replay.complete", {
          payload: { status: "failed", failed_cell: index, executed: executed.length },
        });
        return result;
      }

      const recorded = await this.recordSuccess(cell, persistFailures);
      this.warmCells.add(index);

      const outputsMatch =
        cell.outputFingerprints.length === 0
          ? null
          : sameFingerprints(cell.outputFingerprints, outcomeFingerprints(outcome));
      executed.push({ cell: index, outcome, outputsMatch, recorded });
      this.log("cell.execute.complete", {
        cell: index,
        payload: { duration_ms: outcome.output.durationMs, outputs_match: outputsMatch, recorded },
      });
    }

    this.log("replay.complete", {
      payload: {
        status: "completed",
        executed: executed.length,
        persist_failures: persistFailures.length,
      },
    });
    return { status: "completed", targets: targetList, plan, executed, persistFailures };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  // A restarted executor starts from an empty namespace, so nothing it ran before is warm.
  private syncWithExecutor(): void {
    const generation = this.options.executor.generation;
    if (generation === this.warmGeneration) return;
    this.warmGeneration = generation;
    this.resetWarm("executor_restarted");
  }

  private resetWarm(reason: "executor_restarted" | "interrupted"): void {
    if (this.warmCells.size === 0) return;
    const dropped = [...this.warmCells].sort((a, b) => a - b);
    this.warmCells.clear();
    this.log("session.warm.reset", { payload: { reason, dropped } });
  }

  private requireCell(index: number): Cell {
    const cell = this.cellByIndex.get(index);
    if (!cell) {
      throw new Error(`Planned cell ${index} is missing from ${this.options.document.path}`);
    }
    return cell;
  }

  private async recordSuccess(cell: Cell, persistFailures: LedgerPersistError[]): Promise<boolean> {
    try {
      await this.options.ledger.record(this.options.document.path, cell.index, cell.source);
      return true;
    } catch (err) {
      if (!(err instanceof LedgerPersistError)) throw err;
      persistFailures.push(err);
      this.log("ledger.record.failed", { cell: cell.index, payload: { message: err.message } });
      return false;
    }
  }

  private async suggestionsFor(failure: ExecutionFailure): Promise<string[]> {
    const name = extractUndefinedName(failure.errorKind, failure.errorDetail);
    const executor = this.options.executor;
    if (!name || !executor.listNames) return [];

    try {
      return findSimilarNames(name, await executor.listNames());
    } catch (err) {
      this.warn(`Warning: could not list session names for suggestions: ${formatErrorMessage(err)}`);
      return [];
    }
  }

  private log(type: string, fields: { cell?: number; payload?: JsonObject } = {}): void {
    if (this.options.logger) {
      logSessionEvent(this.options.logger, type, fields);
    }
  }
}

function sameFingerprints(recorded: readonly string[], fresh: readonly string[]): boolean {
  const left = [...recorded].sort();
  const right = [...fresh].sort();
  return left.length === right.length && left.every((value, i) => value === right[i]);
}
