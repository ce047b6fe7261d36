import { fingerprintOutputs } from "./document.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExecutionOutput = {
  stdout: string;
  stderr: string;
  // repr of the final expression, when it produced a value.
  result: string | null;
  durationMs: number;
};

export type ExecutionFailureKind = "error" | "timeout" | "interrupted";

export type ExecutionSuccess = {
  status: "success";
  output: ExecutionOutput;
};

export type ExecutionFailure = {
  status: "failure";
  failure: ExecutionFailureKind;
  errorKind: string;
  errorDetail: string;
  traceback: string[];
  output: ExecutionOutput;
};

export type ExecutionOutcome = ExecutionSuccess | ExecutionFailure;

export type ExecuteOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export interface InteractiveExecutor {
  execute(source: string, options?: ExecuteOptions): Promise<ExecutionOutcome>;
  // Names currently bound in the live session, when the executor can tell.
  listNames?(): Promise<string[]>;
  // Bumped each time the live namespace is lost (the process died or was killed).
  readonly generation?: number;
}

// =============================================================================
// HELPERS
// =============================================================================

export function emptyOutput(durationMs = 0): ExecutionOutput {
  return { stdout: "", stderr: "", result: null, durationMs };
}

export function outcomeFingerprints(outcome: ExecutionOutcome): string[] {
  const { stdout, stderr, result } = outcome.output;
  return fingerprintOutputs({
    stdout,
    stderr,
    results: result === null ? [] : [result],
    errors:
      outcome.status === "failure" && outcome.failure === "error"
        ? [`${outcome.errorKind}: ${outcome.errorDetail}`]
        : [],
  });
}
