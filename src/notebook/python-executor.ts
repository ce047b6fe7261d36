/*
Purpose: InteractiveExecutor backed by a long-lived Python child process.
Assumptions: the driver (templates/cellsync_driver.py) answers one JSON line per request, in
order; SIGINT makes it abandon the running cell and reply "interrupted".
Usage: const executor = new PythonSubprocessExecutor({ python: "python3" });
       await executor.execute("x = 1", { timeoutMs: 5000 }); await executor.close();
*/

import readline from "node:readline";

import { execa, type ExecaChildProcess } from "execa";
import { z } from "zod";

import { DEFAULT_DIRECTIVE_PREFIXES } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { packageAssetPath } from "../core/package-root.js";

import {
  emptyOutput,
  type ExecuteOptions,
  type ExecutionFailureKind,
  type ExecutionOutcome,
  type InteractiveExecutor,
} from "./executor.js";

// =============================================================================
// PROTOCOL
// =============================================================================

const DriverReplySchema = z.object({
  id: z.number().int().nullable(),
  status: z.enum(["ok", "error", "interrupted"]),
  stdout: z.string().default(""),
  stderr: z.string().default(""),
  result: z.string().nullable().default(null),
  error_type: z.string().nullable().default(null),
  error: z.string().nullable().default(null),
  traceback: z.array(z.string()).default([]),
  names: z.array(z.string()).optional(),
});

export type DriverReply = z.infer<typeof DriverReplySchema>;

type DriverRequest = { op: "execute"; code: string } | { op: "names" };

export function parseDriverReply(line: string): DriverReply | null {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = DriverReplySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export type InterruptCause = "timeout" | "abort" | null;

export function replyToOutcome(
  reply: DriverReply,
  durationMs: number,
  interruptCause: InterruptCause,
): ExecutionOutcome {
  const output = { stdout: reply.stdout, stderr: reply.stderr, result: reply.result, durationMs };

  if (reply.status === "ok") {
    return { status: "success", output };
  }

  const failure: ExecutionFailureKind =
    reply.status === "error" ? "error" : interruptCause === "timeout" ? "timeout" : "interrupted";

  return {
    status: "failure",
    failure,
    errorKind: reply.error_type ?? (failure === "error" ? "Error" : "KeyboardInterrupt"),
    errorDetail: reply.error ?? "",
    traceback: reply.traceback,
    output,
  };
}

// =============================================================================
// EXECUTOR
// =============================================================================

export type PythonExecutorOptions = {
  python?: string;
  driverPath?: string;
  cwd?: string;
  // Line sigils the driver strips before running a cell; the analyzer strips the same set.
  directivePrefixes?: readonly string[];
  // How long to wait for the driver to honour SIGINT before killing it.
  interruptGraceMs?: number;
};

type Pending = {
  resolve: (reply: DriverReply) => void;
  reject: (error: Error) => void;
};

const DEFAULT_INTERRUPT_GRACE_MS = 2_000;
// Only the tail of the driver's stderr is kept for ExecutorExited failures.
const MAX_DRIVER_STDERR = 64 * 1024;

export class PythonSubprocessExecutor implements InteractiveExecutor {
  private child: ExecaChildProcess | null = null;
  private readonly pending = new Map<number, Pending>();
  private nextId = 0;
  private driverStderr = "";
  private lostNamespaces = 0;

  constructor(private readonly options: PythonExecutorOptions = {}) {}

  get generation(): number {
    return this.lostNamespaces;
  }

  async execute(source: string, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const startedAt = Date.now();
    const elapsed = (): number => Date.now() - startedAt;

    if (options.signal?.aborted) {
      return interruptedBeforeStart();
    }

    this.driverStderr = "";
    const { id, reply } = this.request({ op: "execute", code: source });
    const state: { interruptCause: InterruptCause } = { interruptCause: null };
    const interrupt = (cause: Exclude<InterruptCause, null>): void => {
      if (state.interruptCause) return;
      state.interruptCause = cause;
      this.interrupt(id);
    };

    const timer =
      options.timeoutMs === undefined
        ? null
        : setTimeout(() => interrupt("timeout"), options.timeoutMs);
    const onAbort = (): void => interrupt("abort");
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return replyToOutcome(await reply, elapsed(), state.interruptCause);
    } catch (err) {
      const cause = state.interruptCause;
      return {
        status: "failure",
        failure: cause === "timeout" ? "timeout" : cause === "abort" ? "interrupted" : "error",
        errorKind: "ExecutorExited",
        errorDetail: formatErrorMessage(err),
        traceback: [],
        output: { ...emptyOutput(elapsed()), stderr: this.driverStderr },
      };
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  async listNames(): Promise<string[]> {
    const { reply } = this.request({ op: "names" });
    return (await reply).names ?? [];
  }

  async close(): Promise<void> {
    const child = this.child;
    if (!child) return;
    this.child = null;
    this.lostNamespaces += 1;

    child.stdin?.end();
    const killTimer = setTimeout(() => child.kill("SIGKILL"), this.graceMs());
    try {
      await child;
    } finally {
      clearTimeout(killTimer);
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private graceMs(): number {
    return this.options.interruptGraceMs ?? DEFAULT_INTERRUPT_GRACE_MS;
  }

  // SIGINT first; SIGKILL if request `id` is still unanswered after the grace period.
  private interrupt(id: number): void {
    const child = this.child;
    if (!child) return;
    child.kill("SIGINT");
    const killTimer = setTimeout(() => {
      if (this.pending.has(id) && this.child === child) {
        child.kill("SIGKILL");
      }
    }, this.graceMs());
    killTimer.unref();
  }

  private request(body: DriverRequest): { id: number; reply: Promise<DriverReply> } {
    this.nextId += 1;
    const id = this.nextId;
    const reply = new Promise<DriverReply>((resolve, reject) => {
      const stdin = this.ensureStarted().stdin;
      if (!stdin) {
        reject(new Error("Python driver has no stdin"));
        return;
      }
      this.pending.set(id, { resolve, reject });
      stdin.write(`${JSON.stringify({ id, ...body })}\n`, (err) => {
        if (err) {
          this.pending.delete(id);
          reject(err);
        }
      });
    });
    return { id, reply };
  }

  private ensureStarted(): ExecaChildProcess {
    if (this.child) return this.child;

    const driverPath = this.options.driverPath ?? packageAssetPath("templates", "cellsync_driver.py");
    const child = execa(this.options.python ?? "python3", [driverPath], {
      cwd: this.options.cwd,
      env: {
        PYTHONUNBUFFERED: "1",
        CELLSYNC_DIRECTIVE_PREFIXES: JSON.stringify(
          this.options.directivePrefixes ?? DEFAULT_DIRECTIVE_PREFIXES,
        ),
      },
      stdin: "pipe",
      stdout: "pipe",
      stderr: "pipe",
      buffer: false,
      reject: false,
    });
    this.child = child;
    this.driverStderr = "";

    if (child.stdout) {
      const lines = readline.createInterface({ input: child.stdout });
      lines.on("line", (line) => this.handleLine(line));
    }
    child.stderr?.on("data", (chunk: Buffer) => {
      this.driverStderr = (this.driverStderr + chunk.toString("utf8")).slice(-MAX_DRIVER_STDERR);
    });

    child.on("error", (err) => this.handleExit(child, err));
    child.on("exit", (code, signal) =>
      this.handleExit(
        child,
        new Error(`Python driver exited (${signal ?? `code ${code ?? "unknown"}`})`),
      ),
    );

    return child;
  }

  private handleLine(line: string): void {
    const reply = parseDriverReply(line);
    if (!reply || reply.id === null) {
      console.warn(`Warning: ignoring unexpected output from the Python driver: ${line}`);
      return;
    }
    const pending = this.pending.get(reply.id);
    if (!pending) return;
    this.pending.delete(reply.id);
    pending.resolve(reply);
  }

  private handleExit(child: ExecaChildProcess, error: Error): void {
    if (this.child === child) {
      this.child = null;
      this.lostNamespaces += 1;
    }
    for (const [id, pending] of this.pending) {
      this.pending.delete(id);
      pending.reject(error);
    }
  }
}

function interruptedBeforeStart(): ExecutionOutcome {
  return {
    status: "failure",
    failure: "interrupted",
    errorKind: "KeyboardInterrupt",
    errorDetail: "interrupted before execution started",
    traceback: [],
    output: emptyOutput(),
  };
}
