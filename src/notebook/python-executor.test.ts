import { fileURLToPath } from "node:url";

import { afterEach, describe, expect, it } from "vitest";

import { outcomeFingerprints } from "./executor.js";
import {
  PythonSubprocessExecutor,
  parseDriverReply,
  replyToOutcome,
  type PythonExecutorOptions,
} from "./python-executor.js";

// Node stand-in for the Python driver, so these tests need no interpreter.
const FAKE_DRIVER = fileURLToPath(new URL("../../test/helpers/fake-driver.mjs", import.meta.url));

describe("parseDriverReply", () => {
  it("fills defaults for omitted fields", () => {
    expect(parseDriverReply('{"id": 3, "status": "ok", "names": ["df"]}')).toEqual({
      id: 3,
      status: "ok",
      stdout: "",
      stderr: "",
      result: null,
      error_type: null,
      error: null,
      traceback: [],
      names: ["df"],
    });
  });

  it("rejects lines that are not driver replies", () => {
    expect(parseDriverReply("Traceback (most recent call last):")).toBeNull();
    expect(parseDriverReply('{"id": 1, "status": "done"}')).toBeNull();
  });
});

describe("replyToOutcome", () => {
  it("maps ok replies to success", () => {
    const reply = parseDriverReply('{"id": 1, "status": "ok", "stdout": "hi\\n", "result": "42"}');
    if (!reply) throw new Error("expected a reply");

    expect(replyToOutcome(reply, 12, null)).toEqual({
      status: "success",
      output: { stdout: "hi\n", stderr: "", result: "42", durationMs: 12 },
    });
  });

  it("passes execution errors through unchanged", () => {
    const reply = parseDriverReply(
      JSON.stringify({
        id: 2,
        status: "error",
        error_type: "NameError",
        error: "name 'q' is not defined",
        traceback: ["Traceback", "NameError: name 'q' is not defined"],
      }),
    );
    if (!reply) throw new Error("expected a reply");

    const outcome = replyToOutcome(reply, 5, null);
    expect(outcome).toMatchObject({
      status: "failure",
      failure: "error",
      errorKind: "NameError",
      errorDetail: "name 'q' is not defined",
      traceback: ["Traceback", "NameError: name 'q' is not defined"],
    });
  });

  it("distinguishes timeouts from other interrupts", () => {
    const reply = parseDriverReply('{"id": 4, "status": "interrupted", "error_type": "KeyboardInterrupt"}');
    if (!reply) throw new Error("expected a reply");

    expect(replyToOutcome(reply, 1, "timeout")).toMatchObject({ failure: "timeout" });
    expect(replyToOutcome(reply, 1, "abort")).toMatchObject({ failure: "interrupted" });
    expect(replyToOutcome(reply, 1, null)).toMatchObject({ failure: "interrupted" });
  });
});

describe("outcomeFingerprints", () => {
  it("is independent of timing", () => {
    const fast = outcomeFingerprints({
      status: "success",
      output: { stdout: "ok\n", stderr: "", result: "1", durationMs: 1 },
    });
    const slow = outcomeFingerprints({
      status: "success",
      output: { stdout: "ok\n", stderr: "", result: "1", durationMs: 900 },
    });

    expect(fast).toHaveLength(2);
    expect(fast).toEqual(slow);
  });
});

describe("PythonSubprocessExecutor", () => {
  const executors: PythonSubprocessExecutor[] = [];

  afterEach(async () => {
    await Promise.all(executors.splice(0).map((executor) => executor.close()));
  });

  // Starts the driver with one completed cell, so signals never race its startup.
  async function startExecutor(options: PythonExecutorOptions = {}): Promise<PythonSubprocessExecutor> {
    const executor = new PythonSubprocessExecutor({
      python: process.execPath,
      driverPath: FAKE_DRIVER,
      interruptGraceMs: 200,
      ...options,
    });
    executors.push(executor);
    expect(await executor.execute("set alpha")).toMatchObject({ status: "success" });
    return executor;
  }

  it("keeps one namespace across cells", async () => {
    const executor = await startExecutor();

    expect(await executor.execute("set beta")).toMatchObject({ status: "success" });
    expect(await executor.listNames()).toEqual(["alpha", "beta"]);
    expect(executor.generation).toBe(0);
  });

  it("interrupts a cell that runs past its timeout", async () => {
    const executor = await startExecutor();

    const outcome = await executor.execute("sleep 10000", { timeoutMs: 100 });

    expect(outcome).toMatchObject({
      status: "failure",
      failure: "timeout",
      errorKind: "KeyboardInterrupt",
    });
    expect(await executor.listNames()).toEqual(["alpha"]);
    expect(executor.generation).toBe(0);
  });

  it("reports an abort as interrupted", async () => {
    const executor = await startExecutor();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const outcome = await executor.execute("sleep 10000", { signal: controller.signal });

    expect(outcome).toMatchObject({
      status: "failure",
      failure: "interrupted",
      errorKind: "KeyboardInterrupt",
    });
  });

  it("does not start a cell whose signal is already aborted", async () => {
    const executor = await startExecutor();

    const outcome = await executor.execute("set beta", { signal: AbortSignal.abort() });

    expect(outcome).toMatchObject({
      status: "failure",
      failure: "interrupted",
      errorDetail: "interrupted before execution started",
    });
    expect(await executor.listNames()).toEqual(["alpha"]);
  });

  it("kills a cell that ignores SIGINT and restarts with an empty namespace", async () => {
    const executor = await startExecutor({ interruptGraceMs: 100 });

    const outcome = await executor.execute("hang 10000", { timeoutMs: 100 });

    expect(outcome).toMatchObject({
      status: "failure",
      failure: "timeout",
      errorKind: "ExecutorExited",
    });
    expect(executor.generation).toBe(1);
    expect(await executor.execute("set beta")).toMatchObject({ status: "success" });
    expect(await executor.listNames()).toEqual(["beta"]);
  });

  it("passes the configured directive prefixes to the driver", async () => {
    const executor = await startExecutor({ directivePrefixes: ["%"] });

    const outcome = await executor.execute("env");

    expect(outcome).toMatchObject({ status: "success", output: { stdout: '["%"]\n' } });
  });

  it("keeps only the tail of driver stderr when the driver dies", async () => {
    const executor = await startExecutor();

    const outcome = await executor.execute("crash 100000");

    expect(outcome).toMatchObject({ status: "failure", failure: "error", errorKind: "ExecutorExited" });
    expect(outcome.output.stderr.length).toBeLessThanOrEqual(64 * 1024);
    expect(executor.generation).toBe(1);
  });
});
