import { describe, expect, it } from "vitest";
import { RunExecutor, type PipelineFn } from "../src/executor.js";
import { RunManager } from "../src/run_manager.js";
import { BackendUnavailable, MythRunError } from "../src/pipeline/errors.js";
import { testImage, waitFor } from "./fixtures.js";

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

type Deferred = { promise: Promise<void>; resolve: () => void };

function deferred(): Deferred {
  let settle: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    settle = res;
  });
  return { promise, resolve: () => settle() };
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise<void>((_resolve, reject) => {
    if (signal.aborted) return reject(new Error("aborted"));
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

describe("RunExecutor", () => {
  it("defaults concurrency to 1 when options are omitted", async () => {
    const runs = new RunManager();
    const gate = deferred();
    const r1 = runs.createRun("t1", testImage());
    const r2 = runs.createRun("t2", testImage());

    const pipeline: PipelineFn = async (input) => {
      if (input.runId === r1.runId) await gate.promise;
    };

    const exec = new RunExecutor(runs, pipeline);
    exec.enqueue(r1.runId);
    exec.enqueue(r2.runId);

    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    expect(runs.getRun(r2.runId)?.status).toBe("queued");
    expect(exec.isQueued(r2.runId)).toBe(true);

    gate.resolve();
    await waitFor(() => runs.getRun(r2.runId)?.status === "done");
    expect(runs.getRun(r1.runId)?.finishedAt).toBeTypeOf("string");
  });

  it("runs up to the configured concurrency at once", async () => {
    const runs = new RunManager();
    const gate = deferred();
    const exec = new RunExecutor(runs, () => gate.promise, { concurrency: 2 });
    const ids = ["a1", "a2", "a3"].map((l) => runs.createRun(l, testImage()).runId);

    for (const id of ids) exec.enqueue(id);

    await waitFor(() => ids.slice(0, 2).every((id) => exec.isRunning(id)));
    expect(exec.isRunning(ids[2])).toBe(false);

    gate.resolve();
    await waitFor(() => ids.every((id) => runs.getRun(id)?.status === "done"));
  });

  it("hands the pipeline the run's location, image and settings", async () => {
    const runs = new RunManager();
    const image = testImage();
    const run = runs.createRun("Old Mill", image, { maxIterations: 0 });
    const seen: unknown[] = [];

    const exec = new RunExecutor(runs, async (input) => {
      seen.push(input);
    });
    exec.enqueue(run.runId);

    await waitFor(() => runs.getRun(run.runId)?.status === "done");
    expect(seen).toEqual([{ runId: run.runId, location: "Old Mill", image, settings: { maxIterations: 0 } }]);
  });

  it("enqueue is idempotent for queued runs and refuses started ones", async () => {
    const runs = new RunManager();
    const gate = deferred();
    const calls = new Map<string, number>();
    const r1 = runs.createRun("t1", testImage());
    const r2 = runs.createRun("t2", testImage());

    const exec = new RunExecutor(runs, async (input) => {
      calls.set(input.runId, (calls.get(input.runId) ?? 0) + 1);
      if (input.runId === r1.runId) await gate.promise;
    });

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    expect(exec.enqueue(r1.runId)).toBe(false);

    exec.enqueue(r2.runId);
    expect(exec.enqueue(r2.runId)).toBe(true);

    gate.resolve();
    await waitFor(() => runs.getRun(r2.runId)?.status === "done");
    expect(calls.get(r2.runId)).toBe(1);
    expect(exec.enqueue(r2.runId)).toBe(false);
  });

  it("records the failure message, code and phase", async () => {
    const runs = new RunManager();
    const r1 = runs.createRun("t1", testImage());
    const r2 = runs.createRun("t2", testImage());
    const errors: string[] = [];
    runs.subscribe(r2.runId, (type) => {
      if (type === "error") errors.push(type);
    });

    const exec = new RunExecutor(runs, async (input) => {
      if (input.runId === r1.runId) throw new MythRunError("gather", new BackendUnavailable("search down"), []);
      throw "string-fail";
    });

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "error");
    exec.enqueue(r2.runId);
    await waitFor(() => runs.getRun(r2.runId)?.status === "error");

    expect(runs.getRun(r1.runId)?.error).toEqual({
      message: "gather phase failed: search down",
      code: "BACKEND_UNAVAILABLE",
      phase: "gather"
    });
    expect(runs.getRun(r2.runId)?.error).toEqual({ message: "string-fail", code: "INTERNAL", phase: undefined });
    expect(errors).toEqual(["error"]);
  });

  it("can cancel a running run", async () => {
    const runs = new RunManager();
    const exec = new RunExecutor(runs, (_input, _runs, options) => untilAborted(options.signal));
    const r1 = runs.createRun("t1", testImage());

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");

    expect(exec.cancel(r1.runId)).toBe(true);
    expect(exec.cancel(r1.runId)).toBe(false);
    await waitFor(() => runs.getRun(r1.runId)?.status === "error");
    expect(runs.getRun(r1.runId)?.error).toMatchObject({ message: "Cancelled", code: "RUN_CANCELLED" });
    expect(exec.isRunning(r1.runId)).toBe(false);
  });

  it("can cancel a queued run", async () => {
    const runs = new RunManager();
    const gate = deferred();
    const r1 = runs.createRun("t1", testImage());
    const r2 = runs.createRun("t2", testImage());
    const exec = new RunExecutor(runs, async (input) => {
      if (input.runId === r1.runId) await gate.promise;
    });

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    exec.enqueue(r2.runId);

    expect(exec.cancel(r2.runId)).toBe(true);
    expect(runs.getRun(r2.runId)).toMatchObject({ status: "error", error: { message: "Cancelled", code: "RUN_CANCELLED" } });

    gate.resolve();
    await waitFor(() => runs.getRun(r1.runId)?.status === "done");
    await sleep(20);
    expect(runs.getRun(r2.runId)?.status).toBe("error");
  });

  it("returns false for idle or missing runs", () => {
    const runs = new RunManager();
    const exec = new RunExecutor(runs, async () => undefined, { concurrency: 1 });
    const r1 = runs.createRun("t1", testImage());

    expect(exec.cancel(r1.runId)).toBe(false);
    expect(exec.cancel("missing")).toBe(false);
    expect(exec.enqueue("missing")).toBe(false);
  });
});
