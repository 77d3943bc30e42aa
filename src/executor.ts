import type { RunManager, RunSettings } from "./run_manager.js";
import type { DecodedImage } from "./pipeline/image.js";
import { MythError, MythRunError, toErrorMessage } from "./pipeline/errors.js";
import { nowIso } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineInput = {
  runId: string;
  location: string;
  image: DecodedImage;
  settings?: RunSettings;
};

export type PipelineFn = (input: PipelineInput, runs: RunManager, options: PipelineOptions) => Promise<void>;

/** The part of the executor the HTTP layer talks to. */
export type RunControl = Pick<RunExecutor, "enqueue" | "cancel" | "isRunning" | "isQueued">;

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  isQueued(runId: string): boolean {
    return this.queue.includes(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status !== "queued") return false;

    // Avoid duplicate queue entries.
    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      if (ctrl.signal.aborted) return false;
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      this.runs.setFailure(runId, { message: "Cancelled", code: "RUN_CANCELLED" });
      this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });
      return true;
    }

    return false;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (!next) return;
      void this.start(next);
    }
  }

  private async start(runId: string): Promise<void> {
    const run = this.runs.getRun(runId);
    const image = this.runs.getImage(runId);
    if (!run || !image) return;

    const controller = new AbortController();
    this.running.set(runId, controller);
    this.runs.setRunStatus(runId, "running");

    try {
      await this.pipeline({ runId, location: run.location, image, settings: run.settings }, this.runs, {
        signal: controller.signal
      });
      this.runs.setRunStatus(runId, "done", { finishedAt: nowIso() });
    } catch (err) {
      const aborted = controller.signal.aborted;
      const msg = aborted ? "Cancelled" : toErrorMessage(err);
      this.runs.error(runId, msg);
      this.runs.setFailure(runId, {
        message: msg,
        code: aborted ? "RUN_CANCELLED" : err instanceof MythRunError || err instanceof MythError ? err.code : "INTERNAL",
        phase: err instanceof MythRunError ? err.phase : undefined
      });
      this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}
