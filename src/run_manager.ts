import { EventEmitter } from "node:events";
import { randomBytes } from "node:crypto";
import type { MythConfigOverrides } from "./config.js";
import type { DecodedImage } from "./pipeline/image.js";
import { STEP_ORDER, type StepName } from "./pipeline/phase_scheduler.js";
import type { TerminationReason } from "./pipeline/retry_controller.js";
import type { HistoricalFact, Verdict, VisualCues } from "./pipeline/schemas.js";
import type { TraceRecord } from "./pipeline/trace.js";
import { nowIso, slug } from "./pipeline/utils.js";

export { STEP_ORDER, type StepName };

export type RunSettings = MythConfigOverrides;

export type StepRecord = {
  name: StepName;
  status: "queued" | "running" | "done" | "error";
  startedAt?: string;
  finishedAt?: string;
  error?: string;
};

export type IterationLogEntry = {
  iteration: number;
  score: number | null;
  verdict: Verdict | null;
  preview: string;
  error?: string;
};

export type RunResult = {
  myth: string;
  terminationReason: TerminationReason;
  finalScore: number | null;
  visualCues: VisualCues;
  facts: HistoricalFact[];
  iterations: IterationLogEntry[];
};

export type RunFailure = {
  message: string;
  code: string;
  phase?: string;
};

export type ImageInfo = Pick<DecodedImage, "mediaType" | "byteLength" | "sha256">;

export type RunStatus = {
  runId: string;
  location: string;
  image: ImageInfo;
  settings?: RunSettings;
  status: "queued" | "running" | "done" | "error";
  startedAt: string;
  finishedAt?: string;
  steps: Record<StepName, StepRecord>;
  result?: RunResult;
  error?: RunFailure;
};

type RunInternal = RunStatus & {
  decodedImage: DecodedImage;
  trace: TraceRecord[];
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "location" | "status" | "startedAt" | "finishedAt">;

export type RunEventType = "step_started" | "step_finished" | "trace" | "log" | "error" | "run_finished";
const RUN_EVENT_TYPES: readonly RunEventType[] = ["step_started", "step_finished", "trace", "log", "error", "run_finished"];

const RUN_ID_SLUG_MAX = 48;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += RUN_ID_SUFFIX_ALPHABET[bytes[i] % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

export function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "done" || status === "error";
}

function emptySteps(): Record<StepName, StepRecord> {
  return {
    visionary: { name: "visionary", status: "queued" },
    investigator: { name: "investigator", status: "queued" },
    compaction: { name: "compaction", status: "queued" },
    refinement: { name: "refinement", status: "queued" }
  };
}

/** In-memory run registry. Runs live for the lifetime of the process. */
export class RunManager {
  private runs = new Map<string, RunInternal>();

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map(({ runId, location, status, startedAt, finishedAt }) => ({ runId, location, status, startedAt, finishedAt }))
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    return r ? this.snapshot(r) : null;
  }

  getImage(runId: string): DecodedImage | null {
    return this.runs.get(runId)?.decodedImage ?? null;
  }

  getTrace(runId: string): TraceRecord[] | null {
    const r = this.runs.get(runId);
    return r ? [...r.trace] : null;
  }

  private nextRunId(location: string): string {
    const locationSlug = slug(location).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled";
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${locationSlug}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!this.runs.has(runId)) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  createRun(location: string, image: DecodedImage, settings?: RunSettings): RunStatus {
    const runId = this.nextRunId(location);
    const emitter = new EventEmitter();
    // "error" is a run event here, not a crash; never let an unheard one throw.
    emitter.on("error", () => undefined);

    const run: RunInternal = {
      runId,
      location,
      image: { mediaType: image.mediaType, byteLength: image.byteLength, sha256: image.sha256 },
      settings,
      status: "queued",
      startedAt: nowIso(),
      steps: emptySteps(),
      decodedImage: image,
      trace: [],
      emitter
    };

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  setRunStatus(runId: string, status: RunStatus["status"], patch?: Pick<RunStatus, "finishedAt">): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    if (isTerminalRunStatus(status)) {
      r.emitter.emit("run_finished", { status, at: r.finishedAt ?? nowIso() });
    }
  }

  startStep(runId: string, step: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = "running";
    s.startedAt = nowIso();
    r.emitter.emit("step_started", { step, at: s.startedAt });
  }

  finishStep(runId: string, step: StepName, ok: boolean, error?: string): void {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = ok ? "done" : "error";
    s.finishedAt = nowIso();
    if (!ok && error) s.error = error;
    r.emitter.emit("step_finished", { step, at: s.finishedAt, ok });
    if (!ok && error) r.emitter.emit("error", { step, message: error, at: s.finishedAt });
  }

  addTrace(runId: string, record: TraceRecord): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.trace.push(record);
    r.trace.sort((a, b) => a.seq - b.seq);
    r.emitter.emit("trace", record);
  }

  setResult(runId: string, result: RunResult): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.result = result;
  }

  setFailure(runId: string, failure: RunFailure): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.error = failure;
  }

  log(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, step, at: nowIso() });
  }

  error(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, step, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: RunEventType, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handlers = RUN_EVENT_TYPES.map((type) => [type, (payload: unknown) => onEvent(type, payload)] as const);
    for (const [type, handler] of handlers) r.emitter.on(type, handler);

    return () => {
      for (const [type, handler] of handlers) r.emitter.off(type, handler);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, decodedImage: _image, trace: _trace, ...pub } = run;
    return structuredClone(pub);
  }
}
