import { nowIso } from "./utils.js";
import type { RoleName } from "./roles.js";

export type TraceToolCall = {
  id: string;
  name: string;
  arguments: string;
  output: string;
  ok: boolean;
};

export type TraceUsage = {
  inputTokens: number;
  outputTokens: number;
};

export type TraceStatus = "ok" | "error" | "cancelled";

export type TraceRecord = Readonly<{
  seq: number;
  role: RoleName;
  iteration?: number;
  promptSummary: string;
  rawOutput: string;
  toolCalls: readonly TraceToolCall[];
  status: TraceStatus;
  error?: string;
  errorCode?: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  usage?: TraceUsage;
}>;

export type TraceOutcome = {
  status: TraceStatus;
  rawOutput: string;
  toolCalls?: readonly TraceToolCall[];
  error?: string;
  errorCode?: string;
  usage?: TraceUsage;
};

type TraceListener = (record: TraceRecord) => void;

/**
 * A call slot reserved when the backend call starts. The record only becomes
 * visible once `finish` publishes it.
 */
export class TraceSpan {
  private published: TraceRecord | null = null;
  private readonly startedMs = Date.now();
  private readonly startedAt = nowIso();

  constructor(
    private readonly recorder: TraceRecorder,
    readonly seq: number,
    private readonly role: RoleName,
    private readonly promptSummary: string,
    private readonly iteration?: number
  ) {}

  finish(outcome: TraceOutcome): TraceRecord {
    if (this.published) return this.published;
    const record: TraceRecord = Object.freeze({
      seq: this.seq,
      role: this.role,
      ...(this.iteration === undefined ? {} : { iteration: this.iteration }),
      promptSummary: this.promptSummary,
      rawOutput: outcome.rawOutput,
      toolCalls: Object.freeze((outcome.toolCalls ?? []).map((call) => Object.freeze({ ...call }))),
      status: outcome.status,
      ...(outcome.error === undefined ? {} : { error: outcome.error }),
      ...(outcome.errorCode === undefined ? {} : { errorCode: outcome.errorCode }),
      startedAt: this.startedAt,
      finishedAt: nowIso(),
      durationMs: Math.max(0, Date.now() - this.startedMs),
      ...(outcome.usage === undefined ? {} : { usage: Object.freeze({ ...outcome.usage }) })
    });
    this.published = record;
    this.recorder.publish(record);
    return record;
  }
}

/**
 * Append-only log of backend calls. Records are ordered by call start (their
 * reserved `seq`), not by completion, so concurrent calls keep a stable order.
 */
export class TraceRecorder {
  private nextSeq = 0;
  private readonly records: TraceRecord[] = [];
  private readonly listeners = new Set<TraceListener>();

  begin(role: RoleName, promptSummary: string, iteration?: number): TraceSpan {
    const seq = this.nextSeq;
    this.nextSeq += 1;
    return new TraceSpan(this, seq, role, promptSummary, iteration);
  }

  /** @internal Called by `TraceSpan.finish`. */
  publish(record: TraceRecord): void {
    let at = this.records.length;
    while (at > 0 && this.records[at - 1].seq > record.seq) at--;
    this.records.splice(at, 0, record);
    for (const listener of this.listeners) listener(record);
  }

  entries(): readonly TraceRecord[] {
    return [...this.records];
  }

  get size(): number {
    return this.records.length;
  }

  subscribe(listener: TraceListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
