import type { TraceRecord } from "./trace.js";

export type MythErrorCode =
  | "BACKEND_UNAVAILABLE"
  | "TOOL_LOOP_EXCEEDED"
  | "MALFORMED_OUTPUT"
  | "UNSUPPORTED_FORMAT"
  | "CONFIGURATION_ERROR"
  | "RUN_CANCELLED";

export abstract class MythError extends Error {
  abstract readonly code: MythErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network, auth or timeout failure of a single backend or search call. Never retried by the invoker. */
export class BackendUnavailable extends MythError {
  readonly code = "BACKEND_UNAVAILABLE";
}

export class ToolLoopExceeded extends MythError {
  readonly code = "TOOL_LOOP_EXCEEDED";
  readonly roundTrips: number;

  constructor(message: string, roundTrips: number) {
    super(message);
    this.roundTrips = roundTrips;
  }
}

/** Backend output failed the role's output schema. Callers decide whether to retry or abort. */
export class MalformedOutput extends MythError {
  readonly code = "MALFORMED_OUTPUT";
  readonly rawOutput: string;

  constructor(message: string, rawOutput = "", options?: { cause?: unknown }) {
    super(message, options);
    this.rawOutput = rawOutput;
  }
}

export class UnsupportedFormat extends MythError {
  readonly code = "UNSUPPORTED_FORMAT";
}

export class ConfigurationError extends MythError {
  readonly code = "CONFIGURATION_ERROR";
}

export class RunCancelled extends MythError {
  readonly code = "RUN_CANCELLED";

  constructor(message = "Cancelled") {
    super(message);
  }
}

export type RunPhase = "gather" | "compact" | "refine";

/** Fatal run failure, carrying the trace recorded up to the point of failure. */
export class MythRunError extends Error {
  readonly phase: RunPhase;
  readonly trace: readonly TraceRecord[];
  readonly code: MythErrorCode | "INTERNAL";

  constructor(phase: RunPhase, cause: unknown, trace: readonly TraceRecord[]) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`${phase} phase failed: ${message}`, { cause });
    this.name = "MythRunError";
    this.phase = phase;
    this.trace = trace;
    this.code = cause instanceof MythError ? cause.code : "INTERNAL";
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) throw new RunCancelled();
}
