import { describe, expect, it } from "vitest";
import { TraceRecorder, type TraceRecord } from "../src/pipeline/trace.js";

describe("TraceRecorder", () => {
  it("orders records by call start, not completion", () => {
    const trace = new TraceRecorder();
    const first = trace.begin("visionary", "look");
    const second = trace.begin("investigator", "search");

    second.finish({ status: "ok", rawOutput: "facts" });
    first.finish({ status: "ok", rawOutput: "cues" });

    expect(trace.entries().map((r) => [r.seq, r.role])).toEqual([
      [0, "visionary"],
      [1, "investigator"]
    ]);
    expect(trace.size).toBe(2);
  });

  it("publishes each span once and freezes the record", () => {
    const trace = new TraceRecorder();
    const span = trace.begin("bard", "draft #1", 0);
    const record = span.finish({ status: "error", rawOutput: "", error: "boom", errorCode: "BACKEND_UNAVAILABLE" });
    const again = span.finish({ status: "ok", rawOutput: "late" });

    expect(again).toBe(record);
    expect(trace.size).toBe(1);
    expect(record).toMatchObject({ role: "bard", iteration: 0, status: "error", error: "boom", errorCode: "BACKEND_UNAVAILABLE" });
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.toolCalls)).toBe(true);
  });

  it("hands out copies and notifies subscribers", () => {
    const trace = new TraceRecorder();
    const seen: TraceRecord[] = [];
    const unsubscribe = trace.subscribe((r) => seen.push(r));

    trace.begin("critic", "critique").finish({ status: "cancelled", rawOutput: "" });
    unsubscribe();
    trace.begin("critic", "critique").finish({ status: "ok", rawOutput: "{}" });

    expect(seen.map((r) => r.status)).toEqual(["cancelled"]);
    const copy = [...trace.entries()];
    copy.pop();
    expect(trace.size).toBe(2);
    expect(trace.entries()).not.toBe(trace.entries());
  });
});
