import { describe, expect, it } from "vitest";
import { RunCancelled } from "../src/pipeline/errors.js";
import { extractJsonObject, nowIso, preview, raceAbort, slug, wait, wordCount } from "../src/pipeline/utils.js";

describe("utils", () => {
  it("nowIso returns an ISO timestamp", () => {
    expect(nowIso()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("slug lowercases and collapses separators", () => {
    expect(slug("  Old Mill, Ashford!  ")).toBe("old-mill-ashford");
    expect(slug("***")).toBe("untitled");
    expect(slug("a".repeat(80))).toHaveLength(60);
  });

  it("counts words and previews text", () => {
    expect(wordCount("  one two\nthree ")).toBe(3);
    expect(wordCount("")).toBe(0);
    expect(preview("a  b\n c")).toBe("a b c");
    expect(preview("abcdefghij", 4)).toBe("abcd...");
  });

  it("extracts the outermost JSON object", () => {
    expect(extractJsonObject('```json\n{"a": {"b": 1}}\n```')).toBe('{"a": {"b": 1}}');
    expect(extractJsonObject('Sure! {"score": 8} Hope that helps.')).toBe('{"score": 8}');
    expect(extractJsonObject("no braces")).toBe("no braces");
  });

  it("wait resolves, and rejects with RunCancelled on abort", async () => {
    await expect(wait(1, new AbortController().signal)).resolves.toBeUndefined();

    const ctrl = new AbortController();
    const pending = wait(10_000, ctrl.signal);
    ctrl.abort();
    await expect(pending).rejects.toBeInstanceOf(RunCancelled);

    await expect(wait(0, ctrl.signal)).rejects.toBeInstanceOf(RunCancelled);
  });

  it("raceAbort settles with the work or the abort, whichever comes first", async () => {
    await expect(raceAbort(Promise.resolve(5), new AbortController().signal)).resolves.toBe(5);
    await expect(raceAbort(Promise.reject(new Error("boom")), new AbortController().signal)).rejects.toThrow("boom");

    const ctrl = new AbortController();
    const pending = raceAbort(new Promise<number>(() => undefined), ctrl.signal);
    ctrl.abort();
    await expect(pending).rejects.toBeInstanceOf(RunCancelled);
  });
});
