import { describe, expect, it } from "vitest";
import { compactContext } from "../src/pipeline/compactor.js";
import { ConfigurationError } from "../src/pipeline/errors.js";
import { countTokens } from "../src/pipeline/tokens.js";
import { cues, facts } from "./fixtures.js";

const FACT_ONLY = "LOCATION: Old Mill\n\nVERIFIED HISTORY:\n- The mill burned in 1891. (source: s1)";
const LONG_FOG = "Fog ".repeat(50).trim();

describe("compactContext", () => {
  it("includes everything when the budget allows", () => {
    const pkg = compactContext(cues(), facts([["The mill burned in 1891.", "s1"]]), { location: "Old Mill", budgetTokens: 1200 });

    expect(pkg.text).toBe(
      `${FACT_ONLY}\n\nVISUAL DETAILS:\n- a broken clock face\n\nATMOSPHERE:\nFog hangs over the square.`
    );
    expect(pkg).toMatchObject({
      facts: { included: 1, total: 1 },
      details: { included: 1, total: 1 },
      atmosphere: "full",
      truncated: false
    });
    expect(pkg.tokenCount).toBe(countTokens(pkg.text));
  });

  it("is idempotent", () => {
    const c = cues(["a", "b"], "Low light.");
    const f = facts([["claim one", "src"]]);
    const opts = { location: "Old Mill", budgetTokens: 40 };
    expect(compactContext(c, f, opts)).toEqual(compactContext(c, f, opts));
  });

  it("keeps a fact before any atmosphere when the budget is tight", () => {
    const pkg = compactContext(
      cues([], LONG_FOG),
      facts([
        ["The mill burned in 1891.", "s1"],
        ["A miller vanished the same night.", "s2"]
      ]),
      { location: "Old Mill", budgetTokens: 20 }
    );

    expect(pkg.text).toBe(FACT_ONLY);
    expect(pkg.tokenCount).toBe(20);
    expect(pkg.facts).toEqual({ included: 1, total: 2 });
    expect(pkg.atmosphere).toBe("omitted");
    expect(pkg.truncated).toBe(true);
  });

  it("cuts the atmosphere to the remaining room", () => {
    const pkg = compactContext(cues([], LONG_FOG), facts([]), { location: "Old Mill", budgetTokens: 20 });

    expect(pkg.atmosphere).toBe("truncated");
    expect(pkg.text).toBe(`LOCATION: Old Mill\n\nATMOSPHERE:\n${"Fog ".repeat(11)}F...`);
    expect(pkg.tokenCount).toBeLessThanOrEqual(20);
  });

  it("rejects budgets and inputs it cannot work with", () => {
    const f = facts([["The mill burned in 1891.", "s1"]]);
    expect(() => compactContext(cues(), f, { location: "Old Mill", budgetTokens: 0 })).toThrow(
      new ConfigurationError("Context size budget must be a positive integer (got 0)")
    );
    expect(() => compactContext(cues([], "  "), facts([]), { location: "Old Mill", budgetTokens: 100 })).toThrow(
      "Nothing to compact: no facts and no visual cues"
    );
    expect(() => compactContext(cues(), f, { location: "Old Mill", budgetTokens: 5 })).toThrow(
      "Context size budget of 5 tokens cannot hold a single fact"
    );
    expect(() => compactContext(cues(["a broken clock face"], ""), facts([]), { location: "Old Mill", budgetTokens: 5 })).toThrow(
      "Context size budget of 5 tokens cannot hold a single visual cue"
    );
  });
});
