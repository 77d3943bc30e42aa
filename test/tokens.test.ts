import { describe, expect, it } from "vitest";
import { countTokens, truncateToTokenBudget } from "../src/pipeline/tokens.js";

describe("token estimates", () => {
  it("counts roughly four characters per token", () => {
    expect(countTokens("")).toBe(0);
    expect(countTokens("abcd")).toBe(1);
    expect(countTokens("abcde")).toBe(2);
  });

  it("truncates within the budget", () => {
    expect(truncateToTokenBudget("short", 10)).toBe("short");
    expect(truncateToTokenBudget("one two three four five", 3)).toBe("one two t...");
    expect(truncateToTokenBudget("abcdefgh", 0)).toBe("");
    expect(truncateToTokenBudget("abcdefghij", 1)).toBe("a...");
    expect(countTokens(truncateToTokenBudget("one two three four five", 3))).toBeLessThanOrEqual(3);
  });
});
