import { ConfigurationError, MalformedOutput } from "./errors.js";
import type { Verdict } from "./schemas.js";

export const SCORE_MIN = 1;
export const SCORE_MAX = 10;

export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < SCORE_MIN || threshold > SCORE_MAX) {
    throw new ConfigurationError(`Accept threshold must be within [${SCORE_MIN}, ${SCORE_MAX}] (got ${threshold})`);
  }
}

/** Quality gate: accept when the Critic's score reaches the threshold. Out-of-range scores are never clamped. */
export function evaluateCritique(report: { score: number }, threshold: number): Verdict {
  assertThreshold(threshold);
  const { score } = report;
  if (!Number.isFinite(score) || score < SCORE_MIN || score > SCORE_MAX) {
    throw new MalformedOutput(`Critic score ${score} is outside [${SCORE_MIN}, ${SCORE_MAX}]`, String(score));
  }
  return score >= threshold ? "accept" : "reject";
}
