import { z } from "zod";
import type { TraceToolCall } from "./trace.js";

export const HistoricalFactSchema = z.object({
  claim: z.string().trim().min(1),
  source: z.string().trim().min(1)
});

export const InvestigatorOutputSchema = z.object({
  facts: z.array(HistoricalFactSchema),
  note: z.string().trim().min(1).optional()
});

export const CriticOutputSchema = z.object({
  score: z.number(),
  feedback: z.union([z.string(), z.array(z.string())])
});

export type HistoricalFact = z.infer<typeof HistoricalFactSchema>;

export type VisualCues = Readonly<{
  atmosphere: string;
  details: readonly string[];
}>;

export type HistoricalFacts = Readonly<{
  facts: readonly HistoricalFact[];
  note?: string;
  searchTrace: readonly TraceToolCall[];
}>;

export type AtmosphereInclusion = "full" | "truncated" | "omitted";

export type ContextPackage = Readonly<{
  location: string;
  text: string;
  tokenCount: number;
  budgetTokens: number;
  facts: { included: number; total: number };
  details: { included: number; total: number };
  atmosphere: AtmosphereInclusion;
  truncated: boolean;
}>;

export type Draft = Readonly<{
  iteration: number;
  text: string;
  wordCount: number;
}>;

/** Critic output before the quality gate has looked at it. */
export type CriticReport = Readonly<{
  score: number;
  feedback: readonly string[];
}>;

export type Verdict = "accept" | "reject";

export type Critique = Readonly<{
  iteration: number;
  /** Null only when the Critic response could not be used. */
  score: number | null;
  feedback: readonly string[];
  verdict: Verdict;
  malformed?: string;
}>;
