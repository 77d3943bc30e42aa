import type { MythConfig } from "../config.js";
import type { AgentInvoker } from "./agent_invoker.js";
import { assertThreshold, evaluateCritique } from "./critique_gate.js";
import { ConfigurationError, MalformedOutput, throwIfCancelled } from "./errors.js";
import type { ContextPackage, Critique, Draft } from "./schemas.js";
import { wordCount } from "./utils.js";

export type LoopPhase = "drafting" | "critiquing" | "retrying" | "accepted" | "exhausted";
export type TerminationReason = "accepted" | "exhausted";

export type LoopAttempt = Readonly<{
  iteration: number;
  draft: Draft | null;
  critique: Critique | null;
  /** Set when the Bard itself produced nothing usable for this iteration. */
  draftError?: string;
}>;

export type LoopState = {
  phase: LoopPhase;
  iteration: number;
  attempts: LoopAttempt[];
  best: { draft: Draft; critique: Critique } | null;
  currentCritique: Critique | null;
  feedbackHistory: readonly Critique[];
  terminationReason?: TerminationReason;
};

export type LoopResult = Readonly<{
  terminationReason: TerminationReason;
  finalDraft: Draft;
  finalCritique: Critique | null;
  attempts: readonly LoopAttempt[];
  feedbackHistory: readonly Critique[];
}>;

export type LoopConfig = Pick<MythConfig, "maxIterations" | "acceptThreshold">;

export type LoopObserver = {
  onTransition?: (phase: LoopPhase, iteration: number) => void;
  log?: (message: string) => void;
};

/**
 * Owns the Bard/Critic loop: at most `maxIterations + 1` drafts, each paired
 * with one critique before the retry decision is made.
 */
export class RetryController {
  private readonly config: LoopConfig;

  constructor(
    private readonly invoker: AgentInvoker,
    config: LoopConfig,
    private readonly observer: LoopObserver = {}
  ) {
    if (!Number.isInteger(config.maxIterations) || config.maxIterations < 0) {
      throw new ConfigurationError(`maxIterations must be a non-negative integer (got ${config.maxIterations})`);
    }
    assertThreshold(config.acceptThreshold);
    this.config = { ...config };
  }

  async run(context: ContextPackage, options: { location: string; signal: AbortSignal }): Promise<LoopResult> {
    const { signal, location } = options;
    const history: Critique[] = [];
    const state: LoopState = {
      phase: "drafting",
      iteration: 0,
      attempts: [],
      best: null,
      currentCritique: null,
      feedbackHistory: history
    };

    for (;;) {
      throwIfCancelled(signal);
      const { iteration } = state;
      this.enter(state, "drafting");

      let draft: Draft | null = null;
      let draftError: string | undefined;
      try {
        const { output } = await this.invoker.invoke("bard", { context, feedbackHistory: history, iteration }, { signal, iteration });
        draft = Object.freeze({ iteration, text: output, wordCount: wordCount(output) });
      } catch (err) {
        if (!(err instanceof MalformedOutput)) throw err;
        draftError = err.message;
        this.observer.log?.(`Draft ${iteration + 1} unusable: ${err.message}`);
      }

      let critique: Critique | null = null;
      if (draft) {
        this.enter(state, "critiquing");
        critique = await this.critique(draft, location, signal);
        state.currentCritique = critique;
        this.observer.log?.(
          `Draft ${iteration + 1} scored ${critique.score ?? "n/a"} (${critique.verdict}${critique.malformed ? ", unreadable critique" : ""})`
        );
      }

      state.attempts.push(Object.freeze({ iteration, draft, critique, ...(draftError ? { draftError } : {}) }));
      if (draft && critique && critique.score !== null && (!state.best || critique.score > (state.best.critique.score ?? 0))) {
        state.best = { draft, critique };
      }

      if (draft && critique?.verdict === "accept") {
        this.enter(state, "accepted");
        return this.finish(state, "accepted", draft, critique);
      }

      if (critique) history.push(critique);

      if (iteration >= this.config.maxIterations) {
        this.enter(state, "exhausted");
        const chosen = this.selectFinal(state);
        return this.finish(state, "exhausted", chosen.draft, chosen.critique);
      }

      this.enter(state, "retrying");
      state.iteration = iteration + 1;
    }
  }

  private async critique(draft: Draft, location: string, signal: AbortSignal): Promise<Critique> {
    const { iteration } = draft;
    try {
      const { output } = await this.invoker.invoke("critic", { draft, location }, { signal, iteration });
      const verdict = evaluateCritique(output, this.config.acceptThreshold);
      return Object.freeze({ iteration, score: output.score, feedback: output.feedback, verdict });
    } catch (err) {
      if (!(err instanceof MalformedOutput)) throw err;
      return Object.freeze({
        iteration,
        score: null,
        feedback: Object.freeze([`Critique unreadable: ${err.message}`]),
        verdict: "reject",
        malformed: err.message
      });
    }
  }

  /** Highest score wins; ties keep the earliest iteration. Without any usable score, the earliest draft. */
  private selectFinal(state: LoopState): { draft: Draft; critique: Critique | null } {
    if (state.best) return state.best;
    for (const attempt of state.attempts) {
      if (attempt.draft) return { draft: attempt.draft, critique: attempt.critique };
    }
    throw new MalformedOutput(`No usable draft after ${state.attempts.length} attempt(s)`);
  }

  private enter(state: LoopState, phase: LoopPhase): void {
    state.phase = phase;
    this.observer.onTransition?.(phase, state.iteration);
  }

  private finish(state: LoopState, reason: TerminationReason, finalDraft: Draft, finalCritique: Critique | null): LoopResult {
    state.terminationReason = reason;
    return Object.freeze({
      terminationReason: reason,
      finalDraft,
      finalCritique,
      attempts: [...state.attempts],
      feedbackHistory: [...state.feedbackHistory]
    });
  }
}
