import type { MythConfig } from "../config.js";
import { AgentInvoker } from "./agent_invoker.js";
import type { Backend } from "./backend.js";
import { compactContext } from "./compactor.js";
import { MythRunError, RunCancelled, throwIfCancelled, toErrorMessage, type RunPhase } from "./errors.js";
import type { DecodedImage } from "./image.js";
import { RetryController, type LoopAttempt, type LoopPhase, type TerminationReason } from "./retry_controller.js";
import type { ContextPackage, Critique, Draft, HistoricalFacts, VisualCues } from "./schemas.js";
import type { SearchTool } from "./search_tool.js";
import { TraceRecorder, type TraceRecord } from "./trace.js";

export const STEP_ORDER = ["visionary", "investigator", "compaction", "refinement"] as const;
export type StepName = (typeof STEP_ORDER)[number];

export type MythInput = {
  location: string;
  image: DecodedImage;
};

export type MythResult = Readonly<{
  location: string;
  visualCues: VisualCues;
  historicalFacts: HistoricalFacts;
  context: ContextPackage;
  finalDraft: Draft;
  finalCritique: Critique | null;
  terminationReason: TerminationReason;
  attempts: readonly LoopAttempt[];
  trace: readonly TraceRecord[];
}>;

export type PhaseObserver = {
  stepStarted?: (step: StepName) => void;
  stepFinished?: (step: StepName, ok: boolean, error?: string) => void;
  loopTransition?: (phase: LoopPhase, iteration: number) => void;
  log?: (message: string, step?: StepName) => void;
};

export type PhaseSchedulerDeps = {
  backend: Backend;
  config: MythConfig;
  search?: SearchTool;
  trace?: TraceRecorder;
  observer?: PhaseObserver;
};

/**
 * Top-level driver: gathers visual cues and history concurrently, compacts
 * them, then runs the draft/critique loop. Any failure ends the run; no myth
 * is produced from incomplete grounding.
 */
export class PhaseScheduler {
  readonly trace: TraceRecorder;
  private readonly invoker: AgentInvoker;
  private readonly observer: PhaseObserver;

  constructor(private readonly deps: PhaseSchedulerDeps) {
    this.trace = deps.trace ?? new TraceRecorder();
    this.observer = deps.observer ?? {};
    this.invoker = new AgentInvoker({
      backend: deps.backend,
      search: deps.search,
      trace: this.trace,
      config: deps.config
    });
  }

  async run(input: MythInput, signal: AbortSignal): Promise<MythResult> {
    const { config } = this.deps;
    let phase: RunPhase = "gather";

    try {
      throwIfCancelled(signal);
      const [visualCues, historicalFacts] = await this.gather(input, signal);

      phase = "compact";
      throwIfCancelled(signal);
      const context = await this.step("compaction", async () => {
        const pkg = compactContext(visualCues, historicalFacts, {
          location: input.location,
          budgetTokens: config.contextSizeBudget
        });
        this.observer.log?.(
          `Context ${pkg.tokenCount}/${pkg.budgetTokens} tokens: ${pkg.facts.included}/${pkg.facts.total} facts, ` +
            `${pkg.details.included}/${pkg.details.total} details, atmosphere ${pkg.atmosphere}`,
          "compaction"
        );
        return pkg;
      });

      phase = "refine";
      const loop = await this.step("refinement", async () => {
        const controller = new RetryController(this.invoker, config, {
          onTransition: this.observer.loopTransition,
          log: (message) => this.observer.log?.(message, "refinement")
        });
        return await controller.run(context, { location: input.location, signal });
      });

      return Object.freeze({
        location: input.location,
        visualCues,
        historicalFacts,
        context,
        finalDraft: loop.finalDraft,
        finalCritique: loop.finalCritique,
        terminationReason: loop.terminationReason,
        attempts: loop.attempts,
        trace: this.trace.entries()
      });
    } catch (err) {
      throw new MythRunError(phase, err, this.trace.entries());
    }
  }

  /**
   * Phase 1. Both calls share a phase-scoped abort: the first failure (or a run
   * cancellation) aborts the sibling, and both settle before the phase ends.
   */
  private async gather(input: MythInput, signal: AbortSignal): Promise<[VisualCues, HistoricalFacts]> {
    const phase = new AbortController();
    const onAbort = () => phase.abort();
    signal.addEventListener("abort", onAbort, { once: true });

    const guard = <T>(work: Promise<T>): Promise<T> =>
      work.catch((err: unknown) => {
        phase.abort();
        throw err;
      });

    try {
      const [vision, history] = await Promise.allSettled([
        guard(
          this.step("visionary", async () => {
            const { output } = await this.invoker.invoke(
              "visionary",
              { image: input.image, location: input.location },
              { signal: phase.signal }
            );
            return output;
          })
        ),
        guard(
          this.step("investigator", async () => {
            const { output } = await this.invoker.invoke("investigator", { location: input.location }, { signal: phase.signal });
            this.observer.log?.(
              `Found ${output.facts.length} fact(s) in ${output.searchTrace.length} search call(s)`,
              "investigator"
            );
            return output;
          })
        )
      ]);

      throwIfCancelled(signal);
      if (vision.status === "fulfilled" && history.status === "fulfilled") return [vision.value, history.value];

      // Report the failure that aborted the sibling, not the sibling's cancellation.
      const failures = [vision, history].filter((r): r is PromiseRejectedResult => r.status === "rejected");
      const rootCause = failures.find((f) => !(f.reason instanceof RunCancelled)) ?? failures[0];
      throw rootCause.reason;
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private async step<T>(step: StepName, fn: () => Promise<T>): Promise<T> {
    this.observer.stepStarted?.(step);
    try {
      const out = await fn();
      this.observer.stepFinished?.(step, true);
      return out;
    } catch (err) {
      this.observer.stepFinished?.(step, false, toErrorMessage(err));
      throw err;
    }
  }
}
