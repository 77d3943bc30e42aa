import { resolveMythConfig, type BackendSettings, type Env } from "../config.js";
import type { PipelineFn, PipelineInput } from "../executor.js";
import type { RunResult } from "../run_manager.js";
import type { Backend } from "./backend.js";
import { ConfigurationError } from "./errors.js";
import { createDemoBackend } from "./fake_backend.js";
import { OpenAIBackend } from "./openai_backend.js";
import { PhaseScheduler, type MythResult } from "./phase_scheduler.js";
import { ExaSearchTool, type SearchTool } from "./search_tool.js";
import { TraceRecorder } from "./trace.js";
import { preview } from "./utils.js";

export type BackendBundle = { backend: Backend; search?: SearchTool };
export type BackendFactory = (input: PipelineInput) => BackendBundle;

function requireKey(value: string | undefined, name: string): string {
  if (!value) throw new ConfigurationError(`${name} is required when MYTH_PIPELINE_MODE=live`);
  return value;
}

/** Live runs build fresh clients per run, so a missing key fails the run rather than the server. */
export function backendFactoryFor(settings: BackendSettings): BackendFactory {
  if (settings.mode === "fake") {
    return (input) => createDemoBackend(input.location, settings.fakeDelayMs);
  }
  return () => ({
    backend: new OpenAIBackend(requireKey(settings.openaiApiKey, "OPENAI_API_KEY"), settings.model, settings.temperature),
    search: new ExaSearchTool(requireKey(settings.exaApiKey, "EXA_API_KEY"))
  });
}

export function summarizeResult(result: MythResult): RunResult {
  return {
    myth: result.finalDraft.text,
    terminationReason: result.terminationReason,
    finalScore: result.finalCritique?.score ?? null,
    visualCues: { atmosphere: result.visualCues.atmosphere, details: [...result.visualCues.details] },
    facts: result.historicalFacts.facts.map((f) => ({ ...f })),
    iterations: result.attempts.map((a) => ({
      iteration: a.iteration,
      score: a.critique?.score ?? null,
      verdict: a.critique?.verdict ?? null,
      preview: a.draft ? preview(a.draft.text) : "",
      ...(a.draftError ? { error: a.draftError } : {})
    }))
  };
}

export function createMythPipeline(options: { makeBackend: BackendFactory; env?: Env }): PipelineFn {
  const env = options.env ?? process.env;

  return async (input, runs, { signal }) => {
    const { runId } = input;
    const config = resolveMythConfig(input.settings ?? {}, env);
    const { backend, search } = options.makeBackend(input);

    const trace = new TraceRecorder();
    const unsubscribe = trace.subscribe((record) => runs.addTrace(runId, record));
    runs.log(
      runId,
      `Backend ${backend.name}: maxIterations=${config.maxIterations} acceptThreshold=${config.acceptThreshold} ` +
        `contextSizeBudget=${config.contextSizeBudget}`
    );

    const scheduler = new PhaseScheduler({
      backend,
      search,
      config,
      trace,
      observer: {
        stepStarted: (step) => runs.startStep(runId, step),
        stepFinished: (step, ok, error) => runs.finishStep(runId, step, ok, error),
        loopTransition: (phase, iteration) => {
          if (phase === "retrying") runs.log(runId, `Retrying (attempt ${iteration + 2})`, "refinement");
        },
        log: (message, step) => runs.log(runId, message, step)
      }
    });

    try {
      const result = await scheduler.run({ location: input.location, image: input.image }, signal);
      runs.setResult(runId, summarizeResult(result));
      runs.log(
        runId,
        `Myth ${result.terminationReason} after ${result.attempts.length} draft(s) (score ${result.finalCritique?.score ?? "n/a"})`,
        "refinement"
      );
    } finally {
      unsubscribe();
    }
  };
}
