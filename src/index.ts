import dotenv from "dotenv";

dotenv.config();

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { backendSettingsFromEnv, resolveMythConfig } = await import("./config.js");
const { backendFactoryFor, createMythPipeline } = await import("./pipeline/myth_pipeline.js");

function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}

// Fail at startup on a bad environment rather than on the first run.
const config = resolveMythConfig();
const backend = backendSettingsFromEnv();

if (backend.mode === "fake") {
  console.log("server pipeline mode: fake (MYTH_PIPELINE_MODE=fake)");
} else {
  if (!backend.openaiApiKey) console.error("OPENAI_API_KEY is not set; live runs will fail");
  if (!backend.exaApiKey) console.error("EXA_API_KEY is not set; live runs will fail");
}
console.log(
  `pipeline config: maxIterations=${config.maxIterations} acceptThreshold=${config.acceptThreshold} ` +
    `contextSizeBudget=${config.contextSizeBudget} toolRoundTripCap=${config.toolRoundTripCap} ` +
    `perCallTimeoutMs=${config.perCallTimeoutMs}`
);

const runs = new RunManager();
const pipeline = createMythPipeline({ makeBackend: backendFactoryFor(backend) });

const maxConcurrentRuns = process.env.MAX_CONCURRENT_RUNS ? Number(process.env.MAX_CONCURRENT_RUNS) : 1;
const executor = new RunExecutor(runs, pipeline, {
  concurrency: Number.isFinite(maxConcurrentRuns) && maxConcurrentRuns > 0 ? maxConcurrentRuns : 1
});
const app = createApp(runs, executor, { backend });

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port} (model ${backend.model})`);
});
