import { z } from "zod";
import { ConfigurationError } from "./pipeline/errors.js";

export const MythConfigSchema = z
  .object({
    maxIterations: z.number().int().min(0).max(10),
    acceptThreshold: z.number().min(1).max(10),
    contextSizeBudget: z.number().int().positive(),
    toolRoundTripCap: z.number().int().min(1).max(10),
    perCallTimeoutMs: z.number().int().positive()
  })
  .strict();

export type MythConfig = z.infer<typeof MythConfigSchema>;

export const MythConfigOverridesSchema = MythConfigSchema.partial();
export type MythConfigOverrides = z.infer<typeof MythConfigOverridesSchema>;

export const DEFAULT_MYTH_CONFIG: Readonly<MythConfig> = Object.freeze({
  maxIterations: 2,
  acceptThreshold: 8,
  contextSizeBudget: 1200,
  toolRoundTripCap: 3,
  perCallTimeoutMs: 90_000
});

const CONFIG_ENV_VARS: ReadonlyArray<[keyof MythConfig, string]> = [
  ["maxIterations", "MYTH_MAX_ITERATIONS"],
  ["acceptThreshold", "MYTH_ACCEPT_THRESHOLD"],
  ["contextSizeBudget", "MYTH_CONTEXT_BUDGET_TOKENS"],
  ["toolRoundTripCap", "MYTH_TOOL_ROUND_TRIP_CAP"],
  ["perCallTimeoutMs", "MYTH_CALL_TIMEOUT_MS"]
];

export type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
}

function numberFromEnv(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigurationError(`${name} must be a number (got "${raw}")`);
  return value;
}

export function configOverridesFromEnv(env: Env = process.env): MythConfigOverrides {
  const out: MythConfigOverrides = {};
  for (const [key, name] of CONFIG_ENV_VARS) {
    const value = numberFromEnv(env, name);
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Defaults, then environment, then per-run overrides; the merged result is validated as a whole. */
export function resolveMythConfig(overrides: MythConfigOverrides = {}, env: Env = process.env): MythConfig {
  const merged = { ...DEFAULT_MYTH_CONFIG, ...configOverridesFromEnv(env), ...overrides };
  const parsed = MythConfigSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

export type PipelineMode = "live" | "fake";

export type BackendSettings = {
  mode: PipelineMode;
  model: string;
  temperature: number;
  openaiApiKey?: string;
  exaApiKey?: string;
  fakeDelayMs: number;
};

export const DEFAULT_MODEL = "gpt-4o";
const DEFAULT_TEMPERATURE = 0.7;

function trimmed(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v && v.length > 0 ? v : undefined;
}

export function pipelineModeFromEnv(env: Env = process.env): PipelineMode {
  return trimmed(env, "MYTH_PIPELINE_MODE")?.toLowerCase() === "fake" ? "fake" : "live";
}

export function backendSettingsFromEnv(env: Env = process.env): BackendSettings {
  const temperature = numberFromEnv(env, "MYTH_TEMPERATURE") ?? DEFAULT_TEMPERATURE;
  if (temperature < 0 || temperature > 2) throw new ConfigurationError(`MYTH_TEMPERATURE must be within [0, 2]`);
  const fakeDelay = numberFromEnv(env, "MYTH_FAKE_DELAY_MS") ?? 50;

  return {
    mode: pipelineModeFromEnv(env),
    model: trimmed(env, "MYTH_MODEL") ?? DEFAULT_MODEL,
    temperature,
    openaiApiKey: trimmed(env, "OPENAI_API_KEY"),
    exaApiKey: trimmed(env, "EXA_API_KEY"),
    fakeDelayMs: Math.min(2000, Math.max(0, fakeDelay))
  };
}
