import express from "express";
import cors from "cors";
import { z } from "zod";
import type { RunControl } from "./executor.js";
import type { RunManager } from "./run_manager.js";
import { MythConfigOverridesSchema, resolveMythConfig, type BackendSettings, type Env } from "./config.js";
import { ConfigurationError, UnsupportedFormat } from "./pipeline/errors.js";
import { ingestImage, MAX_IMAGE_BYTES, type DecodedImage } from "./pipeline/image.js";

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

const CreateRunBodySchema = z
  .object({
    location: z.string().trim().min(1).max(200),
    image: z
      .object({
        mediaType: z.string().trim().min(1).max(100),
        data: z
          .string()
          .transform((s) => s.replace(/\s+/g, ""))
          .refine((s) => s.length > 0 && s.length % 4 === 0 && BASE64_RE.test(s), "image data must be base64")
      })
      .strict(),
    settings: MythConfigOverridesSchema.optional()
  })
  .strict();

export type AppOptions = {
  backend: Pick<BackendSettings, "mode" | "model" | "openaiApiKey" | "exaApiKey">;
  env?: Env;
};

// base64 inflates by 4/3; leave headroom for the rest of the body.
const JSON_LIMIT_BYTES = Math.ceil((MAX_IMAGE_BYTES * 4) / 3) + 64 * 1024;

export function createApp(runs: RunManager, executor: RunControl, options: AppOptions) {
  const env = options.env ?? process.env;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: JSON_LIMIT_BYTES }));

  app.get("/api/health", (_req, res) => {
    let config: unknown;
    try {
      config = resolveMythConfig({}, env);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      res.status(500).json({ ok: false, error: err.message });
      return;
    }

    res.json({
      ok: true,
      pipelineMode: options.backend.mode,
      model: options.backend.model,
      hasOpenAIKey: Boolean(options.backend.openaiApiKey),
      hasExaKey: Boolean(options.backend.exaApiKey),
      config
    });
  });

  app.post("/api/runs", (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }
    const { location, image, settings } = parsed.data;

    try {
      resolveMythConfig(settings ?? {}, env);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      res.status(400).json({ error: err.message });
      return;
    }

    let decoded: DecodedImage;
    try {
      decoded = ingestImage(Buffer.from(image.data, "base64"), image.mediaType);
    } catch (err) {
      if (!(err instanceof UnsupportedFormat)) throw err;
      res.status(415).json({ error: err.message });
      return;
    }

    const run = runs.createRun(location, decoded, settings);
    res.json({ runId: run.runId });

    executor.enqueue(run.runId);
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.get("/api/runs/:runId/trace", (req, res) => {
    const trace = runs.getTrace(req.params.runId);
    if (!trace) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(trace);
  });

  app.post("/api/runs/:runId/cancel", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = executor.cancel(run.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  return app;
}
