// REST + WebSocket API server

import express from "express";
import type { ErrorRequestHandler, Response } from "express";
import cors from "cors";
import { createServer } from "http";
import { WebSocketServer, WebSocket } from "ws";
import { z } from "zod";
import { AnalysisRequestSchema } from "../analysis/types.js";
import type { PipelineEngine } from "../pipeline/engine.js";
import { describeCause, isPipelineError } from "../pipeline/errors.js";
import type { PipelineErrorCode } from "../pipeline/errors.js";
import { ModePolicy, parseMode } from "../pipeline/policy.js";
import type { OperatingMode, PipelineEvent, RunResult } from "../pipeline/types.js";
import type { CheckpointStore } from "../store/checkpoints.js";

export interface AppOptions {
  store: CheckpointStore;
  policy?: ModePolicy;
  defaultMode: OperatingMode;
  frontendUrl: string;
}

const StartRunBodySchema = z.object({
  request: AnalysisRequestSchema,
  mode: z.string().optional(),
});

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  CHECKPOINT_NOT_FOUND: 404,
  CHECKPOINT_ALREADY_CONSUMED: 409,
  INVALID_DECISION: 400,
  CONTRACT_VIOLATION: 500,
  STEP_EXECUTION_ERROR: 500,
};

function sendError(res: Response, err: unknown): void {
  if (isPipelineError(err)) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
    return;
  }
  console.error(`[api] Unhandled error: ${describeCause(err)}`);
  res.status(500).json({ error: describeCause(err), code: "INTERNAL_ERROR" });
}

function badRequest(res: Response, message: string): void {
  res.status(400).json({ error: message, code: "BAD_REQUEST" });
}

function summarizeRun(result: RunResult) {
  return {
    runId: result.state.runId,
    mode: result.state.mode,
    status: result.status,
    currentStep: result.state.currentStep,
    checkpointId: result.checkpointId,
    createdAt: result.state.createdAt,
    updatedAt: result.state.updatedAt,
  };
}

// Malformed JSON bodies surface here from express.json()
const handleBodyErrors: ErrorRequestHandler = (err, _req, res, next) => {
  if (err instanceof SyntaxError) {
    badRequest(res, `Malformed JSON body: ${err.message}`);
    return;
  }
  next(err);
};

export function createApp(engine: PipelineEngine, options: AppOptions) {
  const policy = options.policy ?? new ModePolicy();

  const app = express();
  app.use(cors({
    origin: options.frontendUrl,
    credentials: true,
  }));
  app.use(express.json({ limit: "2mb" }));
  app.use(handleBodyErrors);

  // GET /api/health
  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, timestamp: new Date().toISOString() });
  });

  // GET /api/modes: operating modes with their routing rules
  app.get("/api/modes", (_req, res) => {
    res.json({ defaultMode: options.defaultMode, modes: policy.describe() });
  });

  // ── Runs ─────────────────────────────────────────────────────────────────────

  app.get("/api/runs", (_req, res) => {
    res.json(engine.listRuns().map(summarizeRun));
  });

  // GET /api/runs/:id: latest result of a run
  app.get("/api/runs/:id", (req, res) => {
    const run = engine.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: "Run not found", code: "RUN_NOT_FOUND" });
      return;
    }
    res.json(run);
  });

  // POST /api/runs: start a new pipeline run
  app.post("/api/runs", async (req, res) => {
    const body = StartRunBodySchema.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
      return;
    }
    let mode = options.defaultMode;
    if (body.data.mode !== undefined) {
      const parsed = parseMode(body.data.mode);
      if (!parsed) {
        badRequest(res, `Unknown mode: ${body.data.mode}`);
        return;
      }
      mode = parsed;
    }
    try {
      const result = await engine.start(body.data.request, mode);
      res.status(201).json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── Checkpoints ──────────────────────────────────────────────────────────────

  app.get("/api/checkpoints", async (_req, res) => {
    try {
      res.json(await options.store.listPending());
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /api/checkpoints/:id/resume: apply the reviewer's decision
  app.post("/api/checkpoints/:id/resume", async (req, res) => {
    try {
      const result = await engine.resume(req.params.id, req.body);
      res.json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── WebSocket ─────────────────────────────────────────────────────────────────
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer, path: "/ws" });

  wss.on("connection", (ws: WebSocket, req) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const runId = url.searchParams.get("runId");

    const send = (event: PipelineEvent) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(event));
      }
    };

    // Without a runId the socket follows every run
    if (runId) {
      const run = engine.getRun(runId);
      if (run) {
        ws.send(JSON.stringify({ type: "INITIAL_STATE", run }));
      }
    }
    const unsubscribe = runId ? engine.subscribe(runId, send) : engine.subscribeAll(send);

    ws.on("close", () => unsubscribe());
    ws.on("error", (err) => {
      console.warn(`[api] WebSocket error: ${err.message}`);
      unsubscribe();
    });
  });

  return { app, httpServer, wss };
}
