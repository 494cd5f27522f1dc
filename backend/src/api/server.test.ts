import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import WebSocket from "ws";
import { createApp } from "./server.js";
import { PipelineEngine } from "../pipeline/engine.js";
import { createDefaultRegistry } from "../pipeline/steps.js";
import { KeywordRequestParser } from "../analysis/parser.js";
import { CatalogueEvidenceProvider, loadEvidenceCatalogue } from "../analysis/evidence.js";
import { EvidenceModelBuilder } from "../analysis/model.js";
import { RuleBasedValidator } from "../analysis/validator.js";
import { SimulatedComputationEngine } from "../analysis/compute.js";
import { MarkdownReportRenderer } from "../analysis/report.js";
import { InMemoryCheckpointStore } from "../store/checkpoints.js";

const analysis = { query: "Markov model of semaglutide vs sitagliptin for type 2 diabetes over 10 years" };

let server: ReturnType<typeof createApp>;
let baseUrl: string;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});

  let n = 0;
  const store = new InMemoryCheckpointStore();
  const engine = new PipelineEngine({
    registry: createDefaultRegistry({
      parser: new KeywordRequestParser(),
      evidence: new CatalogueEvidenceProvider(loadEvidenceCatalogue()),
      builder: new EvidenceModelBuilder(),
      validator: new RuleBasedValidator(),
      computation: new SimulatedComputationEngine({ simulations: 100, seed: 1 }),
      reporter: new MarkdownReportRenderer(),
    }),
    store,
    generateId: () => `id-${++n}`,
  });
  server = createApp(engine, { store, defaultMode: "PARTIAL_AUTOMATION", frontendUrl: "http://ui.test" });
  await new Promise<void>((resolve) => server.httpServer.listen(0, resolve));
  const address = server.httpServer.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  for (const client of server.wss.clients) client.terminate();
  await new Promise<void>((resolve) => server.wss.close(() => resolve()));
  server.httpServer.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.httpServer.close((err) => (err ? reject(err) : resolve())));
  vi.restoreAllMocks();
});

interface Reply {
  status: number;
  body: unknown;
}

async function post(path: string, body: unknown): Promise<Reply> {
  const res = await fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  return { status: res.status, body: await res.json() };
}

async function get(path: string): Promise<Reply> {
  const res = await fetch(`${baseUrl}${path}`);
  return { status: res.status, body: await res.json() };
}

describe("REST API", () => {
  it("reports health and modes", async () => {
    expect((await get("/api/health")).body).toMatchObject({ ok: true });
    expect((await get("/api/modes")).body).toMatchObject({
      defaultMode: "PARTIAL_AUTOMATION",
      modes: [
        { mode: "MINIMAL_AUTOMATION", label: "AI-Assisted" },
        { mode: "PARTIAL_AUTOMATION", label: "AI-Augmented" },
        { mode: "FULL_AUTOMATION", label: "AI-Automated" },
      ],
    });
  });

  it("suspends a supervised run and resumes it once", async () => {
    const started = await post("/api/runs", { request: analysis });
    expect(started.status).toBe(201);
    expect(started.body).toMatchObject({ status: "SUSPENDED", checkpointId: "id-2" });

    const pending = await get("/api/checkpoints");
    expect(pending.body).toEqual([
      { id: "id-2", runId: "id-1", mode: "PARTIAL_AUTOMATION", createdAt: expect.any(String) },
    ]);

    const invalid = await post("/api/checkpoints/id-2/resume", { approved: "yes" });
    expect(invalid).toEqual({
      status: 400,
      body: { error: "Invalid decision: approved: expected boolean, received string", code: "INVALID_DECISION" },
    });

    const resumed = await post("/api/checkpoints/id-2/resume", { approved: true, commentary: "go ahead" });
    expect(resumed.status).toBe(200);
    expect(resumed.body).toMatchObject({
      status: "COMPLETED",
      state: { outputs: { reportText: expect.stringContaining("- Commentary: go ahead") } },
    });

    const again = await post("/api/checkpoints/id-2/resume", { approved: true });
    expect(again).toEqual({
      status: 409,
      body: { error: "Checkpoint already consumed: id-2", code: "CHECKPOINT_ALREADY_CONSUMED" },
    });
    expect((await get("/api/checkpoints")).body).toEqual([]);
  });

  it("returns 404 for unknown checkpoints and runs", async () => {
    expect(await post("/api/checkpoints/missing/resume", { approved: true })).toEqual({
      status: 404,
      body: { error: "Checkpoint not found: missing", code: "CHECKPOINT_NOT_FOUND" },
    });
    expect(await get("/api/runs/missing")).toEqual({
      status: 404,
      body: { error: "Run not found", code: "RUN_NOT_FOUND" },
    });
  });

  it("accepts mode aliases and lists runs", async () => {
    const started = await post("/api/runs", { request: analysis, mode: "ai-automated" });
    expect(started.body).toMatchObject({ status: "COMPLETED", state: { mode: "FULL_AUTOMATION" } });

    expect((await get("/api/runs")).body).toEqual([
      expect.objectContaining({ runId: "id-1", status: "COMPLETED", currentStep: "End" }),
    ]);
    expect((await get("/api/runs/id-1")).body).toMatchObject({ status: "COMPLETED" });
  });

  it("rejects bad input", async () => {
    expect(await post("/api/runs", { request: analysis, mode: "turbo" })).toEqual({
      status: 400,
      body: { error: "Unknown mode: turbo", code: "BAD_REQUEST" },
    });
    const empty = await post("/api/runs", { request: { query: "   " } });
    expect(empty).toMatchObject({ status: 400, body: { code: "BAD_REQUEST" } });

    const res = await fetch(`${baseUrl}/api/runs`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "BAD_REQUEST" });
  });
});

interface SocketMessage {
  type: string;
}

function isSocketMessage(value: unknown): value is SocketMessage {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}

function collect(socket: WebSocket, until: (msg: SocketMessage) => boolean): Promise<SocketMessage[]> {
  return new Promise((resolve, reject) => {
    const seen: SocketMessage[] = [];
    socket.on("message", (data) => {
      const msg: unknown = JSON.parse(String(data));
      if (!isSocketMessage(msg)) return;
      seen.push(msg);
      if (until(msg)) resolve(seen);
    });
    socket.on("error", reject);
  });
}

function open(path: string): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(`${baseUrl.replace("http", "ws")}${path}`);
    socket.on("open", () => resolve(socket));
    socket.on("error", reject);
  });
}

describe("WebSocket", () => {
  it("streams events of every run when no run id is given", async () => {
    const socket = await open("/ws");
    const events = collect(socket, (msg) => msg.type === "SUSPENDED");
    await post("/api/runs", { request: analysis });

    const types = (await events).map((e) => e.type);
    expect(types[0]).toBe("RUN_STARTED");
    expect(types[types.length - 1]).toBe("SUSPENDED");
    expect(types.filter((t) => t === "STEP_COMPLETED")).toHaveLength(4);
    socket.close();
  });

  it("sends the current state of a known run first", async () => {
    await post("/api/runs", { request: analysis });
    const socket = new WebSocket(`${baseUrl.replace("http", "ws")}/ws?runId=id-1`);
    const [first] = await collect(socket, () => true);
    expect(first).toMatchObject({ type: "INITIAL_STATE", run: { status: "SUSPENDED", checkpointId: "id-2" } });
    socket.close();
  });
});
