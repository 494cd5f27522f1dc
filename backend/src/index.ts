// Analysis pipeline backend entry point
import "dotenv/config";

import { Client, retryMiddleware } from "./llm/client.js";
import { OpenRouterAdapter } from "./llm/openrouter.js";
import { loadConfig } from "./config.js";
import { KeywordRequestParser } from "./analysis/parser.js";
import { LLMRequestParser } from "./analysis/llm_parser.js";
import { CatalogueEvidenceProvider, loadEvidenceCatalogue } from "./analysis/evidence.js";
import { EvidenceModelBuilder } from "./analysis/model.js";
import { RuleBasedValidator } from "./analysis/validator.js";
import { SimulatedComputationEngine } from "./analysis/compute.js";
import { MarkdownReportRenderer } from "./analysis/report.js";
import { createDefaultRegistry } from "./pipeline/steps.js";
import type { RequestParser } from "./pipeline/steps.js";
import { PipelineEngine } from "./pipeline/engine.js";
import { ModePolicy } from "./pipeline/policy.js";
import { Router } from "./pipeline/router.js";
import { InMemoryCheckpointStore } from "./store/checkpoints.js";
import type { CheckpointStore } from "./store/checkpoints.js";
import { SqliteCheckpointStore } from "./store/sqlite.js";
import { createApp } from "./api/server.js";

const config = loadConfig();

// ── Request parser ────────────────────────────────────────────────────────────
const keywordParser = new KeywordRequestParser({
  modelType: "markov",
  timeHorizon: config.timeHorizon,
  discountRate: config.discountRate,
  wtpThreshold: config.wtpThreshold,
});

let parser: RequestParser = keywordParser;
if (config.openRouterKey) {
  const llmClient = new Client();
  llmClient.register(new OpenRouterAdapter(config.openRouterKey), true);
  llmClient.use(retryMiddleware());
  parser = new LLMRequestParser(llmClient, config.model, keywordParser);
  console.log(`✓ OpenRouter adapter registered (model: ${config.model})`);
} else {
  console.warn("⚠ No OPEN_ROUTER_KEY found, parsing requests with keyword rules");
}

// ── Pipeline ──────────────────────────────────────────────────────────────────
const registry = createDefaultRegistry({
  parser,
  evidence: new CatalogueEvidenceProvider(loadEvidenceCatalogue()),
  builder: new EvidenceModelBuilder(),
  validator: new RuleBasedValidator(),
  computation: new SimulatedComputationEngine({ simulations: config.psaSimulations, seed: config.psaSeed }),
  reporter: new MarkdownReportRenderer(),
});
registry.assertComplete();

const store: CheckpointStore =
  config.checkpointStore === "sqlite"
    ? new SqliteCheckpointStore(config.checkpointDbPath)
    : new InMemoryCheckpointStore();
console.log(`[store] Using ${config.checkpointStore} checkpoint store`);

const policy = new ModePolicy();
const engine = new PipelineEngine({ registry, store, router: new Router(policy) });

// ── HTTP / WebSocket server ───────────────────────────────────────────────────
const { httpServer } = createApp(engine, {
  store,
  policy,
  defaultMode: config.defaultMode,
  frontendUrl: config.frontendUrl,
});

httpServer.listen(config.port, () => {
  console.log(`Analysis backend running on http://localhost:${config.port}`);
  console.log(`WebSocket endpoint: ws://localhost:${config.port}/ws?runId=<id>`);
});
