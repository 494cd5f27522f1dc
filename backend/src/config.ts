// Process configuration read from environment variables

import { parseMode } from "./pipeline/policy.js";
import type { OperatingMode } from "./pipeline/types.js";

export type CheckpointStoreKind = "memory" | "sqlite";

export interface AppConfig {
  port: number;
  defaultMode: OperatingMode;
  checkpointStore: CheckpointStoreKind;
  checkpointDbPath: string;
  openRouterKey?: string;
  model: string;
  timeHorizon: number;
  discountRate: number;
  wtpThreshold: number;
  psaSimulations: number;
  psaSeed: number;
  frontendUrl: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3001,
  defaultMode: "PARTIAL_AUTOMATION",
  checkpointStore: "memory",
  checkpointDbPath: "./data/checkpoints.db",
  model: "moonshotai/kimi-k2",
  timeHorizon: 10,
  discountRate: 0.03,
  wtpThreshold: 50000,
  psaSimulations: 1000,
  psaSeed: 42,
  frontendUrl: "http://localhost:5173",
};

type Env = Record<string, string | undefined>;

interface NumberRule {
  integer?: boolean;
  min?: number;
  max?: number;
}

function readNumber(env: Env, name: string, fallback: number, rule: NumberRule = {}): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  const valid =
    Number.isFinite(value) &&
    (!rule.integer || Number.isInteger(value)) &&
    (rule.min === undefined || value >= rule.min) &&
    (rule.max === undefined || value <= rule.max);
  if (!valid) {
    console.warn(`[config] Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  let defaultMode = DEFAULT_CONFIG.defaultMode;
  if (env.DEFAULT_MODE) {
    const mode = parseMode(env.DEFAULT_MODE);
    if (mode) defaultMode = mode;
    else console.warn(`[config] Unknown DEFAULT_MODE=${env.DEFAULT_MODE}, using ${defaultMode}`);
  }

  let checkpointStore = DEFAULT_CONFIG.checkpointStore;
  const storeKind = env.CHECKPOINT_STORE?.trim().toLowerCase();
  if (storeKind === "memory" || storeKind === "sqlite") checkpointStore = storeKind;
  else if (storeKind) console.warn(`[config] Unknown CHECKPOINT_STORE=${storeKind}, using ${checkpointStore}`);

  const openRouterKey = env.OPEN_ROUTER_KEY ?? env.OPENROUTER_API_KEY;

  return {
    port: readNumber(env, "PORT", DEFAULT_CONFIG.port, { integer: true, min: 0, max: 65535 }),
    defaultMode,
    checkpointStore,
    checkpointDbPath: env.CHECKPOINT_DB_PATH || DEFAULT_CONFIG.checkpointDbPath,
    ...(openRouterKey ? { openRouterKey } : {}),
    model: env.DEFAULT_MODEL || DEFAULT_CONFIG.model,
    timeHorizon: readNumber(env, "DEFAULT_TIME_HORIZON", DEFAULT_CONFIG.timeHorizon, { integer: true, min: 1, max: 100 }),
    discountRate: readNumber(env, "DEFAULT_DISCOUNT_RATE", DEFAULT_CONFIG.discountRate, { min: 0, max: 1 }),
    wtpThreshold: readNumber(env, "DEFAULT_WTP_THRESHOLD", DEFAULT_CONFIG.wtpThreshold, { min: 0 }),
    psaSimulations: readNumber(env, "PSA_SIMULATIONS", DEFAULT_CONFIG.psaSimulations, { integer: true, min: 1 }),
    psaSeed: readNumber(env, "PSA_SEED", DEFAULT_CONFIG.psaSeed, { integer: true }),
    frontendUrl: env.FRONTEND_URL || DEFAULT_CONFIG.frontendUrl,
  };
}
