// Base case, one-way (deterministic) and probabilistic sensitivity computation

import type { ComputationEngine } from "../pipeline/steps.js";
import { round } from "./model.js";
import type {
  BaseCaseResult,
  DeterministicSensitivityResult,
  ModelSettings,
  ModelStructure,
  ParameterEstimate,
  ProbabilisticSensitivityResult,
  TornadoBar,
} from "./types.js";

/** Parameters the ICER depends on directly. */
export const ICER_DRIVERS = [
  "intervention_cost",
  "comparator_cost",
  "utility_intervention",
  "utility_comparator",
] as const;
type Driver = (typeof ICER_DRIVERS)[number];
type DriverValues = Record<Driver, number>;

const Z_975 = 1.959964;
const CEAC_STEP = 5000;
const CEAC_POINTS = 31;
const KEPT_DRAWS = 100;

// ─── Deterministic helpers ────────────────────────────────────────────────────

/** Sum of annual discount weights for years 0..timeHorizon-1. */
export function discountFactor(timeHorizon: number, discountRate: number): number {
  let total = 0;
  for (let t = 0; t < timeHorizon; t++) total += 1 / (1 + discountRate) ** t;
  return total;
}

interface Outcomes {
  interventionCost: number;
  interventionQalys: number;
  comparatorCost: number;
  comparatorQalys: number;
  incrementalCost: number;
  incrementalQalys: number;
}

function evaluate(values: DriverValues, factor: number): Outcomes {
  const interventionCost = values.intervention_cost * factor;
  const comparatorCost = values.comparator_cost * factor;
  const interventionQalys = values.utility_intervention * factor;
  const comparatorQalys = values.utility_comparator * factor;
  return {
    interventionCost,
    interventionQalys,
    comparatorCost,
    comparatorQalys,
    incrementalCost: interventionCost - comparatorCost,
    incrementalQalys: interventionQalys - comparatorQalys,
  };
}

function icerOf(outcomes: Pick<Outcomes, "incrementalCost" | "incrementalQalys">): number | null {
  return outcomes.incrementalQalys === 0 ? null : outcomes.incrementalCost / outcomes.incrementalQalys;
}

function driverValues(parameters: Record<string, ParameterEstimate>): DriverValues {
  const pick = (name: Driver): number => {
    const estimate = parameters[name];
    if (!estimate) throw new Error(`Base case requires parameter ${name}`);
    return estimate.value;
  };
  return {
    intervention_cost: pick("intervention_cost"),
    comparator_cost: pick("comparator_cost"),
    utility_intervention: pick("utility_intervention"),
    utility_comparator: pick("utility_comparator"),
  };
}

function isDriver(name: string): name is Driver {
  return ICER_DRIVERS.some((d) => d === name);
}

export function computeBaseCase(
  parameters: Record<string, ParameterEstimate>,
  settings: ModelSettings,
): BaseCaseResult {
  const outcomes = evaluate(driverValues(parameters), discountFactor(settings.timeHorizon, settings.discountRate));
  const icer = icerOf(outcomes);
  return {
    interventionCost: round(outcomes.interventionCost, 2),
    interventionQalys: round(outcomes.interventionQalys, 4),
    comparatorCost: round(outcomes.comparatorCost, 2),
    comparatorQalys: round(outcomes.comparatorQalys, 4),
    incrementalCost: round(outcomes.incrementalCost, 2),
    incrementalQalys: round(outcomes.incrementalQalys, 4),
    icer: icer === null ? null : round(icer, 2),
    nmb: round(outcomes.incrementalQalys * settings.wtpThreshold - outcomes.incrementalCost, 2),
    inputs: { parameters: structuredClone(parameters), settings: { ...settings } },
  };
}

export function computeTornado(primary: BaseCaseResult): DeterministicSensitivityResult {
  const { parameters, settings } = primary.inputs;
  const base = driverValues(parameters);
  const factor = discountFactor(settings.timeHorizon, settings.discountRate);

  const icerWith = (name: Driver, value: number): number | null => {
    const icer = icerOf(evaluate({ ...base, [name]: value }, factor));
    return icer === null ? null : round(icer, 2);
  };

  const tornado: TornadoBar[] = [];
  for (const [name, estimate] of Object.entries(parameters)) {
    if (!isDriver(name)) continue;
    const icerLow = icerWith(name, estimate.low);
    const icerHigh = icerWith(name, estimate.high);
    tornado.push({
      parameter: name,
      baseValue: estimate.value,
      lowValue: estimate.low,
      highValue: estimate.high,
      icerLow,
      icerHigh,
      impact: icerLow === null || icerHigh === null ? 0 : round(Math.abs(icerHigh - icerLow), 2),
    });
  }

  tornado.sort((a, b) => b.impact - a.impact || a.parameter.localeCompare(b.parameter));
  return {
    baseIcer: primary.icer,
    tornado,
    mostSensitive: tornado.slice(0, 5).map((bar) => bar.parameter),
  };
}

// ─── Probabilistic ────────────────────────────────────────────────────────────

/** Small seeded PRNG (mulberry32); returns floats in [0, 1). */
export function createRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function normalSampler(random: () => number): (mean: number, sd: number) => number {
  return (mean, sd) => {
    const u1 = 1 - random();
    const u2 = random();
    return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };
}

/** Linear-interpolated percentile of an ascending array. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) throw new Error("percentile of an empty sample");
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

function clampDraw(name: Driver, value: number): number {
  if (name.startsWith("utility")) return Math.min(1, Math.max(0, value));
  return Math.max(0, value);
}

export interface SimulationOptions {
  simulations: number;
  seed: number;
}

export function runSimulation(
  primary: BaseCaseResult,
  extendedA: DeterministicSensitivityResult,
  options: SimulationOptions,
): ProbabilisticSensitivityResult {
  if (!Number.isInteger(options.simulations) || options.simulations <= 0) {
    throw new Error(`simulations must be a positive integer, got ${options.simulations}`);
  }
  const { parameters, settings } = primary.inputs;
  const base = driverValues(parameters);
  const factor = discountFactor(settings.timeHorizon, settings.discountRate);

  const fromTornado = extendedA.tornado.map((bar) => bar.parameter).filter(isDriver);
  const sampled: Driver[] = fromTornado.length > 0 ? fromTornado : ICER_DRIVERS.filter((d) => d in parameters);

  const sample = normalSampler(createRandom(options.seed));
  const costs: number[] = [];
  const qalys: number[] = [];

  for (let i = 0; i < options.simulations; i++) {
    const values: DriverValues = { ...base };
    for (const name of sampled) {
      const estimate = parameters[name];
      const sd = (estimate.high - estimate.low) / (2 * Z_975);
      values[name] = sd > 0 ? clampDraw(name, sample(estimate.value, sd)) : estimate.value;
    }
    const outcome = evaluate(values, factor);
    costs.push(outcome.incrementalCost);
    qalys.push(outcome.incrementalQalys);
  }

  const n = options.simulations;
  const probabilityAt = (wtp: number): number => {
    let count = 0;
    for (let i = 0; i < n; i++) if (qalys[i] * wtp - costs[i] > 0) count++;
    return count / n;
  };

  const ceac = Array.from({ length: CEAC_POINTS }, (_, i) => {
    const wtp = i * CEAC_STEP;
    return { wtp, probability: probabilityAt(wtp) };
  });

  const meanCost = costs.reduce((s, c) => s + c, 0) / n;
  const meanQalys = qalys.reduce((s, q) => s + q, 0) / n;
  const meanIcer = icerOf({ incrementalCost: meanCost, incrementalQalys: meanQalys });

  const icers = costs
    .map((c, i) => icerOf({ incrementalCost: c, incrementalQalys: qalys[i] }))
    .filter((v): v is number => v !== null)
    .sort((a, b) => a - b);

  return {
    simulations: n,
    seed: options.seed,
    sampledParameters: sampled,
    draws: costs.slice(0, KEPT_DRAWS).map((c, i) => ({ cost: round(c, 2), qalys: round(qalys[i], 4) })),
    ceac,
    meanIncrementalCost: round(meanCost, 2),
    meanIncrementalQalys: round(meanQalys, 4),
    meanIcer: meanIcer === null ? null : round(meanIcer, 2),
    credibleInterval:
      icers.length === 0 ? null : [round(percentile(icers, 2.5), 2), round(percentile(icers, 97.5), 2)],
    probabilityCostEffective: probabilityAt(settings.wtpThreshold),
  };
}

// ─── Engine adapter ───────────────────────────────────────────────────────────

export class SimulatedComputationEngine implements ComputationEngine {
  constructor(private options: SimulationOptions = { simulations: 1000, seed: 42 }) {}

  async computeBase(model: ModelStructure): Promise<BaseCaseResult> {
    return computeBaseCase(model.parameters, model.settings);
  }

  async computeExtendedA(primary: BaseCaseResult): Promise<DeterministicSensitivityResult> {
    return computeTornado(primary);
  }

  async computeExtendedB(
    primary: BaseCaseResult,
    extendedA: DeterministicSensitivityResult,
  ): Promise<ProbabilisticSensitivityResult> {
    return runSimulation(primary, extendedA, this.options);
  }
}
