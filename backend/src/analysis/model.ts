// Model structure construction from parsed attributes and evidence

import type { ModelBuilder } from "../pipeline/steps.js";
import type {
  EvidenceItem,
  ModelStructure,
  ModelType,
  ParameterEstimate,
  ParsedAttributes,
} from "./types.js";

const STATES: Record<ModelType, string[]> = {
  decision_tree: ["Response", "No response"],
  markov: ["Healthy", "Diseased", "Dead"],
  psm: ["Progression-free", "Progressed", "Dead"],
};

/** Evidence parameter → model parameter, for estimates used as-is. */
const DIRECT_MAPPINGS: ReadonlyArray<readonly [string, string]> = [
  ["intervention_cost_annual", "intervention_cost"],
  ["comparator_cost_annual", "comparator_cost"],
  ["utility_diseased", "utility_comparator"],
  ["intervention_efficacy_rr", "efficacy_rr"],
  ["prob_progression", "prob_progression"],
  ["prob_death", "prob_death"],
  ["hazard_ratio_pfs", "hazard_ratio_pfs"],
  ["hazard_ratio_os", "hazard_ratio_os"],
];

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function toEstimate(item: EvidenceItem): ParameterEstimate {
  return { value: item.value, low: item.low, high: item.high, source: item.source };
}

/**
 * Utility on treatment: the comparator (diseased) utility plus the share of
 * the healthy-diseased gap that the relative risk removes.
 */
export function treatedUtility(healthy: number, diseased: number, relativeRisk: number): number {
  return round(diseased + (healthy - diseased) * (1 - relativeRisk), 4);
}

function deriveInterventionUtility(evidence: Map<string, EvidenceItem>): ParameterEstimate | undefined {
  const healthy = evidence.get("utility_healthy");
  const diseased = evidence.get("utility_diseased");
  const rr = evidence.get("intervention_efficacy_rr");
  if (!healthy || !diseased || !rr) return undefined;
  return {
    value: treatedUtility(healthy.value, diseased.value, rr.value),
    // A higher relative risk means less benefit, so the bounds swap.
    low: treatedUtility(healthy.value, diseased.value, rr.high),
    high: treatedUtility(healthy.value, diseased.value, rr.low),
    source: `Derived from ${rr.source}`,
  };
}

export function buildTransitionMatrix(
  progression: number,
  death: number,
): Record<string, Record<string, number>> {
  // Diseased patients die at twice the background rate.
  const diseasedDeath = Math.min(1, death * 2);
  return {
    Healthy: {
      Healthy: round(1 - progression - death, 4),
      Diseased: progression,
      Dead: death,
    },
    Diseased: {
      Diseased: round(1 - diseasedDeath, 4),
      Dead: round(diseasedDeath, 4),
    },
    Dead: { Dead: 1 },
  };
}

export class EvidenceModelBuilder implements ModelBuilder {
  async build(attributes: ParsedAttributes, evidence: EvidenceItem[]): Promise<ModelStructure> {
    const byName = new Map(evidence.map((e) => [e.parameter, e]));
    const parameters: Record<string, ParameterEstimate> = {};

    for (const [from, to] of DIRECT_MAPPINGS) {
      const item = byName.get(from);
      if (item) parameters[to] = toEstimate(item);
    }
    const treated = deriveInterventionUtility(byName);
    if (treated) parameters.utility_intervention = treated;

    const structure: ModelStructure = {
      modelType: attributes.modelType,
      intervention: attributes.intervention,
      comparator: attributes.comparator,
      states: [...STATES[attributes.modelType]],
      parameters,
      settings: {
        timeHorizon: attributes.timeHorizon,
        discountRate: attributes.discountRate,
        wtpThreshold: attributes.wtpThreshold,
      },
    };

    if (attributes.modelType === "markov") {
      const progression = byName.get("prob_progression");
      const death = byName.get("prob_death");
      if (progression && death) {
        structure.transitionMatrix = buildTransitionMatrix(progression.value, death.value);
      }
    }

    return structure;
  }
}
