// Plausibility checks on a built model

import type { ModelValidator } from "../pipeline/steps.js";
import { MAX_TIME_HORIZON } from "./types.js";
import type { ModelStructure, ValidationResult } from "./types.js";

const CRITICAL_PARAMETERS = ["intervention_cost", "comparator_cost", "utility"];

export function checkParameters(model: ModelStructure): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const [key, estimate] of Object.entries(model.parameters)) {
    const name = key.toLowerCase();
    const value = estimate.value;

    if (name.includes("prob") && (value < 0 || value > 1)) {
      errors.push(`Probability ${key} = ${value} not in [0, 1]`);
    }
    if (name.includes("utility")) {
      if (value < 0 || value > 1) errors.push(`Utility ${key} = ${value} not in [0, 1]`);
      if (value > 0.95) warnings.push(`Utility ${key} = ${value} seems very high`);
    }
    if (name.includes("cost") && value < 0) {
      errors.push(`Cost ${key} = ${value} is negative`);
    }
    if (estimate.low > estimate.high) {
      warnings.push(`Range for ${key} is inverted (${estimate.low} > ${estimate.high})`);
    }
  }

  const keys = Object.keys(model.parameters).map((k) => k.toLowerCase());
  for (const param of CRITICAL_PARAMETERS) {
    if (!keys.some((k) => k.includes(param))) warnings.push(`Missing ${param} parameter`);
  }

  return { errors, warnings, suggestions: [] };
}

/** Time horizon, discount rate and WTP checked against the request bounds. */
export function checkSettings(model: ModelStructure): ValidationResult {
  const errors: string[] = [];
  const { timeHorizon, discountRate, wtpThreshold } = model.settings;

  if (!Number.isInteger(timeHorizon) || timeHorizon < 1 || timeHorizon > MAX_TIME_HORIZON) {
    errors.push(`Time horizon ${timeHorizon} must be a whole number of years in [1, ${MAX_TIME_HORIZON}]`);
  }
  if (!(discountRate >= 0 && discountRate <= 1)) {
    errors.push(`Discount rate ${discountRate} not in [0, 1]`);
  }
  if (!(wtpThreshold > 0) || !Number.isFinite(wtpThreshold)) {
    errors.push(`Willingness-to-pay threshold ${wtpThreshold} must be positive`);
  }
  return { errors, warnings: [], suggestions: [] };
}

export function checkStructure(model: ModelStructure): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  if (model.modelType !== "markov") return { errors, warnings, suggestions: [] };

  if (model.states.length === 0) errors.push("Missing states definition");
  if (!model.transitionMatrix) {
    errors.push("Missing transition matrix");
  } else {
    for (const [state, transitions] of Object.entries(model.transitionMatrix)) {
      const total = Object.values(transitions).reduce((sum, p) => sum + p, 0);
      if (total < 0.99 || total > 1.01) {
        warnings.push(`Transitions from ${state} sum to ${Math.round(total * 1e4) / 1e4}, not 1.0`);
      }
    }
  }
  return { errors, warnings, suggestions: [] };
}

export class RuleBasedValidator implements ModelValidator {
  async validate(model: ModelStructure): Promise<ValidationResult> {
    const settings = checkSettings(model);
    const params = checkParameters(model);
    const structure = checkStructure(model);

    const errors = [...settings.errors, ...structure.errors, ...params.errors];
    const warnings = [...structure.warnings, ...params.warnings];
    const suggestions: string[] = [];

    if (model.settings.timeHorizon < 5 && model.modelType !== "decision_tree") {
      suggestions.push("Consider a longer time horizon for a state-transition model");
    }
    if (errors.length === 0 && warnings.length === 0) {
      suggestions.push("Model parameters look good");
    }
    return { errors, warnings, suggestions };
  }
}
