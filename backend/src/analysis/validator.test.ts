import { describe, it, expect } from "vitest";
import { RuleBasedValidator, checkParameters, checkSettings, checkStructure } from "./validator.js";
import type { ModelStructure, ParameterEstimate } from "./types.js";

const validator = new RuleBasedValidator();

const sound: Record<string, ParameterEstimate> = {
  intervention_cost: { value: 15000, low: 12000, high: 18000 },
  comparator_cost: { value: 5000, low: 4000, high: 6000 },
  utility_intervention: { value: 0.7, low: 0.68, high: 0.72 },
  utility_comparator: { value: 0.65, low: 0.58, high: 0.72 },
};

function model(overrides: Partial<ModelStructure> = {}): ModelStructure {
  return {
    modelType: "decision_tree",
    intervention: "A",
    comparator: "B",
    states: ["Response", "No response"],
    parameters: sound,
    settings: { timeHorizon: 10, discountRate: 0.03, wtpThreshold: 50000 },
    ...overrides,
  };
}

describe("RuleBasedValidator", () => {
  it("passes a sound model", async () => {
    expect(await validator.validate(model())).toEqual({
      errors: [],
      warnings: [],
      suggestions: ["Model parameters look good"],
    });
  });

  it("flags out-of-range values", async () => {
    const result = await validator.validate(
      model({
        parameters: {
          ...sound,
          intervention_cost: { value: -5, low: -10, high: 0 },
          utility_intervention: { value: 0.97, low: 0.95, high: 0.99 },
          prob_death: { value: 1.2, low: 1, high: 1.4 },
        },
      }),
    );
    expect(result.errors).toEqual(["Cost intervention_cost = -5 is negative", "Probability prob_death = 1.2 not in [0, 1]"]);
    expect(result.warnings).toEqual(["Utility utility_intervention = 0.97 seems very high"]);
    expect(result.suggestions).toEqual([]);
  });

  it("puts structural errors ahead of parameter errors", async () => {
    const result = await validator.validate(
      model({
        modelType: "markov",
        states: ["Healthy", "Dead"],
        parameters: { ...sound, utility_comparator: { value: 1.5, low: 1.4, high: 1.6 } },
      }),
    );
    expect(result.errors).toEqual(["Missing transition matrix", "Utility utility_comparator = 1.5 not in [0, 1]"]);
  });

  it("reports out-of-range settings ahead of other errors", async () => {
    const result = await validator.validate(
      model({
        settings: { timeHorizon: 200000000, discountRate: -1, wtpThreshold: 50000 },
        parameters: { ...sound, comparator_cost: { value: -1, low: -2, high: 0 } },
      }),
    );
    expect(result.errors).toEqual([
      "Time horizon 200000000 must be a whole number of years in [1, 100]",
      "Discount rate -1 not in [0, 1]",
      "Cost comparator_cost = -1 is negative",
    ]);
    expect(result.suggestions).toEqual([]);
  });

  it("suggests a longer horizon for short state-transition models", async () => {
    const result = await validator.validate(
      model({
        modelType: "psm",
        states: ["Progression-free", "Progressed", "Dead"],
        settings: { timeHorizon: 2, discountRate: 0.03, wtpThreshold: 50000 },
      }),
    );
    expect(result.suggestions).toEqual([
      "Consider a longer time horizon for a state-transition model",
      "Model parameters look good",
    ]);
  });
});

describe("checkParameters", () => {
  it("warns about missing critical parameters and inverted ranges", () => {
    const result = checkParameters(model({ parameters: { efficacy_rr: { value: 0.75, low: 0.85, high: 0.65 } } }));
    expect(result.warnings).toEqual([
      "Range for efficacy_rr is inverted (0.85 > 0.65)",
      "Missing intervention_cost parameter",
      "Missing comparator_cost parameter",
      "Missing utility parameter",
    ]);
  });
});

describe("checkStructure", () => {
  it("ignores models without states to transition between", () => {
    expect(checkStructure(model({ transitionMatrix: undefined }))).toEqual({ errors: [], warnings: [], suggestions: [] });
  });

  it("checks that transitions from each state sum to one", () => {
    const result = checkStructure(
      model({
        modelType: "markov",
        states: ["Healthy", "Dead"],
        transitionMatrix: { Healthy: { Healthy: 0.5, Dead: 0.3 }, Dead: { Dead: 1 } },
      }),
    );
    expect(result).toEqual({ errors: [], warnings: ["Transitions from Healthy sum to 0.8, not 1.0"], suggestions: [] });
  });

  it("requires states on a Markov model", () => {
    const result = checkStructure(
      model({ modelType: "markov", states: [], transitionMatrix: { Dead: { Dead: 1 } } }),
    );
    expect(result.errors).toEqual(["Missing states definition"]);
  });
});

describe("checkSettings", () => {
  it("accepts settings inside the bounds", () => {
    expect(checkSettings(model({ settings: { timeHorizon: 100, discountRate: 0, wtpThreshold: 1 } })).errors).toEqual([]);
  });

  it("rejects a fractional horizon, a NaN discount rate and a zero threshold", () => {
    expect(checkSettings(model({ settings: { timeHorizon: 2.5, discountRate: NaN, wtpThreshold: 0 } })).errors).toEqual([
      "Time horizon 2.5 must be a whole number of years in [1, 100]",
      "Discount rate NaN not in [0, 1]",
      "Willingness-to-pay threshold 0 must be positive",
    ]);
  });
});
