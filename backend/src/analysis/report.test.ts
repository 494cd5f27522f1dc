import { describe, it, expect } from "vitest";
import { createState, withControl, withUpdate } from "../pipeline/state.js";
import type { PipelineState } from "../pipeline/types.js";
import { computeBaseCase, computeTornado } from "./compute.js";
import { MarkdownReportRenderer, formatMoney, renderReport } from "./report.js";
import type { ModelStructure, ParsedAttributes } from "./types.js";

const attributes: ParsedAttributes = {
  projectName: "drug A vs drug B",
  diseaseArea: "asthma",
  intervention: "drug A",
  comparator: "drug B",
  modelType: "markov",
  analysisType: "cost-utility",
  perspective: "healthcare payer",
  timeHorizon: 10,
  discountRate: 0,
  wtpThreshold: 50000,
  summary: "Markov cost-utility analysis of drug A vs drug B in asthma over 10 years",
};

const structure: ModelStructure = {
  modelType: "markov",
  intervention: "drug A",
  comparator: "drug B",
  states: ["Healthy", "Diseased", "Dead"],
  parameters: {
    intervention_cost: { value: 15000, low: 12000, high: 18000 },
    comparator_cost: { value: 5000, low: 4000, high: 6000 },
    utility_intervention: { value: 0.7, low: 0.68, high: 0.72 },
    utility_comparator: { value: 0.65, low: 0.58, high: 0.72 },
  },
  settings: { timeHorizon: 10, discountRate: 0, wtpThreshold: 50000 },
};

function validated(): PipelineState {
  let state = createState("run-1", "PARTIAL_AUTOMATION", { query: "drug A vs drug B for asthma" });
  state = withUpdate(state, "Parse", { parsedAttributes: attributes });
  state = withUpdate(state, "Retrieve", { evidence: [], evidenceSources: ["National fee schedule, 2023"] });
  state = withUpdate(state, "Build", { modelStructure: structure });
  return withUpdate(state, "Validate", {
    validationResult: { errors: [], warnings: ["Missing utility parameter"], suggestions: [] },
  });
}

function computed(): PipelineState {
  const state = withControl(validated(), { decision: { approved: true, commentary: "proceed" } });
  return withUpdate(state, "Compute-Base", { primaryResult: computeBaseCase(structure.parameters, structure.settings) });
}

describe("formatMoney", () => {
  it("groups thousands and keeps the sign in front", () => {
    expect(formatMoney(1234567.891)).toBe("$1,234,567.89");
    expect(formatMoney(-75000)).toBe("-$75,000.00");
    expect(formatMoney(50000, 0)).toBe("$50,000");
  });

  it("drops the sign of a value that rounds to zero", () => {
    expect(formatMoney(-0.001)).toBe("$0.00");
  });
});

describe("renderReport", () => {
  it("describes the project and methods", () => {
    const report = renderReport(computed());
    expect(report.startsWith("# Health Economic Analysis Report\n\n**Project:** drug A vs drug B\n")).toBe(true);
    expect(report).toContain("**Mode:** AI-Augmented\n**Model Type:** Markov\n**Comparison:** drug A vs drug B (asthma)");
    expect(report).toContain("- Discount Rate: 0.0%\n- Willingness to pay: $50,000 per QALY\n- Health states: Healthy, Diseased, Dead");
    expect(report).toContain("## Evidence\n\n- National fee schedule, 2023");
    expect(report).toContain("### Warnings\n- Missing utility parameter");
    expect(report).toContain("## Review\n\n- Decision: approved\n- Commentary: proceed");
  });

  it("reports the base case and a conclusion", () => {
    const report = renderReport(computed());
    expect(report).toContain(
      [
        "## Base Case",
        "",
        "- Intervention: $150,000.00, 7.0000 QALYs",
        "- Comparator: $50,000.00, 6.5000 QALYs",
        "- Incremental Cost: $100,000.00",
        "- Incremental QALYs: 0.5000",
        "- ICER: $200,000.00 per QALY",
        "- NMB: -$75,000.00",
      ].join("\n"),
    );
    expect(report.endsWith(
      "## Conclusion\n\nThe intervention is not cost-effective at a willingness-to-pay threshold of $50,000 per QALY.\n",
    )).toBe(true);
    expect(report).not.toContain("## Deterministic Sensitivity");
  });

  it("renders a tornado table when one-way results exist", () => {
    const state = computed();
    const primary = state.outputs.primaryResult;
    if (!primary) throw new Error("fixture has no base case");
    const report = renderReport(withUpdate(state, "Compute-Extended-A", { extendedResultA: computeTornado(primary) }));
    expect(report).toContain("| utility_comparator | 0.58 | 0.72 | $83,333.33 | -$500,000.00 | $583,333.33 |");
    expect(report).toContain(
      "Most sensitive: utility_comparator, utility_intervention, intervention_cost, comparator_cost",
    );
  });

  it("says when nothing was computed", async () => {
    const report = await new MarkdownReportRenderer().render(validated());
    expect(report).toContain("## Results\n\nComputation was not performed.");
    expect(report).not.toContain("## Conclusion");
    expect(report).not.toContain("## Review");
  });
});
