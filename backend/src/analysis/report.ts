// Markdown report over whatever results a run has produced

import { DEFAULT_MODE_POLICY } from "../pipeline/policy.js";
import type { ReportRenderer } from "../pipeline/steps.js";
import type { PipelineState } from "../pipeline/types.js";
import { MODEL_TYPE_LABELS } from "./parser.js";
import type {
  BaseCaseResult,
  DeterministicSensitivityResult,
  ProbabilisticSensitivityResult,
  ValidationResult,
} from "./types.js";

export function formatMoney(value: number, decimals = 2): string {
  const [whole, fraction] = Math.abs(value).toFixed(decimals).split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  const sign = value < 0 && Number(Math.abs(value).toFixed(decimals)) !== 0 ? "-" : "";
  return `${sign}$${grouped}${fraction ? `.${fraction}` : ""}`;
}

function formatIcer(icer: number | null): string {
  return icer === null ? "undefined (no QALY difference)" : `${formatMoney(icer)} per QALY`;
}

function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function bulletList(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`);
}

function validationSection(result: ValidationResult): string[] {
  const lines = ["## Validation"];
  if (result.errors.length > 0) lines.push("", "### Errors", ...bulletList(result.errors));
  if (result.warnings.length > 0) lines.push("", "### Warnings", ...bulletList(result.warnings));
  if (result.suggestions.length > 0) lines.push("", "### Suggestions", ...bulletList(result.suggestions));
  if (lines.length === 1) lines.push("", "No findings.");
  return lines;
}

function baseCaseSection(result: BaseCaseResult): string[] {
  return [
    "## Base Case",
    "",
    `- Intervention: ${formatMoney(result.interventionCost)}, ${result.interventionQalys.toFixed(4)} QALYs`,
    `- Comparator: ${formatMoney(result.comparatorCost)}, ${result.comparatorQalys.toFixed(4)} QALYs`,
    `- Incremental Cost: ${formatMoney(result.incrementalCost)}`,
    `- Incremental QALYs: ${result.incrementalQalys.toFixed(4)}`,
    `- ICER: ${formatIcer(result.icer)}`,
    `- NMB: ${formatMoney(result.nmb)}`,
  ];
}

function tornadoSection(result: DeterministicSensitivityResult): string[] {
  const lines = [
    "## Deterministic Sensitivity",
    "",
    "| Parameter | Low | High | ICER (low) | ICER (high) | Impact |",
    "|---|---|---|---|---|---|",
  ];
  for (const bar of result.tornado) {
    const icer = (v: number | null) => (v === null ? "n/a" : formatMoney(v));
    lines.push(
      `| ${bar.parameter} | ${bar.lowValue} | ${bar.highValue} | ${icer(bar.icerLow)} | ${icer(bar.icerHigh)} | ${formatMoney(bar.impact)} |`,
    );
  }
  if (result.mostSensitive.length > 0) {
    lines.push("", `Most sensitive: ${result.mostSensitive.join(", ")}`);
  }
  return lines;
}

function simulationSection(result: ProbabilisticSensitivityResult, wtp: number): string[] {
  const lines = [
    "## Probabilistic Sensitivity",
    "",
    `- Simulations: ${result.simulations} (seed ${result.seed})`,
    `- Mean incremental cost: ${formatMoney(result.meanIncrementalCost)}`,
    `- Mean incremental QALYs: ${result.meanIncrementalQalys.toFixed(4)}`,
    `- Mean ICER: ${formatIcer(result.meanIcer)}`,
  ];
  if (result.credibleInterval) {
    const [low, high] = result.credibleInterval;
    lines.push(`- 95% interval: ${formatMoney(low)} to ${formatMoney(high)}`);
  }
  lines.push(`- Probability cost-effective at ${formatMoney(wtp, 0)}/QALY: ${formatPercent(result.probabilityCostEffective)}`);
  return lines;
}

export class MarkdownReportRenderer implements ReportRenderer {
  async render(state: Readonly<PipelineState>): Promise<string> {
    return renderReport(state);
  }
}

export function renderReport(state: Readonly<PipelineState>): string {
  const { outputs } = state;
  const attrs = outputs.parsedAttributes;
  const model = outputs.modelStructure;
  const wtp = model?.settings.wtpThreshold ?? attrs?.wtpThreshold;

  const sections: string[][] = [];

  const header = [
    "# Health Economic Analysis Report",
    "",
    `**Project:** ${attrs?.projectName ?? state.request.projectName ?? "Unnamed"}`,
    `**Mode:** ${DEFAULT_MODE_POLICY[state.mode].label}`,
  ];
  if (attrs) {
    header.push(
      `**Model Type:** ${MODEL_TYPE_LABELS[attrs.modelType]}`,
      `**Comparison:** ${attrs.intervention} vs ${attrs.comparator} (${attrs.diseaseArea})`,
    );
  }
  sections.push(header);

  if (model) {
    sections.push([
      "## Methods",
      "",
      `- Time Horizon: ${model.settings.timeHorizon} years`,
      `- Discount Rate: ${(model.settings.discountRate * 100).toFixed(1)}%`,
      `- Willingness to pay: ${formatMoney(model.settings.wtpThreshold, 0)} per QALY`,
      `- Health states: ${model.states.join(", ")}`,
    ]);
  }

  if (outputs.evidenceSources && outputs.evidenceSources.length > 0) {
    sections.push(["## Evidence", "", ...bulletList(outputs.evidenceSources)]);
  }

  if (outputs.validationResult) sections.push(validationSection(outputs.validationResult));

  if (state.annotations.length > 0) {
    sections.push(["## Notes", "", ...bulletList(state.annotations)]);
  }

  if (state.decision) {
    const decision = [`## Review`, "", `- Decision: ${state.decision.approved ? "approved" : "rejected"}`];
    if (state.decision.commentary) decision.push(`- Commentary: ${state.decision.commentary}`);
    sections.push(decision);
  }

  const primary = outputs.primaryResult;
  if (primary) {
    sections.push(baseCaseSection(primary));
  } else {
    sections.push(["## Results", "", "Computation was not performed."]);
  }

  if (outputs.extendedResultA) sections.push(tornadoSection(outputs.extendedResultA));
  if (outputs.extendedResultB && wtp !== undefined) {
    sections.push(simulationSection(outputs.extendedResultB, wtp));
  }

  if (primary && wtp !== undefined) {
    const verdict = primary.nmb > 0 ? "cost-effective" : "not cost-effective";
    sections.push([
      "## Conclusion",
      "",
      `The intervention is ${verdict} at a willingness-to-pay threshold of ${formatMoney(wtp, 0)} per QALY.`,
    ]);
  }

  return sections.map((lines) => lines.join("\n")).join("\n\n") + "\n";
}
