// Mode policy: the single table that maps an operating mode to routing decisions

import { OperatingModeSchema } from "./types.js";
import type { OperatingMode } from "./types.js";

export interface ModeRule {
  requiresCheckpointBeforeComputation: boolean;
  enablesExtendedComputation: boolean;
  label: string;
  description: string;
  features: readonly string[];
}

export type ModePolicyTable = Readonly<Record<OperatingMode, Readonly<ModeRule>>>;

export const DEFAULT_MODE_POLICY: ModePolicyTable = Object.freeze({
  MINIMAL_AUTOMATION: Object.freeze({
    requiresCheckpointBeforeComputation: true,
    enablesExtendedComputation: false,
    label: "AI-Assisted",
    description: "Manual control with suggestions and validation",
    features: Object.freeze([
      "Analyst reviews every parameter before computation",
      "Validation highlights potential issues",
      "Base case only; sensitivity analyses are run by hand",
    ]),
  }),
  PARTIAL_AUTOMATION: Object.freeze({
    requiresCheckpointBeforeComputation: true,
    enablesExtendedComputation: false,
    label: "AI-Augmented",
    description: "Automated preparation with an approval gate before computation",
    features: Object.freeze([
      "Parameters auto-filled from the evidence catalogue",
      "Analyst approves the validated model before it runs",
      "Interim report after the base case",
    ]),
  }),
  FULL_AUTOMATION: Object.freeze({
    requiresCheckpointBeforeComputation: false,
    enablesExtendedComputation: true,
    label: "AI-Automated",
    description: "Complete pipeline with no approval gate",
    features: Object.freeze([
      "Model built and validated without review",
      "Deterministic and probabilistic sensitivity analyses run automatically",
      "Final report generated at the end of the run",
    ]),
  }),
});

export class ModePolicy {
  constructor(private readonly table: ModePolicyTable = DEFAULT_MODE_POLICY) {}

  requiresCheckpoint(mode: OperatingMode): boolean {
    return this.table[mode].requiresCheckpointBeforeComputation;
  }

  enablesExtendedComputation(mode: OperatingMode): boolean {
    return this.table[mode].enablesExtendedComputation;
  }

  describe(): Array<{ mode: OperatingMode } & ModeRule> {
    return OperatingModeSchema.options.map((mode) => ({ mode, ...this.table[mode] }));
  }
}

const MODE_ALIASES: Readonly<Record<string, OperatingMode>> = {
  "ai-assisted": "MINIMAL_AUTOMATION",
  "ai-augmented": "PARTIAL_AUTOMATION",
  "ai-automated": "FULL_AUTOMATION",
  minimal: "MINIMAL_AUTOMATION",
  partial: "PARTIAL_AUTOMATION",
  full: "FULL_AUTOMATION",
};

/** Accepts canonical names in any case plus the legacy ai-* names. */
export function parseMode(input: string): OperatingMode | undefined {
  const trimmed = input.trim();
  const canonical = OperatingModeSchema.safeParse(trimmed.toUpperCase().replace(/-/g, "_"));
  if (canonical.success) return canonical.data;
  return MODE_ALIASES[trimmed.toLowerCase()];
}
