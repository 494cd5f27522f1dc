// Pipeline execution types

import { z } from "zod";
import {
  AnalysisRequestSchema,
  ParsedAttributesSchema,
  EvidenceItemSchema,
  ModelStructureSchema,
  ValidationResultSchema,
  BaseCaseResultSchema,
  DeterministicSensitivityResultSchema,
  ProbabilisticSensitivityResultSchema,
} from "../analysis/types.js";

// ─── Modes & steps ────────────────────────────────────────────────────────────

export const OperatingModeSchema = z.enum([
  "MINIMAL_AUTOMATION",
  "PARTIAL_AUTOMATION",
  "FULL_AUTOMATION",
]);
export type OperatingMode = z.infer<typeof OperatingModeSchema>;

export const StepNameSchema = z.enum([
  "Parse",
  "Retrieve",
  "Build",
  "Validate",
  "Awaiting-Decision",
  "Compute-Base",
  "Compute-Extended-A",
  "Compute-Extended-B",
  "Report",
  "End",
]);
export type StepName = z.infer<typeof StepNameSchema>;

// ─── Accumulated outputs ──────────────────────────────────────────────────────

export const StepOutputsSchema = z.object({
  parsedAttributes: ParsedAttributesSchema,
  evidence: z.array(EvidenceItemSchema),
  evidenceSources: z.array(z.string()),
  modelStructure: ModelStructureSchema,
  validationResult: ValidationResultSchema,
  primaryResult: BaseCaseResultSchema,
  extendedResultA: DeterministicSensitivityResultSchema,
  extendedResultB: ProbabilisticSensitivityResultSchema,
  reportText: z.string(),
});
export type StepOutputs = z.infer<typeof StepOutputsSchema>;

export const OutputKeySchema = StepOutputsSchema.keyof();
export type OutputKey = z.infer<typeof OutputKeySchema>;

// ─── Decisions ────────────────────────────────────────────────────────────────

export const DecisionFieldSchema = z.object({
  name: z.string().min(1),
  type: z.enum(["boolean", "string", "number"]),
  required: z.boolean(),
  description: z.string().optional(),
});
export type DecisionField = z.infer<typeof DecisionFieldSchema>;

export const DecisionShapeSchema = z.object({
  kind: z.literal("approval"),
  fields: z.array(DecisionFieldSchema),
});
export type DecisionShape = z.infer<typeof DecisionShapeSchema>;

export const DecisionValueSchema = z.union([z.boolean(), z.string(), z.number()]);
export type DecisionValue = z.infer<typeof DecisionValueSchema>;

export const DecisionSchema = z.object({
  approved: z.boolean(),
  commentary: z.string().optional(),
  attributes: z.record(z.string(), DecisionValueSchema).optional(),
});
export type Decision = z.infer<typeof DecisionSchema>;

// ─── State ────────────────────────────────────────────────────────────────────

export const StepRecordSchema = z.object({
  step: StepNameSchema,
  status: z.enum(["SUCCESS", "FAIL"]),
  timestamp: z.string(),
  notes: z.array(z.string()).optional(),
  error: z.string().optional(),
});
export type StepRecord = z.infer<typeof StepRecordSchema>;

export const PipelineStateSchema = z.object({
  runId: z.string(),
  mode: OperatingModeSchema,
  request: AnalysisRequestSchema,
  outputs: StepOutputsSchema.partial(),
  owners: z.record(OutputKeySchema, StepNameSchema),
  currentStep: StepNameSchema,
  awaitingDecision: z.boolean(),
  terminal: z.boolean(),
  failed: z.boolean(),
  decision: DecisionSchema.optional(),
  history: z.array(StepRecordSchema),
  warnings: z.array(z.string()),
  annotations: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type PipelineState = z.infer<typeof PipelineStateSchema>;

export type ControlUpdate = Partial<Pick<PipelineState, "awaitingDecision" | "terminal" | "decision">>;

// ─── Checkpoints ──────────────────────────────────────────────────────────────

export const CheckpointSchema = z.object({
  id: z.string(),
  runId: z.string(),
  snapshot: PipelineStateSchema,
  expected: DecisionShapeSchema,
  createdAt: z.string(),
});
export type Checkpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointSummary {
  id: string;
  runId: string;
  mode: OperatingMode;
  createdAt: string;
}

// ─── Step outcomes & routing ──────────────────────────────────────────────────

export interface StepContext {
  runId: string;
  decision?: Decision;
}

export type StepOutcome =
  | {
      status: "SUCCESS";
      update: Partial<StepOutputs>;
      control?: ControlUpdate;
      warnings?: string[];
      notes?: string[];
    }
  | {
      status: "FAIL";
      failureReason: string;
      cause?: unknown;
    };

export type RoutingDirective =
  | { kind: "CONTINUE"; step: StepName; annotation?: string }
  | { kind: "SUSPEND"; expected: DecisionShape }
  | { kind: "TERMINATE" };

// ─── Run results & events ─────────────────────────────────────────────────────

export type RunStatus = "COMPLETED" | "SUSPENDED" | "FAILED";

export interface RunError {
  code: string;
  message: string;
  step?: StepName;
}

export interface RunResult {
  status: RunStatus;
  state: PipelineState;
  checkpointId?: string;
  error?: RunError;
}

export interface PipelineEvent {
  type:
    | "RUN_STARTED"
    | "STEP_STARTED"
    | "STEP_COMPLETED"
    | "STEP_FAILED"
    | "ROUTED"
    | "SUSPENDED"
    | "RESUMED"
    | "COMPLETED"
    | "FAILED";
  runId: string;
  timestamp: string;
  step?: StepName;
  nextStep?: StepName;
  checkpointId?: string;
  message?: string;
}
