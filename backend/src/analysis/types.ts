// Health-economics domain types shared by the pipeline steps and collaborators.
// Schemas double as the validation layer for checkpoint snapshots read back
// from storage, so every value a step writes must be representable here.

import { z } from "zod";

export const ModelTypeSchema = z.enum(["decision_tree", "markov", "psm"]);
export type ModelType = z.infer<typeof ModelTypeSchema>;

export const AnalysisTypeSchema = z.enum(["cost-utility", "cost-effectiveness", "budget-impact"]);
export type AnalysisType = z.infer<typeof AnalysisTypeSchema>;

// ─── Request ──────────────────────────────────────────────────────────────────

// Bounds shared by the request, the parsed attributes and the model settings
export const MAX_TIME_HORIZON = 100;
export const TimeHorizonSchema = z.number().int().min(1).max(MAX_TIME_HORIZON);
export const DiscountRateSchema = z.number().min(0).max(1);
export const WtpThresholdSchema = z.number().positive();

export const AnalysisRequestSchema = z.object({
  query: z.string().trim().min(1),
  projectName: z.string().optional(),
  modelType: ModelTypeSchema.optional(),
  timeHorizon: TimeHorizonSchema.optional(),
  discountRate: DiscountRateSchema.optional(),
  wtpThreshold: WtpThresholdSchema.optional(),
});
export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

// ─── Parse ────────────────────────────────────────────────────────────────────

export const ParsedAttributesSchema = z.object({
  projectName: z.string(),
  diseaseArea: z.string(),
  intervention: z.string(),
  comparator: z.string(),
  modelType: ModelTypeSchema,
  analysisType: AnalysisTypeSchema,
  perspective: z.string(),
  timeHorizon: TimeHorizonSchema,
  discountRate: DiscountRateSchema,
  wtpThreshold: WtpThresholdSchema,
  summary: z.string(),
});
export type ParsedAttributes = z.infer<typeof ParsedAttributesSchema>;

// ─── Evidence ─────────────────────────────────────────────────────────────────

export const EvidenceQualitySchema = z.enum(["high", "moderate", "low"]);

export const EvidenceItemSchema = z.object({
  parameter: z.string(),
  value: z.number(),
  low: z.number(),
  high: z.number(),
  source: z.string(),
  quality: EvidenceQualitySchema,
});
export type EvidenceItem = z.infer<typeof EvidenceItemSchema>;

export interface EvidenceSearchResult {
  evidence: EvidenceItem[];
  sources: string[];
  missing: string[];
}

// ─── Model ────────────────────────────────────────────────────────────────────

export const ParameterEstimateSchema = z.object({
  value: z.number(),
  low: z.number(),
  high: z.number(),
  source: z.string().optional(),
});
export type ParameterEstimate = z.infer<typeof ParameterEstimateSchema>;

export const ModelSettingsSchema = z.object({
  timeHorizon: TimeHorizonSchema,
  discountRate: DiscountRateSchema,
  wtpThreshold: WtpThresholdSchema,
});
export type ModelSettings = z.infer<typeof ModelSettingsSchema>;

export const ModelStructureSchema = z.object({
  modelType: ModelTypeSchema,
  intervention: z.string(),
  comparator: z.string(),
  states: z.array(z.string()),
  transitionMatrix: z.record(z.string(), z.record(z.string(), z.number())).optional(),
  parameters: z.record(z.string(), ParameterEstimateSchema),
  settings: ModelSettingsSchema,
});
export type ModelStructure = z.infer<typeof ModelStructureSchema>;

// ─── Validation ───────────────────────────────────────────────────────────────

export const ValidationResultSchema = z.object({
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  suggestions: z.array(z.string()),
});
export type ValidationResult = z.infer<typeof ValidationResultSchema>;

// ─── Computation ──────────────────────────────────────────────────────────────

export const BaseCaseResultSchema = z.object({
  interventionCost: z.number(),
  interventionQalys: z.number(),
  comparatorCost: z.number(),
  comparatorQalys: z.number(),
  incrementalCost: z.number(),
  incrementalQalys: z.number(),
  icer: z.number().nullable(),
  nmb: z.number(),
  inputs: z.object({
    parameters: z.record(z.string(), ParameterEstimateSchema),
    settings: ModelSettingsSchema,
  }),
});
export type BaseCaseResult = z.infer<typeof BaseCaseResultSchema>;

export const TornadoBarSchema = z.object({
  parameter: z.string(),
  baseValue: z.number(),
  lowValue: z.number(),
  highValue: z.number(),
  icerLow: z.number().nullable(),
  icerHigh: z.number().nullable(),
  impact: z.number(),
});
export type TornadoBar = z.infer<typeof TornadoBarSchema>;

export const DeterministicSensitivityResultSchema = z.object({
  baseIcer: z.number().nullable(),
  tornado: z.array(TornadoBarSchema),
  mostSensitive: z.array(z.string()),
});
export type DeterministicSensitivityResult = z.infer<typeof DeterministicSensitivityResultSchema>;

export const ProbabilisticSensitivityResultSchema = z.object({
  simulations: z.number().int(),
  seed: z.number().int(),
  sampledParameters: z.array(z.string()),
  draws: z.array(z.object({ cost: z.number(), qalys: z.number() })),
  ceac: z.array(z.object({ wtp: z.number(), probability: z.number() })),
  meanIncrementalCost: z.number(),
  meanIncrementalQalys: z.number(),
  meanIcer: z.number().nullable(),
  credibleInterval: z.tuple([z.number(), z.number()]).nullable(),
  probabilityCostEffective: z.number(),
});
export type ProbabilisticSensitivityResult = z.infer<typeof ProbabilisticSensitivityResultSchema>;
