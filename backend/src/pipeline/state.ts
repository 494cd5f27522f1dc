// Pipeline state: created once per run, replaced (never mutated) after every step

import type { AnalysisRequest } from "../analysis/types.js";
import { ContractViolation } from "./errors.js";
import { OutputKeySchema } from "./types.js";
import type {
  ControlUpdate,
  OperatingMode,
  OutputKey,
  PipelineState,
  StepName,
  StepOutputs,
  StepRecord,
} from "./types.js";

/** Output keys each built-in step is allowed to write. */
export const DECLARED_OUTPUTS: Readonly<Record<StepName, readonly OutputKey[]>> = {
  Parse: ["parsedAttributes"],
  Retrieve: ["evidence", "evidenceSources"],
  Build: ["modelStructure"],
  Validate: ["validationResult"],
  "Awaiting-Decision": [],
  "Compute-Base": ["primaryResult"],
  "Compute-Extended-A": ["extendedResultA"],
  "Compute-Extended-B": ["extendedResultB"],
  Report: ["reportText"],
  End: [],
};

function timestamp(): string {
  return new Date().toISOString();
}

function ensureLive(state: PipelineState, action: string): void {
  if (state.terminal) {
    throw new ContractViolation(`Cannot ${action}: run ${state.runId} is terminal`);
  }
}

export function createState(runId: string, mode: OperatingMode, request: AnalysisRequest): PipelineState {
  const now = timestamp();
  return {
    runId,
    mode,
    request,
    outputs: {},
    owners: {},
    currentStep: "Parse",
    awaitingDecision: false,
    terminal: false,
    failed: false,
    history: [],
    warnings: [],
    annotations: [],
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Merge a step's output into a new state. Throws ContractViolation when the
 * update names a key the step did not declare, a key another step already
 * wrote, or when the state is terminal.
 */
export function withUpdate(
  state: PipelineState,
  stepName: StepName,
  update: Partial<StepOutputs>,
  declaredKeys: readonly OutputKey[] = DECLARED_OUTPUTS[stepName],
): PipelineState {
  ensureLive(state, `apply output of ${stepName}`);

  const written: OutputKey[] = [];
  for (const rawKey of Object.keys(update)) {
    const parsed = OutputKeySchema.safeParse(rawKey);
    if (!parsed.success) {
      throw new ContractViolation(`Step ${stepName} wrote unknown key "${rawKey}"`);
    }
    const key = parsed.data;
    if (!declaredKeys.includes(key)) {
      throw new ContractViolation(`Step ${stepName} wrote undeclared key "${key}"`);
    }
    const owner = state.owners[key];
    if (owner !== undefined && owner !== stepName) {
      throw new ContractViolation(`Step ${stepName} cannot overwrite "${key}" owned by ${owner}`);
    }
    written.push(key);
  }

  if (written.length === 0) return state;

  const owners = { ...state.owners };
  for (const key of written) owners[key] = stepName;

  return {
    ...state,
    outputs: { ...state.outputs, ...update },
    owners,
    updatedAt: timestamp(),
  };
}

export function withControl(
  state: PipelineState,
  control: ControlUpdate & { currentStep?: StepName },
): PipelineState {
  ensureLive(state, "change control fields");
  const next: PipelineState = { ...state, ...control, updatedAt: timestamp() };
  if (next.terminal && next.awaitingDecision) {
    throw new ContractViolation(`Run ${state.runId} cannot be terminal while awaiting a decision`);
  }
  return next;
}

export function recordStep(state: PipelineState, record: Omit<StepRecord, "timestamp">): PipelineState {
  ensureLive(state, `record ${record.step}`);
  const at = timestamp();
  return {
    ...state,
    history: [...state.history, { ...record, timestamp: at }],
    updatedAt: at,
  };
}

export function withWarnings(state: PipelineState, warnings: readonly string[]): PipelineState {
  if (warnings.length === 0) return state;
  ensureLive(state, "add warnings");
  return { ...state, warnings: [...state.warnings, ...warnings], updatedAt: timestamp() };
}

export function withAnnotation(state: PipelineState, annotation: string): PipelineState {
  ensureLive(state, "annotate");
  return { ...state, annotations: [...state.annotations, annotation], updatedAt: timestamp() };
}

/**
 * Terminal failure: records the failed step and freezes the run. Also
 * accepts a state that is already terminal, so a failure after End is
 * still recorded.
 */
export function markFailed(state: PipelineState, step: StepName, message: string): PipelineState {
  const at = timestamp();
  return {
    ...state,
    history: [...state.history, { step, status: "FAIL", error: message, timestamp: at }],
    updatedAt: at,
    currentStep: step,
    awaitingDecision: false,
    terminal: true,
    failed: true,
  };
}

/** Deep, self-contained copy suitable for a checkpoint. */
export function snapshotState(state: PipelineState): PipelineState {
  return structuredClone(state);
}
