// Pipeline Execution Engine

import { v4 as uuid } from "uuid";
import type { AnalysisRequest } from "../analysis/types.js";
import type { CheckpointStore } from "../store/checkpoints.js";
import { validateDecision } from "./decision.js";
import {
  ContractViolation,
  PipelineError,
  StepExecutionError,
  describeCause,
} from "./errors.js";
import { Router } from "./router.js";
import {
  createState,
  markFailed,
  recordStep,
  snapshotState,
  withAnnotation,
  withControl,
  withUpdate,
  withWarnings,
} from "./state.js";
import type { StepRegistry } from "./steps.js";
import type {
  Checkpoint,
  OperatingMode,
  PipelineEvent,
  PipelineState,
  RoutingDirective,
  RunResult,
  StepContext,
  StepName,
  StepOutcome,
} from "./types.js";

export const DEFAULT_MAX_STEPS = 32;

export interface EngineOptions {
  registry: StepRegistry;
  store: CheckpointStore;
  router?: Router;
  /** Upper bound on steps per start or resume; exceeding it fails the run. */
  maxSteps?: number;
  generateId?: () => string;
}

type Listener = (event: PipelineEvent) => void;

// ─── Engine ────────────────────────────────────────────────────────────────────

export class PipelineEngine {
  private runs = new Map<string, RunResult>();
  private eventListeners = new Map<string, Listener[]>();
  private globalListeners: Listener[] = [];

  private registry: StepRegistry;
  private store: CheckpointStore;
  private router: Router;
  private maxSteps: number;
  private generateId: () => string;

  constructor(options: EngineOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.router = options.router ?? new Router();
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.generateId = options.generateId ?? uuid;
  }

  subscribe(runId: string, listener: Listener): () => void {
    const listeners = this.eventListeners.get(runId) ?? [];
    listeners.push(listener);
    this.eventListeners.set(runId, listeners);
    return () => {
      const current = this.eventListeners.get(runId) ?? [];
      this.eventListeners.set(
        runId,
        current.filter((l) => l !== listener),
      );
    };
  }

  /** Receive events for every run. */
  subscribeAll(listener: Listener): () => void {
    this.globalListeners.push(listener);
    return () => {
      this.globalListeners = this.globalListeners.filter((l) => l !== listener);
    };
  }

  private emit(event: Omit<PipelineEvent, "timestamp">): void {
    const full: PipelineEvent = { ...event, timestamp: new Date().toISOString() };
    const listeners = [...(this.eventListeners.get(event.runId) ?? []), ...this.globalListeners];
    for (const listener of listeners) {
      try {
        listener(full);
      } catch (err) {
        console.warn(`[engine] Event listener for ${event.runId} threw: ${describeCause(err)}`);
      }
    }
  }

  getRun(runId: string): RunResult | undefined {
    const run = this.runs.get(runId);
    return run && structuredClone(run);
  }

  listRuns(): RunResult[] {
    return Array.from(this.runs.values(), (run) => structuredClone(run));
  }

  async start(request: AnalysisRequest, mode: OperatingMode): Promise<RunResult> {
    const runId = this.generateId();
    const state = createState(runId, mode, request);
    console.log(`[engine] Run ${runId} started (${mode})`);
    this.emit({ type: "RUN_STARTED", runId, step: state.currentStep });
    return this.execute(state, { runId });
  }

  /**
   * Apply an external decision to a suspended run. The decision is validated
   * before the checkpoint is consumed, so a malformed decision leaves it
   * available for a corrected retry.
   */
  async resume(checkpointId: string, decisionInput: unknown): Promise<RunResult> {
    try {
      const checkpoint = await this.store.get(checkpointId);
      const decision = validateDecision(checkpoint.expected, decisionInput);
      const claimed = await this.store.consume(checkpointId);
      const state = claimed.snapshot;
      if (!state.awaitingDecision || state.currentStep !== "Awaiting-Decision") {
        throw new ContractViolation(`Checkpoint ${checkpointId} does not hold a suspended run`);
      }

      console.log(`[engine] Run ${state.runId} resumed from ${checkpointId} (approved=${decision.approved})`);
      this.emit({
        type: "RESUMED",
        runId: state.runId,
        checkpointId,
        step: state.currentStep,
      });
      return await this.execute(state, { runId: state.runId, decision });
    } catch (err) {
      console.warn(`[engine] Resume of ${checkpointId} rejected: ${describeCause(err)}`);
      throw err;
    }
  }

  private async execute(initial: PipelineState, context: StepContext): Promise<RunResult> {
    let state = initial;

    for (let executed = 0; ; executed++) {
      const stepName = state.currentStep;
      if (executed >= this.maxSteps) {
        return this.fail(
          state,
          stepName,
          new ContractViolation(`Run ${state.runId} exceeded ${this.maxSteps} steps without finishing`),
        );
      }

      this.emit({ type: "STEP_STARTED", runId: state.runId, step: stepName });

      let outcome: StepOutcome;
      try {
        const step = this.registry.resolve(stepName);
        outcome = await step.execute(state, context);
        if (outcome.status === "SUCCESS") {
          state = withUpdate(state, stepName, outcome.update, step.outputs);
          state = withWarnings(state, outcome.warnings ?? []);
          state = recordStep(
            state,
            outcome.notes && outcome.notes.length > 0
              ? { step: stepName, status: "SUCCESS", notes: outcome.notes }
              : { step: stepName, status: "SUCCESS" },
          );
          if (outcome.control) state = withControl(state, outcome.control);
        }
      } catch (err) {
        return this.fail(state, stepName, err);
      }

      if (outcome.status === "FAIL") {
        return this.fail(state, stepName, outcome.cause ?? new Error(outcome.failureReason));
      }

      this.emit({ type: "STEP_COMPLETED", runId: state.runId, step: stepName });

      let directive: RoutingDirective;
      try {
        directive = this.router.next(state, stepName, outcome);
      } catch (err) {
        return this.fail(state, stepName, err);
      }

      switch (directive.kind) {
        case "TERMINATE":
          return this.complete(state);

        case "SUSPEND":
          try {
            return await this.suspend(state, directive);
          } catch (err) {
            return this.fail(state, stepName, err);
          }

        case "CONTINUE":
          try {
            if (directive.annotation) state = withAnnotation(state, directive.annotation);
            state = withControl(state, { currentStep: directive.step });
          } catch (err) {
            return this.fail(state, stepName, err);
          }
          this.emit({
            type: "ROUTED",
            runId: state.runId,
            step: stepName,
            nextStep: directive.step,
            message: directive.annotation,
          });
          break;
      }
    }
  }

  private async suspend(
    state: PipelineState,
    directive: Extract<RoutingDirective, { kind: "SUSPEND" }>,
  ): Promise<RunResult> {
    const paused = withControl(state, { currentStep: "Awaiting-Decision", awaitingDecision: true });
    const checkpoint: Checkpoint = {
      id: this.generateId(),
      runId: paused.runId,
      snapshot: snapshotState(paused),
      expected: directive.expected,
      createdAt: new Date().toISOString(),
    };
    await this.store.save(checkpoint);

    console.log(`[engine] Run ${paused.runId} suspended at checkpoint ${checkpoint.id}`);
    this.emit({
      type: "SUSPENDED",
      runId: paused.runId,
      step: paused.currentStep,
      checkpointId: checkpoint.id,
    });
    return this.finish({ status: "SUSPENDED", state: paused, checkpointId: checkpoint.id });
  }

  private complete(state: PipelineState): RunResult {
    const final = state.terminal ? state : withControl(state, { terminal: true });
    console.log(`[engine] Run ${final.runId} completed`);
    this.emit({ type: "COMPLETED", runId: final.runId, message: "Pipeline completed" });
    return this.finish({ status: "COMPLETED", state: final });
  }

  private fail(state: PipelineState, stepName: StepName, err: unknown): RunResult {
    const error = err instanceof PipelineError ? err : new StepExecutionError(stepName, err);
    const failed = markFailed(state, stepName, error.message);

    console.error(`[engine] Run ${state.runId} failed at ${stepName}: ${error.message}`);
    this.emit({ type: "STEP_FAILED", runId: state.runId, step: stepName, message: error.message });
    this.emit({ type: "FAILED", runId: state.runId, step: stepName, message: error.message });
    return this.finish({
      status: "FAILED",
      state: failed,
      error: { code: error.code, message: error.message, step: stepName },
    });
  }

  // Callers get their own copy; the stored record only changes through the engine.
  private finish(result: RunResult): RunResult {
    this.runs.set(result.state.runId, structuredClone(result));
    return result;
  }
}
