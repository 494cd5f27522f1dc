// Pipeline error taxonomy

import type { StepName } from "./types.js";

export type PipelineErrorCode =
  | "CONTRACT_VIOLATION"
  | "STEP_EXECUTION_ERROR"
  | "CHECKPOINT_NOT_FOUND"
  | "CHECKPOINT_ALREADY_CONSUMED"
  | "INVALID_DECISION";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/** A step wrote a key it does not own, or a terminal state was touched. Never retried. */
export class ContractViolation extends PipelineError {
  constructor(message: string) {
    super(message, "CONTRACT_VIOLATION");
    this.name = "ContractViolation";
  }
}

export class StepExecutionError extends PipelineError {
  constructor(
    public readonly stepName: StepName,
    cause: unknown,
  ) {
    super(`Step ${stepName} failed: ${describeCause(cause)}`, "STEP_EXECUTION_ERROR", { cause });
    this.name = "StepExecutionError";
  }
}

export class CheckpointNotFound extends PipelineError {
  constructor(public readonly checkpointId: string) {
    super(`Checkpoint not found: ${checkpointId}`, "CHECKPOINT_NOT_FOUND");
    this.name = "CheckpointNotFound";
  }
}

export class CheckpointAlreadyConsumed extends PipelineError {
  constructor(public readonly checkpointId: string) {
    super(`Checkpoint already consumed: ${checkpointId}`, "CHECKPOINT_ALREADY_CONSUMED");
    this.name = "CheckpointAlreadyConsumed";
  }
}

export class InvalidDecision extends PipelineError {
  constructor(public readonly issues: string[]) {
    super(`Invalid decision: ${issues.join("; ")}`, "INVALID_DECISION");
    this.name = "InvalidDecision";
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
