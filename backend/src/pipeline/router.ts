// Router: picks the next step after every successful step

import { APPROVAL_DECISION_SHAPE } from "./decision.js";
import { ContractViolation } from "./errors.js";
import { ModePolicy } from "./policy.js";
import type {
  DecisionShape,
  PipelineState,
  RoutingDirective,
  StepName,
  StepOutcome,
} from "./types.js";

export const VALIDATION_FAILED_ANNOTATION = "validation failed, skipping computation";

function continueTo(step: StepName, annotation?: string): RoutingDirective {
  return annotation ? { kind: "CONTINUE", step, annotation } : { kind: "CONTINUE", step };
}

export class Router {
  constructor(
    private readonly policy: ModePolicy = new ModePolicy(),
    private readonly expectedDecision: DecisionShape = APPROVAL_DECISION_SHAPE,
  ) {}

  next(state: PipelineState, lastStep: StepName, lastOutcome: StepOutcome): RoutingDirective {
    if (lastOutcome.status !== "SUCCESS") {
      throw new ContractViolation(`Router consulted after ${lastStep} failed`);
    }

    switch (lastStep) {
      case "Parse":
        return continueTo("Retrieve");
      case "Retrieve":
        return continueTo("Build");
      case "Build":
        return continueTo("Validate");
      case "Validate":
        return this.afterValidate(state);
      case "Awaiting-Decision":
        return this.afterDecision(state);
      case "Compute-Base":
        return this.policy.enablesExtendedComputation(state.mode)
          ? continueTo("Compute-Extended-A")
          : continueTo("Report");
      case "Compute-Extended-A":
        return continueTo("Compute-Extended-B");
      case "Compute-Extended-B":
        return continueTo("Report");
      case "Report":
        return continueTo("End");
      case "End":
        return { kind: "TERMINATE" };
      default: {
        const unknownStep: never = lastStep;
        throw new ContractViolation(`No route defined after step ${String(unknownStep)}`);
      }
    }
  }

  private afterValidate(state: PipelineState): RoutingDirective {
    const result = state.outputs.validationResult;
    if (!result) {
      throw new ContractViolation("Validate completed without a validation result");
    }
    // Blocking errors skip computation in every mode, and never suspend.
    if (result.errors.length > 0) {
      return continueTo("Report", VALIDATION_FAILED_ANNOTATION);
    }
    if (this.policy.requiresCheckpoint(state.mode)) {
      return { kind: "SUSPEND", expected: this.expectedDecision };
    }
    return continueTo("Compute-Base");
  }

  private afterDecision(state: PipelineState): RoutingDirective {
    if (!state.decision) {
      throw new ContractViolation("Awaiting-Decision completed without a decision");
    }
    // A rejection ends the run without a report.
    return state.decision.approved ? continueTo("Compute-Base") : continueTo("End");
  }
}
