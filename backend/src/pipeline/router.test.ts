// Tests for routing decisions

import { describe, it, expect } from "vitest";
import { APPROVAL_DECISION_SHAPE } from "./decision.js";
import { ContractViolation } from "./errors.js";
import { Router, VALIDATION_FAILED_ANNOTATION } from "./router.js";
import { createState, withControl, withUpdate } from "./state.js";
import type { OperatingMode, PipelineState, StepOutcome } from "./types.js";

const ok: StepOutcome = { status: "SUCCESS", update: {} };
const router = new Router();

function validated(mode: OperatingMode, errors: string[] = [], warnings: string[] = []): PipelineState {
  return withUpdate(createState("run-1", mode, { query: "q" }), "Validate", {
    validationResult: { errors, warnings, suggestions: [] },
  });
}

describe("Router", () => {
  it("walks the preparation steps linearly", () => {
    const state = createState("run-1", "FULL_AUTOMATION", { query: "q" });
    expect(router.next(state, "Parse", ok)).toEqual({ kind: "CONTINUE", step: "Retrieve" });
    expect(router.next(state, "Retrieve", ok)).toEqual({ kind: "CONTINUE", step: "Build" });
    expect(router.next(state, "Build", ok)).toEqual({ kind: "CONTINUE", step: "Validate" });
  });

  it("suspends after Validate in checkpointed modes", () => {
    for (const mode of ["MINIMAL_AUTOMATION", "PARTIAL_AUTOMATION"] as const) {
      expect(router.next(validated(mode), "Validate", ok)).toEqual({
        kind: "SUSPEND",
        expected: APPROVAL_DECISION_SHAPE,
      });
    }
  });

  it("continues straight to computation in FULL_AUTOMATION", () => {
    expect(router.next(validated("FULL_AUTOMATION"), "Validate", ok)).toEqual({
      kind: "CONTINUE",
      step: "Compute-Base",
    });
  });

  it("does not suspend on warnings alone", () => {
    expect(router.next(validated("FULL_AUTOMATION", [], ["high utility"]), "Validate", ok)).toEqual({
      kind: "CONTINUE",
      step: "Compute-Base",
    });
  });

  it("skips computation when validation reports errors, in every mode", () => {
    for (const mode of ["MINIMAL_AUTOMATION", "PARTIAL_AUTOMATION", "FULL_AUTOMATION"] as const) {
      expect(router.next(validated(mode, ["negative cost"]), "Validate", ok)).toEqual({
        kind: "CONTINUE",
        step: "Report",
        annotation: VALIDATION_FAILED_ANNOTATION,
      });
    }
  });

  it("routes an approval to Compute-Base and a rejection to End", () => {
    const base = validated("PARTIAL_AUTOMATION");
    const approved = withControl(base, { decision: { approved: true } });
    const rejected = withControl(base, { decision: { approved: false } });
    expect(router.next(approved, "Awaiting-Decision", ok)).toEqual({ kind: "CONTINUE", step: "Compute-Base" });
    expect(router.next(rejected, "Awaiting-Decision", ok)).toEqual({ kind: "CONTINUE", step: "End" });
  });

  it("branches into extended computation only when the mode enables it", () => {
    expect(router.next(validated("FULL_AUTOMATION"), "Compute-Base", ok)).toEqual({
      kind: "CONTINUE",
      step: "Compute-Extended-A",
    });
    expect(router.next(validated("PARTIAL_AUTOMATION"), "Compute-Base", ok)).toEqual({
      kind: "CONTINUE",
      step: "Report",
    });
  });

  it("finishes with Extended-B, Report, End, Terminate", () => {
    const state = validated("FULL_AUTOMATION");
    expect(router.next(state, "Compute-Extended-A", ok)).toEqual({ kind: "CONTINUE", step: "Compute-Extended-B" });
    expect(router.next(state, "Compute-Extended-B", ok)).toEqual({ kind: "CONTINUE", step: "Report" });
    expect(router.next(state, "Report", ok)).toEqual({ kind: "CONTINUE", step: "End" });
    expect(router.next(state, "End", ok)).toEqual({ kind: "TERMINATE" });
  });

  it("refuses to route after a failure", () => {
    const failed: StepOutcome = { status: "FAIL", failureReason: "x" };
    expect(() => router.next(validated("FULL_AUTOMATION"), "Build", failed)).toThrow(ContractViolation);
  });

  it("refuses to route past Awaiting-Decision without a decision", () => {
    expect(() => router.next(validated("PARTIAL_AUTOMATION"), "Awaiting-Decision", ok)).toThrow(
      "Awaiting-Decision completed without a decision",
    );
  });
});
