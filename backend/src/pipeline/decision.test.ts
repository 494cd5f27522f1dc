// Tests for decision validation

import { describe, it, expect } from "vitest";
import { APPROVAL_DECISION_SHAPE, validateDecision } from "./decision.js";
import { ContractViolation, InvalidDecision } from "./errors.js";

function issuesOf(input: unknown): string[] {
  try {
    validateDecision(APPROVAL_DECISION_SHAPE, input);
  } catch (err) {
    if (err instanceof InvalidDecision) return err.issues;
    throw err;
  }
  throw new Error("expected InvalidDecision");
}

describe("validateDecision", () => {
  it("accepts an approval with commentary", () => {
    expect(validateDecision(APPROVAL_DECISION_SHAPE, { approved: true, commentary: "  looks fine " })).toEqual({
      approved: true,
      commentary: "looks fine",
    });
  });

  it("drops blank commentary", () => {
    expect(validateDecision(APPROVAL_DECISION_SHAPE, { approved: false, commentary: "   " })).toEqual({
      approved: false,
    });
  });

  it("requires approved", () => {
    expect(issuesOf({ commentary: "hi" })).toEqual(["approved: required"]);
  });

  it("reports wrong field types", () => {
    expect(issuesOf({ approved: "yes" })).toEqual(["approved: expected boolean, received string"]);
  });

  it("reports fields outside the shape", () => {
    expect(issuesOf({ approved: true, reviewer: "sam" })).toEqual(["reviewer: not part of the expected decision"]);
  });

  it("rejects non-object input", () => {
    expect(issuesOf("approve")).toEqual(["decision must be an object"]);
  });

  it("builds a readable message", () => {
    expect(() => validateDecision(APPROVAL_DECISION_SHAPE, {})).toThrow("Invalid decision: approved: required");
  });

  it("refuses a shape without a required boolean approved field", () => {
    const shape = { kind: "approval" as const, fields: [{ name: "note", type: "string" as const, required: false }] };
    expect(() => validateDecision(shape, { note: "x" })).toThrow(ContractViolation);
  });
});
