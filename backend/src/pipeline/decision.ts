// Expected-decision descriptors and validation of caller-supplied decisions

import { z } from "zod";
import { ContractViolation, InvalidDecision } from "./errors.js";
import { DecisionValueSchema } from "./types.js";
import type { Decision, DecisionShape, DecisionValue } from "./types.js";

export const APPROVAL_DECISION_SHAPE: DecisionShape = {
  kind: "approval",
  fields: [
    {
      name: "approved",
      type: "boolean",
      required: true,
      description: "Whether the validated model may proceed to computation",
    },
    {
      name: "commentary",
      type: "string",
      required: false,
      description: "Free-text note recorded in the run history",
    },
  ],
};

const DecisionInputSchema = z.record(z.string(), DecisionValueSchema, {
  invalid_type_error: "decision must be an object",
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function matchesType(value: DecisionValue, type: DecisionShape["fields"][number]["type"]): boolean {
  if (type === "number") return typeof value === "number" && Number.isFinite(value);
  return typeof value === type;
}

function assertApprovalShape(shape: DecisionShape): void {
  const approved = shape.fields.find((f) => f.name === "approved");
  if (!approved || approved.type !== "boolean" || !approved.required) {
    throw new ContractViolation('Decision shape must require a boolean "approved" field');
  }
}

/**
 * Check `input` against the expected shape and return the normalized decision.
 * Throws InvalidDecision listing every problem found; nothing else is touched.
 */
export function validateDecision(shape: DecisionShape, input: unknown): Decision {
  assertApprovalShape(shape);

  const parsed = DecisionInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidDecision(formatIssues(parsed.error));
  }
  const values = parsed.data;

  const issues: string[] = [];
  const known = new Set(shape.fields.map((f) => f.name));
  for (const key of Object.keys(values)) {
    if (!known.has(key)) issues.push(`${key}: not part of the expected decision`);
  }
  for (const field of shape.fields) {
    const value = values[field.name];
    if (value === undefined) {
      if (field.required) issues.push(`${field.name}: required`);
      continue;
    }
    if (!matchesType(value, field.type)) {
      issues.push(`${field.name}: expected ${field.type}, received ${typeof value}`);
    }
  }

  const { approved, commentary, ...rest } = values;
  if (issues.length > 0 || typeof approved !== "boolean") {
    throw new InvalidDecision(issues);
  }

  const decision: Decision = { approved };
  if (typeof commentary === "string" && commentary.trim() !== "") {
    decision.commentary = commentary.trim();
  }
  if (Object.keys(rest).length > 0) decision.attributes = rest;
  return decision;
}
