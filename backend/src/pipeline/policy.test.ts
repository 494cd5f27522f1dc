// Tests for the mode policy table and mode parsing

import { describe, it, expect } from "vitest";
import { DEFAULT_MODE_POLICY, ModePolicy, parseMode } from "./policy.js";

describe("ModePolicy", () => {
  const policy = new ModePolicy();

  it("gates computation in the two supervised modes only", () => {
    expect(policy.requiresCheckpoint("MINIMAL_AUTOMATION")).toBe(true);
    expect(policy.requiresCheckpoint("PARTIAL_AUTOMATION")).toBe(true);
    expect(policy.requiresCheckpoint("FULL_AUTOMATION")).toBe(false);
  });

  it("enables extended computation in FULL_AUTOMATION only", () => {
    expect(policy.enablesExtendedComputation("MINIMAL_AUTOMATION")).toBe(false);
    expect(policy.enablesExtendedComputation("PARTIAL_AUTOMATION")).toBe(false);
    expect(policy.enablesExtendedComputation("FULL_AUTOMATION")).toBe(true);
  });

  it("describes every mode in declaration order", () => {
    expect(policy.describe().map((m) => [m.mode, m.label])).toEqual([
      ["MINIMAL_AUTOMATION", "AI-Assisted"],
      ["PARTIAL_AUTOMATION", "AI-Augmented"],
      ["FULL_AUTOMATION", "AI-Automated"],
    ]);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(DEFAULT_MODE_POLICY)).toBe(true);
    expect(Object.isFrozen(DEFAULT_MODE_POLICY.FULL_AUTOMATION)).toBe(true);
  });
});

describe("parseMode", () => {
  it("accepts canonical names in any case", () => {
    expect(parseMode("FULL_AUTOMATION")).toBe("FULL_AUTOMATION");
    expect(parseMode("partial-automation")).toBe("PARTIAL_AUTOMATION");
  });

  it("accepts the product names", () => {
    expect(parseMode("ai-assisted")).toBe("MINIMAL_AUTOMATION");
    expect(parseMode("AI-Augmented")).toBe("PARTIAL_AUTOMATION");
    expect(parseMode(" ai-automated ")).toBe("FULL_AUTOMATION");
  });

  it("returns undefined for anything else", () => {
    expect(parseMode("turbo")).toBeUndefined();
  });
});
