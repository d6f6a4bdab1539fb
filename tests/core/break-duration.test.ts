import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_BREAK_DURATION_MS,
  dynamicBreakDuration,
  exponentialBreakDuration,
  fixedBreakDuration,
} from "../../src/core/break-duration.js";
import { PolicyEvaluationError } from "../../src/core/errors.js";

const args = { failureCount: 3, totalThroughput: 4, consecutiveOpenCount: 1 };

describe("fixedBreakDuration", () => {
  it("should return the same duration every time", () => {
    const policy = fixedBreakDuration(1500);
    expect(policy.evaluate(args)).toEqual({ durationMs: 1500 });
    expect(policy.evaluate({ ...args, consecutiveOpenCount: 7 })).toEqual({ durationMs: 1500 });
  });

  it("should reject non-positive durations", () => {
    expect(() => fixedBreakDuration(0)).toThrow("Break duration must be a positive number of milliseconds");
    expect(() => fixedBreakDuration(Number.NaN)).toThrow();
  });
});

describe("dynamicBreakDuration", () => {
  it("should pass the window counts to the generator", () => {
    const generator = vi.fn(() => 250);
    const policy = dynamicBreakDuration(generator);

    expect(policy.evaluate(args)).toEqual({ durationMs: 250 });
    expect(generator).toHaveBeenCalledWith(args);
  });

  it("should fall back when the generator throws", () => {
    const cause = new Error("no config");
    const policy = dynamicBreakDuration(() => {
      throw cause;
    });

    const decision = policy.evaluate(args);

    expect(decision.durationMs).toBe(DEFAULT_BREAK_DURATION_MS);
    expect(decision.error).toBeInstanceOf(PolicyEvaluationError);
    expect(decision.error).toMatchObject({
      code: "POLICY_EVALUATION_FAILED",
      fallbackMs: DEFAULT_BREAK_DURATION_MS,
      cause,
    });
  });

  it.each([0, -10, Number.NaN, Number.POSITIVE_INFINITY])("should fall back when the generator returns %s", (value) => {
    const policy = dynamicBreakDuration(() => value, 750);

    const decision = policy.evaluate(args);

    expect(decision.durationMs).toBe(750);
    expect(decision.error?.message).toBe(`Break duration generator returned an invalid duration: ${String(value)}`);
  });
});

describe("exponentialBreakDuration", () => {
  it("should double per consecutive opening up to the cap", () => {
    const generator = exponentialBreakDuration(1000, 8000);
    const durations = [1, 2, 3, 4, 5].map((consecutiveOpenCount) =>
      generator({ failureCount: 0, totalThroughput: 0, consecutiveOpenCount })
    );

    expect(durations).toEqual([1000, 2000, 4000, 8000, 8000]);
  });
});
