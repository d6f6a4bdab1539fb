import type { BreakDurationArgs, BreakDurationGenerator } from "../types.js";
import { PolicyEvaluationError } from "./errors.js";

export const DEFAULT_BREAK_DURATION_MS = 5000;

export interface BreakDurationDecision {
  durationMs: number;
  error?: PolicyEvaluationError;
}

export interface BreakDurationPolicy {
  /**
   * Evaluated once per entry into the open state. Never throws: a failing
   * generator yields the fallback duration together with the error.
   */
  evaluate(args: BreakDurationArgs): BreakDurationDecision;
}

export function fixedBreakDuration(durationMs: number): BreakDurationPolicy {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    throw new Error("Break duration must be a positive number of milliseconds");
  }
  return {
    evaluate: () => ({ durationMs })
  };
}

export function dynamicBreakDuration(
  generator: BreakDurationGenerator,
  fallbackMs = DEFAULT_BREAK_DURATION_MS
): BreakDurationPolicy {
  return {
    evaluate(args) {
      let value: number;
      try {
        value = generator({ ...args });
      } catch (error) {
        return {
          durationMs: fallbackMs,
          error: new PolicyEvaluationError("Break duration generator threw", fallbackMs, error)
        };
      }
      if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
        return {
          durationMs: fallbackMs,
          error: new PolicyEvaluationError(
            `Break duration generator returned an invalid duration: ${String(value)}`,
            fallbackMs
          )
        };
      }
      return { durationMs: value };
    }
  };
}

/**
 * Doubles the break for every consecutive opening, capped at `maxMs`.
 */
export function exponentialBreakDuration(baseMs: number, maxMs: number): BreakDurationGenerator {
  return ({ consecutiveOpenCount }) =>
    Math.min(maxMs, baseMs * 2 ** Math.max(0, consecutiveOpenCount - 1));
}
