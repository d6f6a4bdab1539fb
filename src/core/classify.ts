import type { OutcomeClassifier } from "../types.js";
import { isAbortError } from "./abort.js";

/**
 * Counts thrown errors matching `predicate` as failures and every returned
 * value as a success. Errors the predicate rejects pass through without
 * touching the circuit.
 */
export function handleErrors<T = unknown>(predicate: (error: unknown) => boolean = () => true): OutcomeClassifier<T> {
  return (outcome) => {
    if (outcome.type === "result") {
      return "success";
    }
    return predicate(outcome.error) ? "failure" : "ignore";
  };
}

export const handleAll: OutcomeClassifier = handleErrors();

/**
 * Like {@link handleAll}, except aborted operations are passed through:
 * a caller giving up says nothing about the health of the resource.
 */
export const handleAllExceptAborts: OutcomeClassifier = handleErrors((error) => !isAbortError(error));

/**
 * Classifies by HTTP-style `status`: 5xx, 408 and 429 count as failures,
 * other 4xx pass through, anything without a status counts as a failure.
 */
export const handleServerErrors: OutcomeClassifier = handleErrors((error) => {
  const status = readStatus(error);
  if (status === undefined) {
    return true;
  }
  return status === 408 || status === 429 || status >= 500;
});

function readStatus(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  const status = Reflect.get(error, "status");
  if (typeof status === "number") {
    return status;
  }
  const info = Reflect.get(error, "info");
  if (info && typeof info === "object") {
    const nested = Reflect.get(info, "status");
    return typeof nested === "number" ? nested : undefined;
  }
  return undefined;
}
