export type CircuitErrorCode =
  | "CIRCUIT_BROKEN"
  | "CIRCUIT_ISOLATED"
  | "POLICY_EVALUATION_FAILED"
  | "CLASSIFIER_FAILED"
  | "INVALID_OPTIONS";

export interface CircuitErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class CircuitError extends Error {
  readonly code: CircuitErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: CircuitErrorCode, message: string, options?: CircuitErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CircuitError";
    this.code = code;
    this.details = options?.details;
  }
}

/**
 * Thrown by the gate when the circuit is open, or half-open with the probe
 * slot taken. The wrapped operation was not invoked.
 */
export class BrokenCircuitError extends CircuitError {
  readonly circuit: string;
  readonly retryAfterMs?: number;

  constructor(circuit: string, retryAfterMs?: number, code: CircuitErrorCode = "CIRCUIT_BROKEN") {
    super(
      code,
      retryAfterMs === undefined
        ? `Circuit "${circuit}" is open`
        : `Circuit "${circuit}" is open. Retry after ${retryAfterMs}ms`,
      { details: { circuit, retryAfterMs } }
    );
    this.name = "BrokenCircuitError";
    this.circuit = circuit;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Thrown while the circuit is manually isolated. Stays in force until the
 * circuit is closed again, so no retry hint is given.
 */
export class IsolatedCircuitError extends BrokenCircuitError {
  constructor(circuit: string) {
    super(circuit, undefined, "CIRCUIT_ISOLATED");
    this.message = `Circuit "${circuit}" is isolated`;
    this.name = "IsolatedCircuitError";
  }
}

export class PolicyEvaluationError extends CircuitError {
  readonly fallbackMs: number;

  constructor(message: string, fallbackMs: number, cause?: unknown) {
    super("POLICY_EVALUATION_FAILED", message, { cause, details: { fallbackMs } });
    this.name = "PolicyEvaluationError";
    this.fallbackMs = fallbackMs;
  }
}

export class ClassifierError extends CircuitError {
  constructor(circuit: string, cause: unknown) {
    super("CLASSIFIER_FAILED", `Outcome classifier for circuit "${circuit}" threw`, {
      cause,
      details: { circuit }
    });
    this.name = "ClassifierError";
  }
}

export class InvalidCircuitOptionsError extends CircuitError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_OPTIONS", `Invalid circuit breaker options: ${issues.join("; ")}`, {
      details: { issues }
    });
    this.name = "InvalidCircuitOptionsError";
    this.issues = issues;
  }
}

export function isBrokenCircuitError(value: unknown): value is BrokenCircuitError {
  return value instanceof BrokenCircuitError;
}

export function isIsolatedCircuitError(value: unknown): value is IsolatedCircuitError {
  return value instanceof IsolatedCircuitError;
}
