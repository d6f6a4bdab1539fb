export type CircuitState = "closed" | "open" | "half_open" | "isolated";

export type OverrideFlag = "none" | "isolated" | "closed-pending";

export type Outcome<T> =
  | { type: "result"; value: T }
  | { type: "error"; error: unknown };

export type OutcomeClassification = "failure" | "success" | "ignore";

export type OutcomeClassifier<T = unknown> = (outcome: Outcome<T>) => OutcomeClassification;

export type Clock = () => number;

export interface WindowSnapshot {
  total: number;
  failures: number;
}

export interface BreakDurationArgs {
  failureCount: number;
  totalThroughput: number;
  consecutiveOpenCount: number;
}

export type BreakDurationGenerator = (args: BreakDurationArgs) => number;

export interface CircuitLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface ExecutionContext {
  operationId: string;
  signal?: AbortSignal;
}

export interface ExecuteOpts {
  operationId?: string;
  signal?: AbortSignal;
}

export type CircuitEventSeverity = "information" | "warning" | "error";

interface CircuitEventBase {
  circuit: string;
  fromState: CircuitState;
  snapshot: WindowSnapshot;
  timestamp: number;
  operationId?: string;
  isManual: boolean;
}

// Event types for observability
export type CircuitEvent =
  | (CircuitEventBase & {
      type: "circuit.opened";
      toState: "open" | "isolated";
      severity: "error";
      outcome?: Outcome<unknown>;
      breakDurationMs?: number;
    })
  | (CircuitEventBase & {
      type: "circuit.closed";
      toState: "closed";
      severity: "information";
      outcome?: Outcome<unknown>;
    })
  | (CircuitEventBase & {
      type: "circuit.half_opened";
      toState: "half_open";
      severity: "warning";
    });

export type CircuitEventType = CircuitEvent["type"];

export type CircuitObserver = (event: CircuitEvent) => void;

export interface CircuitMetrics {
  state: CircuitState;
  override: OverrideFlag;
  total: number;
  failures: number;
  failureRate: number;
  consecutiveOpenCount: number;
  breakDeadline?: number;
  retryAfterMs?: number;
}
