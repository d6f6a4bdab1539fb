import type {
  CircuitLogger,
  CircuitMetrics,
  CircuitState,
  Clock,
  Outcome,
  OutcomeClassification,
  OverrideFlag,
  WindowSnapshot
} from "../types.js";
import type { TransitionNotifier } from "../telemetry/events.js";
import type { BreakDurationPolicy } from "./break-duration.js";
import { BrokenCircuitError, IsolatedCircuitError } from "./errors.js";
import { SlidingWindowCounter } from "./window.js";

export interface CircuitStateMachineOptions {
  name: string;
  failureRatio: number;
  minimumThroughput: number;
  samplingDurationMs: number;
  policy: BreakDurationPolicy;
  notifier: TransitionNotifier;
  clock: Clock;
  logger: CircuitLogger;
  isolated?: boolean;
  bucketCount?: number;
}

/**
 * Issued to an admitted call and handed back on completion. The epochs tie
 * the outcome to the circuit period and window generation it started in.
 */
export interface AdmissionTicket {
  operationId: string;
  probe: boolean;
  epoch: number;
  windowEpoch: number;
}

export type Admission =
  | { admitted: true; ticket: AdmissionTicket }
  | { admitted: false; error: BrokenCircuitError };

/**
 * Owns the circuit state, the sliding window, the break deadline and the
 * manual override flag.
 *
 * Every method runs to completion without yielding, so admission (including
 * taking the probe slot) and outcome recording are each atomic with respect
 * to other callers on the event loop. User code is never invoked from here;
 * only observers are, after the state has been updated.
 */
export class CircuitStateMachine {
  private state: CircuitState;
  private override: OverrideFlag;
  private breakDeadline = 0;
  private probeInFlight = false;
  private consecutiveOpenCount = 0;
  private epoch = 0;
  private lastOutcome?: Outcome<unknown>;
  private readonly window: SlidingWindowCounter;

  constructor(private readonly opts: CircuitStateMachineOptions) {
    this.window = new SlidingWindowCounter(opts.samplingDurationMs, opts.bucketCount);
    this.state = opts.isolated ? "isolated" : "closed";
    this.override = opts.isolated ? "isolated" : "none";
  }

  currentState(): CircuitState {
    return this.state;
  }

  overrideFlag(): OverrideFlag {
    return this.override;
  }

  lastHandledOutcome(): Outcome<unknown> | undefined {
    return this.lastOutcome;
  }

  admit(operationId: string): Admission {
    const now = this.opts.clock();

    switch (this.state) {
      case "isolated":
        return { admitted: false, error: new IsolatedCircuitError(this.opts.name) };

      case "closed":
        return { admitted: true, ticket: this.ticket(operationId, false) };

      case "open":
        if (now < this.breakDeadline) {
          return {
            admitted: false,
            error: new BrokenCircuitError(this.opts.name, this.breakDeadline - now)
          };
        }
        this.probeInFlight = true;
        this.transitionToHalfOpen(operationId, now);
        // An observer of the half-open event may have isolated or closed the circuit.
        if (this.currentState() !== "half_open" || !this.probeInFlight) {
          return this.admit(operationId);
        }
        return { admitted: true, ticket: this.ticket(operationId, true) };

      case "half_open":
        if (this.probeInFlight) {
          return { admitted: false, error: new BrokenCircuitError(this.opts.name) };
        }
        this.probeInFlight = true;
        return { admitted: true, ticket: this.ticket(operationId, true) };
    }
  }

  complete(ticket: AdmissionTicket, classification: OutcomeClassification, outcome: Outcome<unknown>): void {
    const now = this.opts.clock();
    const ownsProbe = ticket.probe && ticket.epoch === this.epoch && this.state === "half_open";

    if (classification === "ignore") {
      if (ownsProbe) {
        this.probeInFlight = false;
      }
      return;
    }

    // Started before a reset: the window it belongs to no longer exists.
    if (ticket.windowEpoch !== this.window.epoch) {
      return;
    }

    const success = classification === "success";
    this.window.record(success, now);
    if (this.override === "closed-pending") {
      this.override = "none";
    }

    if (ticket.probe) {
      if (!ownsProbe) {
        return;
      }
      this.probeInFlight = false;
      this.lastOutcome = outcome;
      if (success) {
        this.closeCircuit(now, false, ticket.operationId, outcome);
      } else {
        this.openCircuit(now, ticket.operationId, outcome);
      }
      return;
    }

    // Landing while open, half-open or isolated: counted, but decides nothing.
    if (this.state !== "closed") {
      return;
    }
    this.lastOutcome = outcome;
    if (this.shouldBreak(this.window.snapshot(now))) {
      this.openCircuit(now, ticket.operationId, outcome);
    }
  }

  isolate(): void {
    if (this.state === "isolated") {
      return;
    }
    const now = this.opts.clock();
    const fromState = this.state;
    this.state = "isolated";
    this.override = "isolated";
    this.probeInFlight = false;
    this.breakDeadline = 0;
    this.epoch += 1;
    this.logTransition(fromState, "isolated");
    this.opts.notifier.emit({
      type: "circuit.opened",
      circuit: this.opts.name,
      fromState,
      toState: "isolated",
      severity: "error",
      snapshot: this.window.snapshot(now),
      timestamp: now,
      isManual: true
    });
  }

  close(): void {
    this.closeCircuit(this.opts.clock(), true);
  }

  metrics(): CircuitMetrics {
    const now = this.opts.clock();
    const { total, failures } = this.window.snapshot(now);
    const metrics: CircuitMetrics = {
      state: this.state,
      override: this.override,
      total,
      failures,
      failureRate: total > 0 ? failures / total : 0,
      consecutiveOpenCount: this.consecutiveOpenCount
    };
    if (this.state === "open") {
      metrics.breakDeadline = this.breakDeadline;
      metrics.retryAfterMs = Math.max(0, this.breakDeadline - now);
    }
    return metrics;
  }

  private shouldBreak(snapshot: WindowSnapshot): boolean {
    if (snapshot.total < this.opts.minimumThroughput) {
      return false;
    }
    return snapshot.failures / snapshot.total > this.opts.failureRatio;
  }

  private ticket(operationId: string, probe: boolean): AdmissionTicket {
    return { operationId, probe, epoch: this.epoch, windowEpoch: this.window.epoch };
  }

  private transitionToHalfOpen(operationId: string, now: number): void {
    this.state = "half_open";
    this.epoch += 1;
    this.logTransition("open", "half_open");
    this.opts.notifier.emit({
      type: "circuit.half_opened",
      circuit: this.opts.name,
      fromState: "open",
      toState: "half_open",
      severity: "warning",
      snapshot: this.window.snapshot(now),
      timestamp: now,
      operationId,
      isManual: false
    });
  }

  private openCircuit(now: number, operationId: string, outcome: Outcome<unknown>): void {
    const fromState = this.state;
    const snapshot = this.window.snapshot(now);
    this.consecutiveOpenCount += 1;

    const decision = this.opts.policy.evaluate({
      failureCount: snapshot.failures,
      totalThroughput: snapshot.total,
      consecutiveOpenCount: this.consecutiveOpenCount
    });
    if (decision.error) {
      this.opts.logger.warn(
        `Circuit "${this.opts.name}" break duration fell back to ${decision.durationMs}ms`,
        decision.error
      );
    }

    this.state = "open";
    this.breakDeadline = now + decision.durationMs;
    this.probeInFlight = false;
    this.epoch += 1;
    this.logTransition(fromState, "open");
    this.opts.notifier.emit({
      type: "circuit.opened",
      circuit: this.opts.name,
      fromState,
      toState: "open",
      severity: "error",
      snapshot,
      timestamp: now,
      operationId,
      outcome,
      breakDurationMs: decision.durationMs,
      isManual: false
    });
  }

  private closeCircuit(now: number, manual: boolean, operationId?: string, outcome?: Outcome<unknown>): void {
    const fromState = this.state;
    const snapshot = this.window.snapshot(now);

    this.window.reset();
    this.consecutiveOpenCount = 0;
    this.breakDeadline = 0;
    this.probeInFlight = false;
    if (manual) {
      this.override = "closed-pending";
    }
    if (fromState === "closed") {
      return;
    }

    this.state = "closed";
    this.epoch += 1;
    this.logTransition(fromState, "closed");
    this.opts.notifier.emit({
      type: "circuit.closed",
      circuit: this.opts.name,
      fromState,
      toState: "closed",
      severity: "information",
      snapshot,
      timestamp: now,
      operationId,
      outcome,
      isManual: manual
    });
  }

  private logTransition(from: CircuitState, to: CircuitState): void {
    this.opts.logger.debug(`Circuit "${this.opts.name}" ${from} -> ${to}`);
  }
}
