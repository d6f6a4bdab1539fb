import type { CircuitState, Outcome } from "../types.js";

export interface StateSource {
  currentState(): CircuitState;
  lastHandledOutcome(): Outcome<unknown> | undefined;
}

/**
 * Read-only view of a single breaker, handed to code that should observe the
 * circuit without being able to drive it.
 */
export class StateProvider {
  private source?: StateSource;

  attach(source: StateSource): void {
    if (this.source) {
      throw new Error("StateProvider is already attached to a circuit breaker");
    }
    this.source = source;
  }

  get isAttached(): boolean {
    return this.source !== undefined;
  }

  get circuitState(): CircuitState {
    return this.source?.currentState() ?? "closed";
  }

  get lastHandledOutcome(): Outcome<unknown> | undefined {
    return this.source?.lastHandledOutcome();
  }
}
