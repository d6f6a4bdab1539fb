import { randomUUID } from "node:crypto";
import type {
  CircuitLogger,
  CircuitMetrics,
  CircuitObserver,
  CircuitState,
  ExecuteOpts,
  ExecutionContext,
  Outcome,
  OutcomeClassification,
  OutcomeClassifier,
  OverrideFlag
} from "../types.js";
import { TransitionNotifier } from "../telemetry/events.js";
import { createAbortError } from "./abort.js";
import { dynamicBreakDuration, fixedBreakDuration, type BreakDurationPolicy } from "./break-duration.js";
import { CircuitStateMachine } from "./breaker.js";
import { parseCircuitBreakerOptions, type CircuitBreakerOptions } from "./config.js";
import { ClassifierError } from "./errors.js";

const CLASSIFICATIONS: ReadonlySet<string> = new Set(["failure", "success", "ignore"]);

/**
 * Guards a single resource. Calls go through {@link CircuitBreaker.execute};
 * the breaker decides whether to run them, records how they ended and moves
 * the circuit between closed, open, half-open and isolated.
 *
 * Failures of the wrapped operation are rethrown unchanged. The breaker only
 * throws its own errors ({@link BrokenCircuitError},
 * {@link IsolatedCircuitError}) when it refuses to run the operation.
 */
export class CircuitBreaker<T = unknown> {
  readonly name: string;
  private readonly machine: CircuitStateMachine;
  private readonly notifier: TransitionNotifier;
  private readonly classifier: OutcomeClassifier<T>;
  private readonly logger: CircuitLogger;
  private readonly detachManualControl?: () => void;

  constructor(options: CircuitBreakerOptions<T>) {
    const cfg = parseCircuitBreakerOptions(options);
    this.name = cfg.name;
    this.classifier = cfg.classify;
    this.logger = cfg.logger;

    this.notifier = new TransitionNotifier({
      logger: cfg.logger,
      telemetry: cfg.telemetry,
      onOpened: cfg.onOpened,
      onClosed: cfg.onClosed,
      onHalfOpened: cfg.onHalfOpened
    });

    const policy: BreakDurationPolicy =
      cfg.breakDuration.kind === "dynamic"
        ? dynamicBreakDuration(cfg.breakDuration.generator)
        : fixedBreakDuration(cfg.breakDuration.durationMs);

    this.machine = new CircuitStateMachine({
      name: cfg.name,
      failureRatio: cfg.failureRatio,
      minimumThroughput: cfg.minimumThroughput,
      samplingDurationMs: cfg.samplingDurationMs,
      policy,
      notifier: this.notifier,
      clock: cfg.clock,
      logger: cfg.logger,
      isolated: cfg.manualControl?.isolated ?? false
    });

    cfg.stateProvider?.attach(this.machine);
    if (cfg.manualControl) {
      this.detachManualControl = cfg.manualControl.attach(this);
    }
  }

  async execute<R extends T>(
    fn: (ctx: ExecutionContext) => R | Promise<R>,
    opts: ExecuteOpts = {}
  ): Promise<R> {
    const outcome = await this.executeOutcome(fn, opts);
    if (outcome.type === "error") {
      throw outcome.error;
    }
    return outcome.value;
  }

  /**
   * Like {@link CircuitBreaker.execute} but never throws: rejections, aborts
   * and failures of the operation all come back as `{ type: "error" }`.
   */
  async executeOutcome<R extends T>(
    fn: (ctx: ExecutionContext) => R | Promise<R>,
    opts: ExecuteOpts = {}
  ): Promise<Outcome<R>> {
    if (opts.signal?.aborted) {
      return { type: "error", error: createAbortError(opts.signal.reason) };
    }

    const operationId = opts.operationId ?? randomUUID();
    const admission = this.machine.admit(operationId);
    if (!admission.admitted) {
      return { type: "error", error: admission.error };
    }

    let outcome: Outcome<R>;
    try {
      outcome = { type: "result", value: await fn({ operationId, signal: opts.signal }) };
    } catch (error) {
      outcome = { type: "error", error };
    }

    this.machine.complete(admission.ticket, this.classify(outcome), outcome);
    return outcome;
  }

  isolate(): void {
    this.machine.isolate();
  }

  close(): void {
    this.machine.close();
  }

  currentState(): CircuitState {
    return this.machine.currentState();
  }

  get override(): OverrideFlag {
    return this.machine.overrideFlag();
  }

  metrics(): CircuitMetrics {
    return this.machine.metrics();
  }

  subscribe(observer: CircuitObserver): () => void {
    return this.notifier.subscribe(observer);
  }

  /**
   * Detaches from the shared manual control handle, if any.
   */
  dispose(): void {
    this.detachManualControl?.();
  }

  private classify(outcome: Outcome<T>): OutcomeClassification {
    let classification: OutcomeClassification;
    try {
      classification = this.classifier(outcome);
    } catch (error) {
      this.logger.warn("Outcome classifier failed, passing outcome through", new ClassifierError(this.name, error));
      return "ignore";
    }
    if (!CLASSIFICATIONS.has(classification)) {
      this.logger.warn(
        "Outcome classifier returned an unknown classification, passing outcome through",
        new ClassifierError(this.name, new Error(`Unknown classification: ${String(classification)}`))
      );
      return "ignore";
    }
    return classification;
  }
}
