import type { CircuitEvent, CircuitObserver } from "../types.js";

export type OtelAttributeValue = string | number | boolean;
export type OtelAttributes = Record<string, OtelAttributeValue>;

export interface OtelCounter {
  add(value: number, attributes?: OtelAttributes): void;
}

export interface OtelHistogram {
  record(value: number, attributes?: OtelAttributes): void;
}

export interface OtelMeter {
  createCounter(name: string, options?: { description?: string; unit?: string }): OtelCounter;
  createHistogram(name: string, options?: { description?: string; unit?: string }): OtelHistogram;
}

export interface OtelCircuitObserverOptions {
  meter: OtelMeter;
  metricPrefix?: string;
  defaultAttributes?: OtelAttributes;
}

export function createOtelCircuitObserver(options: OtelCircuitObserverOptions): CircuitObserver {
  const prefix = options.metricPrefix ?? "circuit";
  const baseAttributes = options.defaultAttributes ?? {};
  const meter = options.meter;

  const transitions = meter.createCounter(`${prefix}.transitions`, {
    description: "Circuit state transitions",
  });
  const breakDuration = meter.createHistogram(`${prefix}.break.duration`, {
    description: "Break duration chosen on opening",
    unit: "ms",
  });
  const windowFailures = meter.createHistogram(`${prefix}.window.failure_rate`, {
    description: "Failure rate in the sampling window at transition time",
  });

  const makeAttributes = (event: CircuitEvent): OtelAttributes => ({
    ...baseAttributes,
    circuit: event.circuit,
    from: event.fromState,
    to: event.toState,
    severity: event.severity,
    manual: event.isManual,
  });

  return (event: CircuitEvent): void => {
    const attributes = makeAttributes(event);
    transitions.add(1, attributes);

    switch (event.type) {
      case "circuit.opened":
        if (typeof event.breakDurationMs === "number") {
          breakDuration.record(event.breakDurationMs, attributes);
        }
        if (event.snapshot.total > 0) {
          windowFailures.record(event.snapshot.failures / event.snapshot.total, attributes);
        }
        break;
      default:
        break;
    }
  };
}
