export * from "./core/CircuitBreaker.js";
export * from "./core/breaker.js";
export * from "./core/window.js";
export * from "./core/break-duration.js";
export * from "./core/manual-control.js";
export * from "./core/state-provider.js";
export * from "./core/classify.js";
export * from "./core/config.js";
export * from "./core/errors.js";
export { createAbortError, isAbortError } from "./core/abort.js";
export * from "./telemetry/events.js";
export * from "./telemetry/otel.js";
export * from "./types.js";
