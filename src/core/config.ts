import { z } from "zod";
import type {
  BreakDurationGenerator,
  CircuitEvent,
  CircuitLogger,
  CircuitObserver,
  Clock,
  OutcomeClassifier
} from "../types.js";
import { ManualControl } from "./manual-control.js";
import { StateProvider } from "./state-provider.js";
import { InvalidCircuitOptionsError } from "./errors.js";

type EventOf<T extends CircuitEvent["type"]> = Extract<CircuitEvent, { type: T }>;

export interface CircuitBreakerOptions<T = unknown> {
  name?: string;
  failureRatio?: number;
  minimumThroughput?: number;
  samplingDurationMs?: number;
  breakDurationMs?: number;
  breakDurationGenerator?: BreakDurationGenerator;
  classify: OutcomeClassifier<T>;
  manualControl?: ManualControl;
  stateProvider?: StateProvider;
  onOpened?: (event: EventOf<"circuit.opened">) => void;
  onClosed?: (event: EventOf<"circuit.closed">) => void;
  onHalfOpened?: (event: EventOf<"circuit.half_opened">) => void;
  telemetry?: CircuitObserver;
  clock?: Clock;
  logger?: CircuitLogger;
}

export const DEFAULT_FAILURE_RATIO = 0.1;
export const DEFAULT_MINIMUM_THROUGHPUT = 100;
export const DEFAULT_SAMPLING_DURATION_MS = 30_000;

const isFunction = (value: unknown): boolean => typeof value === "function";

function fn<F>(message: string) {
  return z.custom<F>(isFunction, { message });
}

const LoggerSchema = z.custom<CircuitLogger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    ["debug", "info", "warn", "error"].every((key) => isFunction(Reflect.get(value, key))),
  { message: "logger must provide debug, info, warn and error methods" }
);

const CircuitBreakerOptionsSchema = z
  .object({
    name: z.string().trim().min(1).default("circuit"),
    failureRatio: z
      .number()
      .gt(0, "failureRatio must be greater than 0")
      .lte(1, "failureRatio must be at most 1")
      .default(DEFAULT_FAILURE_RATIO),
    minimumThroughput: z
      .number()
      .int("minimumThroughput must be an integer")
      .positive("minimumThroughput must be positive")
      .default(DEFAULT_MINIMUM_THROUGHPUT),
    samplingDurationMs: z
      .number()
      .finite()
      .positive("samplingDurationMs must be positive")
      .default(DEFAULT_SAMPLING_DURATION_MS),
    breakDurationMs: z.number().finite().positive("breakDurationMs must be positive").optional(),
    breakDurationGenerator: fn<BreakDurationGenerator>("breakDurationGenerator must be a function").optional(),
    classify: fn<OutcomeClassifier<never>>("classify must be a function"),
    manualControl: z.instanceof(ManualControl).optional(),
    stateProvider: z.instanceof(StateProvider).optional(),
    onOpened: fn<CircuitObserver>("onOpened must be a function").optional(),
    onClosed: fn<CircuitObserver>("onClosed must be a function").optional(),
    onHalfOpened: fn<CircuitObserver>("onHalfOpened must be a function").optional(),
    telemetry: fn<CircuitObserver>("telemetry must be a function").optional(),
    clock: fn<Clock>("clock must be a function").optional(),
    logger: LoggerSchema.optional()
  })
  .superRefine((value, ctx) => {
    if (value.breakDurationMs !== undefined && value.breakDurationGenerator !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["breakDurationGenerator"],
        message: "breakDurationMs and breakDurationGenerator are mutually exclusive"
      });
    }
    if (value.stateProvider?.isAttached) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["stateProvider"],
        message: "stateProvider is already attached to another circuit breaker"
      });
    }
  })
  .transform(({ breakDurationMs, breakDurationGenerator, ...rest }, ctx) => {
    let breakDuration: BreakDurationSetting;
    if (breakDurationGenerator !== undefined) {
      breakDuration = { kind: "dynamic", generator: breakDurationGenerator };
    } else if (breakDurationMs !== undefined) {
      breakDuration = { kind: "fixed", durationMs: breakDurationMs };
    } else {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["breakDurationMs"],
        message: "one of breakDurationMs or breakDurationGenerator is required"
      });
      return z.NEVER;
    }
    return { ...rest, breakDuration };
  });

export type BreakDurationSetting =
  | { kind: "fixed"; durationMs: number }
  | { kind: "dynamic"; generator: BreakDurationGenerator };

export interface ResolvedCircuitOptions<T> {
  name: string;
  failureRatio: number;
  minimumThroughput: number;
  samplingDurationMs: number;
  breakDuration: BreakDurationSetting;
  classify: OutcomeClassifier<T>;
  manualControl?: ManualControl;
  stateProvider?: StateProvider;
  onOpened?: (event: EventOf<"circuit.opened">) => void;
  onClosed?: (event: EventOf<"circuit.closed">) => void;
  onHalfOpened?: (event: EventOf<"circuit.half_opened">) => void;
  telemetry?: CircuitObserver;
  clock: Clock;
  logger: CircuitLogger;
}

/**
 * Validates breaker options and fills in defaults. Problems are reported
 * together in a single {@link InvalidCircuitOptionsError}.
 */
export function parseCircuitBreakerOptions<T>(raw: CircuitBreakerOptions<T>): ResolvedCircuitOptions<T> {
  const parsed = CircuitBreakerOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidCircuitOptionsError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }
  const cfg = parsed.data;
  // Function-valued options are passed through from the caller's object so
  // their declared signatures survive validation.
  return {
    name: cfg.name,
    failureRatio: cfg.failureRatio,
    minimumThroughput: cfg.minimumThroughput,
    samplingDurationMs: cfg.samplingDurationMs,
    breakDuration: cfg.breakDuration,
    classify: raw.classify,
    manualControl: raw.manualControl,
    stateProvider: raw.stateProvider,
    onOpened: raw.onOpened,
    onClosed: raw.onClosed,
    onHalfOpened: raw.onHalfOpened,
    telemetry: raw.telemetry,
    clock: raw.clock ?? Date.now,
    logger: raw.logger ?? console
  };
}
