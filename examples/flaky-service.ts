import {
  CircuitBreaker,
  ManualControl,
  createOtelCircuitObserver,
  exponentialBreakDuration,
  handleServerErrors,
  isBrokenCircuitError,
  type OtelAttributes,
  type OtelMeter,
} from "../src/index.js";

class ConsoleMeter implements OtelMeter {
  createCounter(name: string) {
    return {
      add(value: number, attributes?: OtelAttributes) {
        console.log(`[metric] ${name} add`, value, attributes ?? {});
      },
    };
  }

  createHistogram(name: string) {
    return {
      record(value: number, attributes?: OtelAttributes) {
        console.log(`[metric] ${name} record`, value, attributes ?? {});
      },
    };
  }
}

class HttpError extends Error {
  constructor(readonly status: number) {
    super(`HTTP ${status}`);
  }
}

let requests = 0;
async function fetchInventory(): Promise<string> {
  requests += 1;
  if (requests <= 6) {
    throw new HttpError(503);
  }
  return `inventory #${requests}`;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

(async () => {
  const control = new ManualControl();
  const breaker = new CircuitBreaker<string>({
    name: "inventory",
    failureRatio: 0.5,
    minimumThroughput: 4,
    samplingDurationMs: 10_000,
    breakDurationGenerator: exponentialBreakDuration(200, 2_000),
    classify: handleServerErrors,
    manualControl: control,
    telemetry: createOtelCircuitObserver({ meter: new ConsoleMeter(), metricPrefix: "demo.circuit" }),
    onOpened: (event) => console.log(`[circuit] ${event.toState}`, event.breakDurationMs ?? ""),
    onClosed: () => console.log("[circuit] closed"),
  });

  for (let attempt = 0; attempt < 12; attempt += 1) {
    try {
      console.log(await breaker.execute(fetchInventory));
    } catch (error) {
      if (isBrokenCircuitError(error)) {
        console.log(`[rejected] ${error.message}`);
        await sleep(error.retryAfterMs ?? 100);
      } else {
        console.log(`[failed] ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  control.isolate();
  await breaker.execute(fetchInventory).catch((error: unknown) => console.log("[isolated]", error));
  control.close();
  console.log("[metrics]", breaker.metrics());
})();
