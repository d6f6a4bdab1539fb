import type { CircuitEvent, CircuitLogger, CircuitObserver } from "../types.js";

type EventOf<T extends CircuitEvent["type"]> = Extract<CircuitEvent, { type: T }>;

export interface TransitionNotifierOptions {
  logger: CircuitLogger;
  telemetry?: CircuitObserver;
  onOpened?: (event: EventOf<"circuit.opened">) => void;
  onClosed?: (event: EventOf<"circuit.closed">) => void;
  onHalfOpened?: (event: EventOf<"circuit.half_opened">) => void;
}

function safeEmit<E extends CircuitEvent>(
  logger: CircuitLogger,
  handler: ((event: E) => void) | undefined,
  event: E
): void {
  if (!handler) {
    return;
  }
  try {
    handler(event);
  } catch (error) {
    logger.error(`Circuit observer threw while handling ${event.type}`, error);
  }
}

/**
 * Fans a transition out to the telemetry listener, the matching callback and
 * every subscriber, synchronously and in that order. A throwing handler is
 * logged and skipped; the remaining handlers still run.
 */
export class TransitionNotifier {
  private readonly observers = new Set<CircuitObserver>();

  constructor(private readonly options: TransitionNotifierOptions) {}

  get subscriberCount(): number {
    return this.observers.size;
  }

  subscribe(observer: CircuitObserver): () => void {
    // Wrap so the same function can be subscribed twice and removed independently.
    const entry: CircuitObserver = (event) => observer(event);
    this.observers.add(entry);
    return () => {
      this.observers.delete(entry);
    };
  }

  emit(event: CircuitEvent): void {
    const { logger } = this.options;
    safeEmit(logger, this.options.telemetry, event);

    switch (event.type) {
      case "circuit.opened":
        safeEmit(logger, this.options.onOpened, event);
        break;
      case "circuit.closed":
        safeEmit(logger, this.options.onClosed, event);
        break;
      case "circuit.half_opened":
        safeEmit(logger, this.options.onHalfOpened, event);
        break;
      default:
        break;
    }

    for (const observer of [...this.observers]) {
      safeEmit(logger, observer, event);
    }
  }
}
