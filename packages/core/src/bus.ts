import { v7 as uuidv7 } from "uuid";
import { asEventId, asSpanId, asTraceId } from "@switchboard/types";
import type {
  EventBus,
  SwitchboardEvent,
  EventFilter,
  EventHandler,
  Subscription,
  Topic,
  TraceContext,
  SessionId,
} from "@switchboard/types";
import type { Logger } from "./logger.js";

/**
 * In-memory implementation of the Switchboard Event Bus.
 *
 * `publish` waits for every matching handler to settle, so a publisher that
 * awaits it knows delivery (and whatever the handler did) has finished.
 * A failing handler is logged and never affects the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<{
    filter: EventFilter;
    handler: EventHandler<unknown>;
    id: string;
  }>();

  constructor(private readonly logger?: Logger) {}

  async publish<T>(event: SwitchboardEvent<T>): Promise<void> {
    const promises: Promise<void>[] = [];

    for (const sub of [...this.subscribers]) {
      if (this.matches(event, sub.filter)) {
        try {
          const result = sub.handler(event);
          if (result instanceof Promise) {
            promises.push(result);
          }
        } catch (err) {
          this.reportFailure(event, err);
        }
      }
    }

    const settled = await Promise.allSettled(promises);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        this.reportFailure(event, outcome.reason);
      }
    }
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    const sub = { filter, handler: handler as EventHandler<unknown>, id };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  /** Number of live subscriptions. */
  get size(): number {
    return this.subscribers.size;
  }

  private matches(event: SwitchboardEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.sessionId && event.sessionId !== filter.sessionId) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }

  private reportFailure(event: SwitchboardEvent, err: unknown): void {
    this.logger?.error(
      { err, topic: event.topic, sessionId: event.sessionId, eventId: event.id },
      "Event handler failed",
    );
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: Topic,
  sessionId: SessionId,
  payload: T,
  traceCtx: TraceContext,
): SwitchboardEvent<T> {
  return {
    id: asEventId(uuidv7()),
    topic,
    sessionId,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: asSpanId(uuidv7()),
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: asTraceId(uuidv7()),
    spanId: asSpanId(uuidv7()),
  };
}
