import type { EventId, SessionId, Timestamp, Topic } from "./foundational.js";
import type { TraceContext } from "./observability.js";
import type { Message, UserTaskMessage } from "./message.js";

/**
 * Every message flowing through the Runtime is a `SwitchboardEvent`.
 * Events are the universal communication primitive.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface SwitchboardEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: Topic;
  readonly sessionId: SessionId;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
}

/** Payload published on an agent topic. */
export interface TaskEnvelope {
  readonly task: UserTaskMessage;
  readonly history: readonly Message[];
  /** Handoffs already taken within this user turn. */
  readonly hop: number;
}

/** Lifecycle topics published by the Runtime for observers. */
export type SystemTopic =
  | "system.session.created"
  | "system.session.ended"
  | "system.handoff"
  | "system.escalated"
  | "system.routing_error";

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: readonly Topic[];
  /** Only events for this session. */
  readonly sessionId?: SessionId;
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: SwitchboardEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: SwitchboardEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

/**
 * The Event Bus interface.
 *
 * All routing flows through this bus: user tasks on agent topics,
 * responses on the user topic, lifecycle events on `system.*`.
 */
export interface EventBus {
  /** Publish an event and wait until every matching handler has settled. */
  publish<T>(event: SwitchboardEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;
}
