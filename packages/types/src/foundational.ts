/** Branded opaque identifier types for compile-time safety. */
type Brand<T, B extends string> = T & { readonly __brand: B };

export type SessionId = Brand<string, "SessionId">;
export type MessageId = Brand<string, "MessageId">;
export type TraceId = Brand<string, "TraceId">;
export type SpanId = Brand<string, "SpanId">;
export type EventId = Brand<string, "EventId">;

/** ISO 8601 timestamp. */
export type Timestamp = string;

/**
 * Named destination for routed messages: an agent role, the user-facing
 * channel, the human escalation queue or a `system.*` lifecycle topic.
 */
export type Topic = string;

export const USER_TOPIC: Topic = "user";
export const HUMAN_TOPIC: Topic = "human";
export const TRIAGE_TOPIC: Topic = "triage";
export const SYSTEM_TOPIC_PREFIX = "system.";

/** Topics no agent may subscribe to. */
export function isReservedTopic(topic: Topic): boolean {
  return (
    topic === USER_TOPIC ||
    topic === HUMAN_TOPIC ||
    topic.startsWith(SYSTEM_TOPIC_PREFIX)
  );
}

/** `Omit` that keeps union members apart. */
export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

export function asSessionId(value: string): SessionId {
  return value as SessionId;
}

export function asMessageId(value: string): MessageId {
  return value as MessageId;
}

export function asTraceId(value: string): TraceId {
  return value as TraceId;
}

export function asSpanId(value: string): SpanId {
  return value as SpanId;
}

export function asEventId(value: string): EventId {
  return value as EventId;
}
