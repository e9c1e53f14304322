import type { SessionId, SpanId, TraceId, Topic } from "./foundational.js";

/**
 * Attached to every SwitchboardEvent. A trace spans one user turn, including
 * every handoff and tool call it causes.
 *
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  /** Unique per user turn. All descendant spans share this. */
  readonly traceId: TraceId;
  /** Unique per event/operation. */
  readonly spanId: SpanId;
  /** The span that caused this event. Absent for root spans. */
  readonly parentSpanId?: SpanId;
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Structured log entry emitted by an agent through its turn context. */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly sessionId?: SessionId;
  readonly topic?: Topic;
  readonly traceCtx?: TraceContext;
  readonly data?: Record<string, unknown>;
}
