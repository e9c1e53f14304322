import type { SessionId, Topic } from "./foundational.js";
import type { EventBus } from "./event-bus.js";
import type { AgentDescriptor } from "./agent.js";
import type { Session } from "./session.js";

/**
 * The Runtime is the entry point for all conversational traffic.
 * It owns sessions, orders their messages and routes them over the bus.
 */
export interface Runtime {
  /** Seal the topic registry and begin routing. */
  start(): Promise<void>;

  /** End every live session and detach from the bus. */
  stop(): Promise<void>;

  /** Create a session on the default topic and emit the greeting. */
  createSession(): Promise<SessionId>;

  /**
   * Queue a user message for the session. Resolves once the message and
   * every handoff it caused have been processed.
   */
  submitUserMessage(sessionId: SessionId, text: string): Promise<void>;

  /** Register an agent on a topic. Only allowed before `start()`. */
  subscribe(topic: Topic, agent: AgentDescriptor): void;

  /** Attach the user-facing channel for a session. */
  openChannel(sessionId: SessionId, sink: ChannelSink): Promise<ChannelHandle>;

  /** Cancel outstanding work and end the session. */
  closeSession(sessionId: SessionId, reason: string): Promise<void>;

  /** Reply on behalf of a human operator to an escalated session. */
  respondAsOperator(sessionId: SessionId, text: string): Promise<void>;

  /** Return an escalated session to automated handling. */
  releaseEscalation(sessionId: SessionId, topic?: Topic): Promise<void>;

  /** Snapshot of a live or archived session. */
  describeSession(sessionId: SessionId): Promise<Session | undefined>;

  /** Access the underlying event bus (for observers and integrations). */
  readonly bus: EventBus;
}

/** Where user-facing frames go: one plain-text frame per AgentResponse. */
export interface ChannelSink {
  send(frame: string): void;
  /** Called when the session ends from the server side. */
  close(reason: string): void;
}

export interface ChannelHandle {
  readonly sessionId: SessionId;
  /** Detach the sink and end the session (client disconnect). */
  close(): Promise<void>;
}

export interface RuntimeConfig {
  /** Entry point for new sessions and fallback after routing errors. */
  readonly defaultTopic: Topic;
  readonly greeting: string;
  /** Sent when a session is restored from the store. */
  readonly resumeGreeting: string;
  readonly farewell: string;
  /** Compared case-insensitively against the trimmed user message. */
  readonly exitCommand: string;
  readonly escalationNotice: string;
  /** Handoffs allowed within a single user turn. */
  readonly maxHandoffsPerTurn: number;
  /**
   * Sessions with no attached channel and no queued work are ended after
   * this long without activity. Zero disables the sweep.
   */
  readonly idleTimeoutMs: number;
}
