import type { SessionId, Timestamp, Topic } from "./foundational.js";
import type { Message } from "./message.js";

export type SessionStatus = "active" | "ended";

/**
 * Represents an ongoing conversation between a user and whichever agent
 * currently holds it.
 */
export interface Session {
  readonly id: SessionId;
  readonly status: SessionStatus;
  readonly activeTopic: Topic;
  /** Handed to a human operator; automated delivery is suspended. */
  readonly escalated: boolean;
  readonly createdAt: Timestamp;
  readonly lastActiveAt: Timestamp;
  readonly history: readonly Message[];
}

export type SessionMetadata = Omit<Session, "history">;

export type SessionPatch = Partial<
  Pick<Session, "status" | "activeTopic" | "escalated" | "lastActiveAt">
>;

/**
 * Durable storage for sessions. History is append-only: `append` receives
 * only messages the store has not seen yet.
 */
export interface SessionStore {
  create(session: Session): Promise<void>;
  get(id: SessionId): Promise<Session | undefined>;
  append(id: SessionId, messages: readonly Message[]): Promise<void>;
  update(id: SessionId, patch: SessionPatch): Promise<void>;
  delete(id: SessionId): Promise<void>;
  listByStatus(status: SessionStatus): Promise<SessionMetadata[]>;
}
