import { v7 as uuidv7 } from "uuid";
import type {
  Message,
  MessageDraft,
  Session,
  SessionId,
  SessionStatus,
  Topic,
  UserTaskMessage,
} from "@switchboard/types";
import { asMessageId, USER_TOPIC } from "@switchboard/types";

/**
 * Mutable state of one live session. Only the Runtime holds a reference;
 * agents see copies of `history` through their turn context.
 */
export class SessionContext {
  readonly id: SessionId;
  readonly createdAt: string;
  private messages: Message[];
  private topic: Topic;
  private escalatedFlag: boolean;
  private statusValue: SessionStatus;
  private lastActive: string;
  /** Index of the first message the store has not seen yet. */
  private persistedCount: number;

  private constructor(session: Session, persisted: boolean) {
    this.id = session.id;
    this.createdAt = session.createdAt;
    this.messages = [...session.history];
    this.topic = session.activeTopic;
    this.escalatedFlag = session.escalated;
    this.statusValue = session.status;
    this.lastActive = session.lastActiveAt;
    this.persistedCount = persisted ? this.messages.length : 0;
  }

  static create(id: SessionId, topic: Topic): SessionContext {
    const now = new Date().toISOString();
    return new SessionContext(
      {
        id,
        status: "active",
        activeTopic: topic,
        escalated: false,
        createdAt: now,
        lastActiveAt: now,
        history: [],
      },
      false,
    );
  }

  /** Rebuild a context from a stored session. */
  static restore(session: Session): SessionContext {
    return new SessionContext(session, true);
  }

  get history(): readonly Message[] {
    return this.messages;
  }

  get activeTopic(): Topic {
    return this.topic;
  }

  get escalated(): boolean {
    return this.escalatedFlag;
  }

  get status(): SessionStatus {
    return this.statusValue;
  }

  get lastActiveAt(): string {
    return this.lastActive;
  }

  get lastSequence(): number {
    return this.messages.at(-1)?.sequence ?? 0;
  }

  append(draft: MessageDraft): Message {
    const message: Message = { ...draft, ...this.stamp() };
    this.push(message);
    return message;
  }

  appendUserTask(text: string): UserTaskMessage {
    const message: UserTaskMessage = {
      kind: "UserTask",
      source: USER_TOPIC,
      payload: text,
      ...this.stamp(),
    };
    this.push(message);
    return message;
  }

  private stamp(): Pick<Message, "id" | "sessionId" | "sequence" | "timestamp"> {
    if (this.statusValue === "ended") {
      throw new Error(`Session ${this.id} has ended`);
    }
    return {
      id: asMessageId(uuidv7()),
      sessionId: this.id,
      sequence: this.lastSequence + 1,
      timestamp: new Date().toISOString(),
    };
  }

  private push(message: Message): void {
    this.messages.push(message);
    this.lastActive = message.timestamp;
  }

  setActiveTopic(topic: Topic): void {
    this.topic = topic;
  }

  setEscalated(escalated: boolean): void {
    this.escalatedFlag = escalated;
  }

  end(): void {
    this.statusValue = "ended";
    this.lastActive = new Date().toISOString();
  }

  /** Messages the store has not seen yet. */
  unsaved(): Message[] {
    return this.messages.slice(this.persistedCount);
  }

  /** Record that the store now holds every message up to `count`. */
  markPersisted(count: number): void {
    this.persistedCount = Math.max(this.persistedCount, count);
  }

  /** Whether the store has a row for this session yet. */
  get isPersisted(): boolean {
    return this.persistedCount > 0;
  }

  snapshot(): Session {
    return {
      id: this.id,
      status: this.statusValue,
      activeTopic: this.topic,
      escalated: this.escalatedFlag,
      createdAt: this.createdAt,
      lastActiveAt: this.lastActive,
      history: [...this.messages],
    };
  }
}
