import type {
  DistributiveOmit,
  MessageId,
  SessionId,
  Timestamp,
  Topic,
} from "./foundational.js";

export type MessageKind =
  | "UserLogin"
  | "UserTask"
  | "AgentResponse"
  | "ToolCall"
  | "ToolResult";

interface MessageBase {
  readonly id: MessageId;
  readonly sessionId: SessionId;
  /** Strictly increasing per session, starting at 1. */
  readonly sequence: number;
  readonly timestamp: Timestamp;
  /** Topic of the producing agent, or `"user"`. */
  readonly source: Topic;
}

export interface UserLoginMessage extends MessageBase {
  readonly kind: "UserLogin";
  readonly payload: null;
}

export interface UserTaskMessage extends MessageBase {
  readonly kind: "UserTask";
  readonly payload: string;
}

export interface AgentResponseMessage extends MessageBase {
  readonly kind: "AgentResponse";
  readonly payload: string;
}

export interface ToolCallPayload {
  readonly callId: string;
  readonly tool: string;
  readonly args: Record<string, unknown>;
}

export interface ToolCallMessage extends MessageBase {
  readonly kind: "ToolCall";
  readonly payload: ToolCallPayload;
}

export interface ToolResultPayload {
  readonly callId: string;
  readonly tool: string;
  readonly output: string;
  readonly isError: boolean;
  /** Set on the result of a successful transfer. */
  readonly delegateTo?: Topic;
}

export interface ToolResultMessage extends MessageBase {
  readonly kind: "ToolResult";
  readonly payload: ToolResultPayload;
}

export type Message =
  | UserLoginMessage
  | UserTaskMessage
  | AgentResponseMessage
  | ToolCallMessage
  | ToolResultMessage;

/** A message before the session stamps it with identity and ordering. */
export type MessageDraft = DistributiveOmit<
  Message,
  "id" | "sessionId" | "sequence" | "timestamp"
>;
