import type { SessionId, Topic } from "./foundational.js";

/**
 * Error codes for everything the Runtime turns into a conversational reply
 * (or, for SESSION_NOT_FOUND, a refused request).
 */
export type SwitchboardErrorCode =
  | "ROUTING_ERROR"        // Target topic has no subscriber
  | "TOOL_EXECUTION_ERROR" // Unknown tool, invalid arguments or handler failure
  | "PROVIDER_ERROR"       // Completion provider timed out, refused or failed
  | "SESSION_NOT_FOUND"    // Unknown or ended session
  | "INVALID_STATE"        // Operation not allowed in the current state
  | "INTERNAL_ERROR";      // Unexpected failure

export class SwitchboardError extends Error {
  readonly code: SwitchboardErrorCode;

  constructor(code: SwitchboardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SwitchboardError";
    this.code = code;
  }
}

export class RoutingError extends SwitchboardError {
  readonly topic: Topic;

  constructor(topic: Topic, message = `No agent is subscribed to topic "${topic}"`) {
    super("ROUTING_ERROR", message);
    this.name = "RoutingError";
    this.topic = topic;
  }
}

export type ToolFailureReason = "unknown_tool" | "invalid_arguments" | "handler_failed";

export class ToolExecutionError extends SwitchboardError {
  readonly tool: string;
  readonly reason: ToolFailureReason;

  constructor(tool: string, reason: ToolFailureReason, message: string, options?: { cause?: unknown }) {
    super("TOOL_EXECUTION_ERROR", message, options);
    this.name = "ToolExecutionError";
    this.tool = tool;
    this.reason = reason;
  }
}

export type ProviderErrorKind =
  | "timeout"
  | "auth"
  | "rate_limit"
  | "unavailable"
  | "bad_response";

export class ProviderError extends SwitchboardError {
  readonly kind: ProviderErrorKind;
  readonly provider: string;
  /** HTTP status, when the provider answered. */
  readonly status?: number;

  constructor(
    provider: string,
    kind: ProviderErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super("PROVIDER_ERROR", message, options);
    this.name = "ProviderError";
    this.provider = provider;
    this.kind = kind;
    this.status = options?.status;
  }
}

export class SessionNotFoundError extends SwitchboardError {
  readonly sessionId: string;

  constructor(sessionId: SessionId | string) {
    super("SESSION_NOT_FOUND", `Session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}
