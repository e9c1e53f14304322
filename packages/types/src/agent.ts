import type { SessionId, Topic } from "./foundational.js";
import type { LogEntry, TraceContext } from "./observability.js";
import type { Message, UserTaskMessage } from "./message.js";
import type { ToolResult, ToolSpec } from "./tool.js";

/**
 * Represents a single task delivered to an agent.
 * This is the input an agent receives from the Runtime.
 */
export interface AgentTurn {
  readonly sessionId: SessionId;
  readonly traceCtx: TraceContext;
  /** The user task being handled. Also the last UserTask in `history`. */
  readonly task: UserTaskMessage;
  /**
   * The full session history at delivery time, including transfer records
   * from earlier agents. Never summarized.
   */
  readonly history: readonly Message[];
}

/**
 * Context provided during a turn.
 * This is the agent's read/append view of the session.
 */
export interface AgentTurnContext {
  /** Topic the agent was reached on. */
  readonly topic: Topic;

  /** The tools this agent was registered with. */
  readonly tools: readonly ToolSpec[];

  /** History as it stands now, including tool calls made during this turn. */
  readonly history: readonly Message[];

  /**
   * Execute a tool call and record it in the session history.
   * Rejects with ToolExecutionError on an unknown tool, invalid arguments
   * or a failing handler. Calling a delegate tool schedules a handoff.
   */
  callTool(
    name: string,
    args: Record<string, unknown>,
    options?: { callId?: string },
  ): Promise<ToolResult>;

  /** Aborted when the session is closed. Pass it to every external call. */
  readonly signal: AbortSignal;

  /** Structured logging bound to this turn's session and topic. */
  readonly log: (entry: Omit<LogEntry, "sessionId" | "topic">) => void;
}

/**
 * What an agent decides after handling a task. A delegation wins over a
 * response when both are present; the response is still shown first.
 */
export interface AgentDecision {
  readonly response?: string;
  readonly delegateTo?: Topic;
}

/**
 * The decision procedure of an agent. Distinct roles are distinct
 * strategy objects, not subclasses.
 */
export interface TaskHandler {
  handleTask(turn: AgentTurn, ctx: AgentTurnContext): Promise<AgentDecision>;
}

/**
 * Registered once at startup. Holds no per-session state, so one
 * descriptor serves any number of concurrent sessions.
 */
export interface AgentDescriptor {
  readonly topic: Topic;
  readonly description: string;
  readonly tools: readonly ToolSpec[];
  readonly handler: TaskHandler;
}
