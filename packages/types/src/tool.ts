import type { z } from "zod";
import type { SessionId, Topic } from "./foundational.js";

/** What a tool handler may know about the call it serves. */
export interface ToolInvocationContext {
  readonly sessionId: SessionId;
  /** Topic of the agent that issued the call. */
  readonly topic: Topic;
  readonly callId: string;
  /** Aborted when the session is closed. */
  readonly signal: AbortSignal;
}

interface ToolSpecBase<TArgs> {
  /** Tool name as the model sees it, e.g. "save_document". */
  readonly name: string;
  readonly description: string;
  readonly argumentSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
}

/** A tool that runs business logic and returns user-visible content. */
export interface ActionToolSpec<TArgs = unknown> extends ToolSpecBase<TArgs> {
  readonly isDelegate: false;
  handler(args: TArgs, ctx: ToolInvocationContext): Promise<string>;
}

/**
 * A tool whose only effect is to name the topic that should take over the
 * session. It never runs business logic.
 */
export interface DelegateToolSpec<TArgs = unknown> extends ToolSpecBase<TArgs> {
  readonly isDelegate: true;
  readonly target: Topic;
}

export type ToolSpec<TArgs = unknown> =
  | ActionToolSpec<TArgs>
  | DelegateToolSpec<TArgs>;

/** The result of a successful tool call. Failures raise ToolExecutionError. */
export interface ToolResult {
  readonly callId: string;
  readonly tool: string;
  readonly output: string;
  /** Present only for delegate tools. */
  readonly delegateTo?: Topic;
  readonly durationMs: number;
}
