import type {
  AgentDecision,
  AgentTurn,
  AgentTurnContext,
  TaskHandler,
} from "@switchboard/types";
import { SwitchboardError } from "@switchboard/types";
import type { ChatMessage, ModelAdapter } from "./model-adapter.js";
import { buildSystemPrompt } from "./prompt-builder.js";
import { toToolDefinition } from "./tool-defs.js";
import { toChatMessages } from "./history.js";

export interface ModelTaskHandlerOptions {
  model: ModelAdapter;
  /** Role-specific instructions placed in the system prompt. */
  instructions: string;
  /** Model calls allowed per task before giving up. */
  maxIterations?: number;
}

/**
 * A TaskHandler that runs the think → tool → think cycle against a
 * completion provider.
 *
 * Every turn starts from the session history; the handler keeps nothing
 * between turns, so one instance serves all sessions. A delegate tool call
 * ends the cycle and leaves the handoff to the Runtime.
 */
export class ModelTaskHandler implements TaskHandler {
  private readonly model: ModelAdapter;
  private readonly instructions: string;
  private readonly maxIterations: number;

  constructor(options: ModelTaskHandlerOptions) {
    this.model = options.model;
    this.instructions = options.instructions;
    this.maxIterations = options.maxIterations ?? 10;
  }

  async handleTask(turn: AgentTurn, ctx: AgentTurnContext): Promise<AgentDecision> {
    const tools = ctx.tools.map(toToolDefinition);
    const messages: ChatMessage[] = [
      {
        role: "system",
        content: buildSystemPrompt({ topic: ctx.topic, instructions: this.instructions, tools: ctx.tools }),
      },
      ...toChatMessages(turn.history),
    ];

    for (let i = 0; i < this.maxIterations; i++) {
      const result = await this.model.generate(messages, { tools, signal: ctx.signal });

      if (!result.toolCalls || result.toolCalls.length === 0) {
        return { response: result.text };
      }

      messages.push({ role: "assistant", content: result.text, toolCalls: result.toolCalls });

      let transferred = false;
      for (const call of result.toolCalls) {
        const outcome = await ctx.callTool(call.name, call.arguments, { callId: call.id });
        if (outcome.delegateTo !== undefined) transferred = true;
        messages.push({ role: "tool", toolCallId: call.id, name: call.name, content: outcome.output });
      }

      if (transferred) {
        ctx.log({ level: "debug", message: "Transfer requested by model", data: { iteration: i } });
        return result.text ? { response: result.text } : {};
      }
    }

    throw new SwitchboardError(
      "INTERNAL_ERROR",
      `Agent ${ctx.topic} did not finish within ${this.maxIterations} model calls`,
    );
  }
}
