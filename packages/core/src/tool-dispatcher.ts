import type { ToolInvocationContext, ToolResult, ToolSpec } from "@switchboard/types";
import { ToolExecutionError } from "@switchboard/types";

/**
 * Resolves tool calls against one agent's tool list, validates arguments
 * against the tool's schema and runs the handler.
 */
export class ToolDispatcher {
  private readonly tools = new Map<string, ToolSpec>();

  constructor(tools: readonly ToolSpec[]) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  resolve(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  list(): ToolSpec[] {
    return [...this.tools.values()];
  }

  async invoke(
    name: string,
    args: Record<string, unknown>,
    ctx: ToolInvocationContext,
  ): Promise<ToolResult> {
    const started = Date.now();
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolExecutionError(name, "unknown_tool", `Unknown tool: ${name}`);
    }

    const parsed = tool.argumentSchema.safeParse(args);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ToolExecutionError(
        name,
        "invalid_arguments",
        `Invalid arguments for ${name}: ${detail}`,
        { cause: parsed.error },
      );
    }

    if (tool.isDelegate) {
      return {
        callId: ctx.callId,
        tool: name,
        output: `Transfer to ${tool.target} requested.`,
        delegateTo: tool.target,
        durationMs: Date.now() - started,
      };
    }

    let output: string;
    try {
      output = await tool.handler(parsed.data, ctx);
    } catch (err) {
      if (err instanceof ToolExecutionError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ToolExecutionError(name, "handler_failed", `Tool ${name} failed: ${reason}`, {
        cause: err,
      });
    }

    return {
      callId: ctx.callId,
      tool: name,
      output,
      durationMs: Date.now() - started,
    };
  }
}
