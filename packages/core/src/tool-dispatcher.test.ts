import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { asSessionId, ToolExecutionError, type ToolSpec } from "@switchboard/types";
import { ToolDispatcher } from "./tool-dispatcher.js";

const ctx = {
  sessionId: asSessionId("s-1"),
  topic: "planning",
  callId: "call-1",
  signal: new AbortController().signal,
};

function greetTool(
  handler: (args: { name: string }) => Promise<string> = async (args) => `Hello, ${args.name}`,
): ToolSpec {
  return {
    name: "greet",
    description: "Greets someone",
    argumentSchema: z.object({ name: z.string() }),
    isDelegate: false,
    handler,
  };
}

const toQuality: ToolSpec = {
  name: "transfer_to_quality",
  description: "Hand over to quality",
  argumentSchema: z.object({ reason: z.string().optional() }),
  isDelegate: true,
  target: "quality",
};

describe("ToolDispatcher", () => {
  it("validates arguments and runs the handler", async () => {
    const dispatcher = new ToolDispatcher([greetTool(), toQuality]);
    const result = await dispatcher.invoke("greet", { name: "Ada" }, ctx);

    expect(result.output).toBe("Hello, Ada");
    expect(result.callId).toBe("call-1");
    expect(result.tool).toBe("greet");
    expect(result.delegateTo).toBeUndefined();
    expect(dispatcher.list().map((t) => t.name)).toEqual(["greet", "transfer_to_quality"]);
  });

  it("rejects unknown tools", async () => {
    const dispatcher = new ToolDispatcher([]);
    const error = await dispatcher.invoke("missing", {}, ctx).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toMatchObject({ reason: "unknown_tool", tool: "missing" });
  });

  it("does not run the handler on invalid arguments", async () => {
    const handler = vi.fn(async () => "never");
    const dispatcher = new ToolDispatcher([greetTool(handler)]);

    await expect(dispatcher.invoke("greet", { name: 42 }, ctx)).rejects.toMatchObject({
      reason: "invalid_arguments",
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it("wraps handler failures", async () => {
    const dispatcher = new ToolDispatcher([
      greetTool(vi.fn(async () => {
        throw new Error("disk full");
      })),
    ]);

    await expect(dispatcher.invoke("greet", { name: "Ada" }, ctx)).rejects.toMatchObject({
      reason: "handler_failed",
      message: "Tool greet failed: disk full",
    });
  });

  it("answers delegate tools with their target only", async () => {
    const dispatcher = new ToolDispatcher([toQuality]);
    const result = await dispatcher.invoke("transfer_to_quality", {}, ctx);

    expect(result.delegateTo).toBe("quality");
    expect(result.output).toBe("Transfer to quality requested.");
  });

  it("refuses duplicate tool names", () => {
    expect(() => new ToolDispatcher([greetTool(), greetTool()])).toThrow("Duplicate tool name: greet");
  });
});
