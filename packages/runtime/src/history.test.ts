import { describe, it, expect } from "vitest";
import { asMessageId, asSessionId, type Message } from "@switchboard/types";
import { toChatMessages } from "./history.js";

const sessionId = asSessionId("s-1");
const base = (sequence: number) => ({
  id: asMessageId(`m-${sequence}`),
  sessionId,
  sequence,
  timestamp: "2026-01-01T00:00:00.000Z",
});

describe("toChatMessages", () => {
  it("maps session history onto provider roles", () => {
    const history: Message[] = [
      { ...base(1), kind: "UserLogin", source: "user", payload: null },
      { ...base(2), kind: "AgentResponse", source: "triage", payload: "Hello!" },
      { ...base(3), kind: "UserTask", source: "user", payload: "Plan Apollo" },
      { ...base(4), kind: "ToolCall", source: "triage", payload: { callId: "c-1", tool: "transfer_to_planning", args: {} } },
      {
        ...base(5),
        kind: "ToolResult",
        source: "triage",
        payload: {
          callId: "c-1",
          tool: "transfer_to_planning",
          output: "Transferred to planning. Adopt persona immediately.",
          isError: false,
          delegateTo: "planning",
        },
      },
      {
        ...base(6),
        kind: "ToolResult",
        source: "planning",
        payload: { callId: "c-2", tool: "save_document", output: "disk full", isError: true },
      },
    ];

    expect(toChatMessages(history)).toEqual([
      { role: "assistant", content: "Hello!", name: "triage" },
      { role: "user", content: "Plan Apollo" },
      { role: "assistant", content: "", toolCalls: [{ id: "c-1", name: "transfer_to_planning", arguments: {} }] },
      {
        role: "tool",
        toolCallId: "c-1",
        name: "transfer_to_planning",
        content: "Transferred to planning. Adopt persona immediately.",
      },
      { role: "tool", toolCallId: "c-2", name: "save_document", content: "Error: disk full" },
    ]);
  });
});
