import type { Message } from "@switchboard/types";
import type { ChatMessage } from "./model-adapter.js";

/**
 * Convert session history into provider messages. Tool calls and their
 * results keep their call ids, so transfer records read as ordinary tool use.
 */
export function toChatMessages(history: readonly Message[]): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const message of history) {
    switch (message.kind) {
      case "UserLogin":
        break;
      case "UserTask":
        messages.push({ role: "user", content: message.payload });
        break;
      case "AgentResponse":
        messages.push({ role: "assistant", content: message.payload, name: message.source });
        break;
      case "ToolCall":
        messages.push({
          role: "assistant",
          content: "",
          toolCalls: [
            { id: message.payload.callId, name: message.payload.tool, arguments: message.payload.args },
          ],
        });
        break;
      case "ToolResult":
        messages.push({
          role: "tool",
          toolCallId: message.payload.callId,
          name: message.payload.tool,
          content: message.payload.isError ? `Error: ${message.payload.output}` : message.payload.output,
        });
        break;
    }
  }
  return messages;
}
