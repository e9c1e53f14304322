import type { ToolSpec, Topic } from "@switchboard/types";

export interface PromptInput {
  topic: Topic;
  instructions: string;
  tools: readonly ToolSpec[];
}

/**
 * Builds the system prompt for an agent from its instructions and the
 * tools it was registered with.
 */
export function buildSystemPrompt(input: PromptInput): string {
  const actions = input.tools.filter((t) => !t.isDelegate);
  const transfers = input.tools.filter((t) => t.isDelegate);

  const list = (tools: readonly ToolSpec[]) =>
    tools.length > 0
      ? tools.map((t) => `- **${t.name}**: ${t.description}`).join("\n")
      : "- (none)";

  return `You are the ${input.topic} agent of a project management assistant.

# Instructions
${input.instructions.trim()}

# Tools
${list(actions)}

# Transfers
${list(transfers)}

# Protocol
1. The conversation so far, including what other agents said, is shared with you.
2. Use a tool when you need to act or look something up.
3. If the request belongs to another agent, call the matching transfer tool and nothing else.
4. Otherwise reply to the user directly and concisely.
`;
}
