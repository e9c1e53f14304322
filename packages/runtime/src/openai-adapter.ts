import { z } from "zod";
import { ProviderError } from "@switchboard/types";
import type {
  ChatMessage,
  GenerateOptions,
  GenerationResult,
  ModelAdapter,
  ToolCall,
  ToolDefinition,
} from "./model-adapter.js";
import { postJson } from "./http.js";

const ArgumentsSchema = z.record(z.unknown());

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() }),
              }),
            )
            .nullish(),
        }),
      }),
    )
    .min(1),
});

type ApiMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: { id: string; type: "function"; function: { name: string; arguments: string } }[];
    }
  | { role: "tool"; tool_call_id: string; content: string };

export interface OpenAIAdapterOptions {
  apiKey: string;
  model?: string;
  /** Any OpenAI-compatible chat completions endpoint. */
  baseUrl?: string;
  timeoutMs?: number;
  temperature?: number;
}

/**
 * ModelAdapter for the OpenAI chat completions API (and compatible servers).
 * Tools are advertised natively and tool calls come back as `tool_calls`.
 */
export class OpenAIAdapter implements ModelAdapter {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly temperature: number;

  constructor(options: OpenAIAdapterOptions) {
    if (!options.apiKey) throw new Error("OpenAI API key is required");
    this.apiKey = options.apiKey;
    this.model = options.model ?? "gpt-4o-mini";
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.temperature = options.temperature ?? 0.7;
  }

  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<GenerationResult> {
    const tools = options.tools ?? [];
    const body = {
      model: this.model,
      messages: messages.map(toApiMessage),
      temperature: this.temperature,
      ...(tools.length > 0 ? { tools: tools.map(toApiTool) } : {}),
    };

    const data = await postJson({
      provider: "openai",
      url: `${this.baseUrl}/chat/completions`,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });

    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError("openai", "bad_response", "Unexpected chat completion shape", {
        cause: parsed.error,
      });
    }

    const message = parsed.data.choices[0].message;
    const toolCalls = (message.tool_calls ?? []).map((call): ToolCall => ({
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.function.name, call.function.arguments),
    }));

    return {
      text: message.content ?? "",
      ...(toolCalls.length > 0 ? { toolCalls } : {}),
    };
  }
}

function parseArguments(tool: string, raw: string): Record<string, unknown> {
  if (raw.trim() === "") return {};
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new ProviderError("openai", "bad_response", `Tool call ${tool} has arguments that are not JSON`, {
      cause: err,
    });
  }
  const args = ArgumentsSchema.safeParse(value);
  if (!args.success) {
    throw new ProviderError("openai", "bad_response", `Tool call ${tool} has arguments that are not an object`);
  }
  return args.data;
}

function toApiMessage(m: ChatMessage): ApiMessage {
  switch (m.role) {
    case "system":
    case "user":
      return { role: m.role, content: m.content };
    case "assistant":
      if (m.toolCalls && m.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: m.content || null,
          tool_calls: m.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
      return { role: "assistant", content: m.content };
    case "tool":
      return { role: "tool", tool_call_id: m.toolCallId ?? "", content: m.content };
  }
}

function toApiTool(tool: ToolDefinition) {
  return {
    type: "function" as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}
