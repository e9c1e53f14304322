import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import { ProviderError } from "@switchboard/types";
import type {
  ChatMessage,
  GenerateOptions,
  GenerationResult,
  ModelAdapter,
  ToolCall,
} from "./model-adapter.js";
import { postJson } from "./http.js";

const OllamaChatResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string(),
    tool_calls: z
      .array(
        z.object({
          function: z.object({ name: z.string(), arguments: z.record(z.unknown()) }),
        }),
      )
      .optional(),
  }),
  done: z.boolean().optional(),
});

export interface OllamaAdapterOptions {
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * ModelAdapter for a local Ollama instance (`/api/chat`).
 * Defaults to http://localhost:11434 and model "llama3.1".
 */
export class OllamaAdapter implements ModelAdapter {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OllamaAdapterOptions = {}) {
    this.model = options.model ?? "llama3.1";
    this.baseUrl = (options.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<GenerationResult> {
    const tools = options.tools ?? [];
    const body = {
      model: this.model,
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
        ...(m.toolCalls && m.toolCalls.length > 0
          ? { tool_calls: m.toolCalls.map((call) => ({ function: { name: call.name, arguments: call.arguments } })) }
          : {}),
      })),
      ...(tools.length > 0
        ? {
            tools: tools.map((tool) => ({
              type: "function",
              function: { name: tool.name, description: tool.description, parameters: tool.parameters },
            })),
          }
        : {}),
      stream: false,
    };

    const data = await postJson({
      provider: "ollama",
      url: `${this.baseUrl}/api/chat`,
      body,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });

    const parsed = OllamaChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError("ollama", "bad_response", "Unexpected /api/chat response shape", {
        cause: parsed.error,
      });
    }

    const toolCalls = (parsed.data.message.tool_calls ?? []).map((call): ToolCall => ({
      id: uuidv7(),
      name: call.function.name,
      arguments: call.function.arguments,
    }));

    return {
      text: parsed.data.message.content,
      ...(toolCalls.length > 0 ? { toolCalls } : {}),
    };
  }
}
