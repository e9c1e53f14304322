import { ProviderError } from "@switchboard/types";

/**
 * Messages as a completion provider sees them. These are derived from the
 * session history on every turn and never stored.
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  name?: string;
  toolCallId?: string;
  toolCalls?: ToolCall[];
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/** A tool as advertised to the provider: name, description, JSON Schema. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: object;
}

export interface GenerateOptions {
  tools?: readonly ToolDefinition[];
  /** Aborted when the session closes; adapters must stop waiting. */
  signal?: AbortSignal;
}

export interface GenerationResult {
  text: string;
  toolCalls?: ToolCall[];
}

/**
 * Abstraction over the underlying LLM.
 * `generate()` receives the full conversation and returns the model's response.
 * Failures are raised as ProviderError.
 */
export interface ModelAdapter {
  generate(messages: ChatMessage[], options?: GenerateOptions): Promise<GenerationResult>;
}

export type ScriptStep =
  | GenerationResult
  | ((messages: ChatMessage[], options: GenerateOptions) => GenerationResult | Promise<GenerationResult>);

/**
 * A model adapter for tests and demos that plays back a fixed script.
 * Each call consumes one step; a step may be a canned result or a function
 * of the conversation. Every call is recorded in `calls`.
 */
export class ScriptedModelAdapter implements ModelAdapter {
  readonly calls: { messages: ChatMessage[]; options: GenerateOptions }[] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[], private readonly fallback?: GenerationResult) {
    this.steps = [...steps];
  }

  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<GenerationResult> {
    this.calls.push({ messages: [...messages], options });
    options.signal?.throwIfAborted();

    const step = this.steps.shift();
    if (step === undefined) {
      if (this.fallback) return this.fallback;
      throw new ProviderError("scripted", "bad_response", "Script exhausted");
    }
    return typeof step === "function" ? step(messages, options) : step;
  }

  /** Steps not yet played. */
  get remaining(): number {
    return this.steps.length;
  }
}
