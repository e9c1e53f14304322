export { ModelTaskHandler } from "./model-agent.js";
export type { ModelTaskHandlerOptions } from "./model-agent.js";
export { buildSystemPrompt } from "./prompt-builder.js";
export type { PromptInput } from "./prompt-builder.js";
export { toToolDefinition } from "./tool-defs.js";
export { toChatMessages } from "./history.js";
export { postJson, classifyStatus } from "./http.js";
export type { PostJsonOptions } from "./http.js";
export { ScriptedModelAdapter } from "./model-adapter.js";
export type {
  ModelAdapter,
  ChatMessage,
  GenerateOptions,
  GenerationResult,
  ToolCall,
  ToolDefinition,
  ScriptStep,
} from "./model-adapter.js";
export { OllamaAdapter } from "./ollama-adapter.js";
export type { OllamaAdapterOptions } from "./ollama-adapter.js";
export { OpenAIAdapter } from "./openai-adapter.js";
export type { OpenAIAdapterOptions } from "./openai-adapter.js";
