import { ConfigError, type SwitchboardConfig } from "@switchboard/core";
import { OllamaAdapter, OpenAIAdapter, type ModelAdapter } from "@switchboard/runtime";

/** Builds the completion provider named in `provider.kind`. Secrets come from `env`. */
export function createModelAdapter(
  provider: SwitchboardConfig["provider"],
  env: Record<string, string | undefined> = process.env,
): ModelAdapter {
  switch (provider.kind) {
    case "openai": {
      const apiKey = env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigError("OPENAI_API_KEY must be set when provider.kind is openai");
      }
      return new OpenAIAdapter({
        apiKey,
        model: provider.model,
        baseUrl: provider.baseUrl,
        timeoutMs: provider.timeoutMs,
      });
    }
    case "ollama":
      return new OllamaAdapter({
        model: provider.model,
        baseUrl: provider.baseUrl,
        timeoutMs: provider.timeoutMs,
      });
  }
}
