import { zodToJsonSchema } from "zod-to-json-schema";
import type { ToolSpec } from "@switchboard/types";
import type { ToolDefinition } from "./model-adapter.js";

/** Advertise a tool to a completion provider: its zod schema as JSON Schema. */
export function toToolDefinition(spec: ToolSpec): ToolDefinition {
  const { $schema: _schema, ...parameters } = zodToJsonSchema(spec.argumentSchema, {
    $refStrategy: "none",
  });
  return { name: spec.name, description: spec.description, parameters };
}
