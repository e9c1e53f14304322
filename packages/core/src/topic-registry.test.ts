import { describe, it, expect } from "vitest";
import type { AgentDescriptor } from "@switchboard/types";
import { TopicRegistry } from "./topic-registry.js";

function agent(topic: string): AgentDescriptor {
  return {
    topic,
    description: `${topic} agent`,
    tools: [],
    handler: { handleTask: async () => ({}) },
  };
}

describe("TopicRegistry", () => {
  it("resolves the first subscriber of a topic", () => {
    const registry = new TopicRegistry();
    const first = agent("triage");
    const second = agent("triage");
    registry.register("triage", first);
    registry.register("triage", second);

    expect(registry.resolve("triage")).toBe(first);
    expect(registry.subscribers("triage")).toHaveLength(2);
    expect(registry.has("triage")).toBe(true);
    expect(registry.has("planning")).toBe(false);
    expect(registry.resolve("planning")).toBeUndefined();
    expect(registry.topics()).toEqual(["triage"]);
  });

  it.each(["user", "human", "system.handoff", ""])("rejects the reserved or empty topic %j", (topic) => {
    const registry = new TopicRegistry();
    expect(() => registry.register(topic, agent(topic))).toThrow();
  });

  it("rejects registration once sealed", () => {
    const registry = new TopicRegistry();
    registry.register("triage", agent("triage"));
    registry.seal();

    expect(registry.isSealed).toBe(true);
    expect(() => registry.register("planning", agent("planning"))).toThrow(
      'Cannot subscribe to "planning" after the runtime has started',
    );
  });
});
