import type { AgentDescriptor, Topic } from "@switchboard/types";
import { isReservedTopic, SwitchboardError } from "@switchboard/types";

/**
 * Maps topics to the agents subscribed to them. Populated at startup and
 * sealed before the first message is routed.
 */
export class TopicRegistry {
  private readonly entries = new Map<Topic, AgentDescriptor[]>();
  private sealed = false;

  register(topic: Topic, agent: AgentDescriptor): void {
    if (this.sealed) {
      throw new SwitchboardError(
        "INTERNAL_ERROR",
        `Cannot subscribe to "${topic}" after the runtime has started`,
      );
    }
    if (topic.trim() === "") {
      throw new SwitchboardError("INTERNAL_ERROR", "Topic must not be empty");
    }
    if (isReservedTopic(topic)) {
      throw new SwitchboardError("INTERNAL_ERROR", `Topic "${topic}" is reserved`);
    }
    const list = this.entries.get(topic) ?? [];
    list.push(agent);
    this.entries.set(topic, list);
  }

  subscribers(topic: Topic): readonly AgentDescriptor[] {
    return this.entries.get(topic) ?? [];
  }

  /** The agent that handles tasks on `topic`: the first one subscribed. */
  resolve(topic: Topic): AgentDescriptor | undefined {
    return this.entries.get(topic)?.[0];
  }

  has(topic: Topic): boolean {
    return this.subscribers(topic).length > 0;
  }

  topics(): Topic[] {
    return [...this.entries.keys()];
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
