import type { DelegateToolSpec, Topic } from "@switchboard/types";
import { HUMAN_TOPIC, TRIAGE_TOPIC } from "@switchboard/types";
import { defineDelegate, type TransferArgs } from "./define-tool.js";

/** `transfer_to_<target>` delegate tool. */
export function transferTo(target: Topic, description: string): DelegateToolSpec<TransferArgs> {
  return defineDelegate(`transfer_to_${target}`, target, description);
}

export const escalateToHuman = defineDelegate(
  "escalate_to_human",
  HUMAN_TOPIC,
  "Escalate to a human operator. Only call this when the user asks for a person or the request is outside every agent's scope.",
);

export const transferBackToTriage = defineDelegate(
  "transfer_back_to_triage",
  TRIAGE_TOPIC,
  "Hand the conversation back to triage when the user's request is outside your responsibilities.",
);
