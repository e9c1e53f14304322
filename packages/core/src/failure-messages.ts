import {
  ProviderError,
  RoutingError,
  ToolExecutionError,
  type ProviderErrorKind,
  type Topic,
} from "@switchboard/types";

const PROVIDER_MESSAGES: Record<ProviderErrorKind, string> = {
  timeout: "The assistant took too long to respond. Please try again.",
  auth: "The assistant could not authenticate with its language model provider. Please contact the administrator.",
  rate_limit: "The assistant is receiving too many requests right now. Please wait a moment and try again.",
  unavailable: "The assistant's language model provider is unavailable. Please try again shortly.",
  bad_response: "The assistant received an unexpected reply from its language model provider. Please try again.",
};

export const GENERIC_FAILURE_MESSAGE =
  "Sorry, something went wrong while handling your message. Please try again.";

/** User-facing text for a failure raised while an agent handled a task. */
export function describeFailure(err: unknown, defaultTopic: Topic): string {
  if (err instanceof ProviderError) {
    return PROVIDER_MESSAGES[err.kind];
  }
  if (err instanceof ToolExecutionError) {
    return `Sorry, I couldn't complete that step. ${err.message}`;
  }
  if (err instanceof RoutingError) {
    return routingNotice(err, defaultTopic);
  }
  return GENERIC_FAILURE_MESSAGE;
}

export function routingNotice(err: RoutingError, defaultTopic: Topic): string {
  return `I couldn't hand your conversation to "${err.topic}" (${err.message}). You're back with the ${defaultTopic} assistant.`;
}
