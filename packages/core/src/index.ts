export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export { SwitchboardRuntime, DEFAULT_RUNTIME_CONFIG } from "./runtime.js";
export type { SwitchboardRuntimeOptions } from "./runtime.js";
export { TopicRegistry } from "./topic-registry.js";
export { SessionContext } from "./session-context.js";
export { SerialQueue } from "./serial-queue.js";
export { UserChannel } from "./user-channel.js";
export { ToolDispatcher } from "./tool-dispatcher.js";
export { describeFailure, routingNotice, GENERIC_FAILURE_MESSAGE } from "./failure-messages.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { loadConfig, parseConfig, ConfigError, SwitchboardConfigSchema } from "./config.js";
export type { SwitchboardConfig } from "./config.js";
