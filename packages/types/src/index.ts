export * from "./foundational.js";
export * from "./observability.js";
export * from "./message.js";
export * from "./session.js";
export * from "./tool.js";
export * from "./agent.js";
export * from "./event-bus.js";
export * from "./error.js";
export * from "./runtime.js";
