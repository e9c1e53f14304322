export { SQLiteSessionStore, StoreCorruptionError } from "./session-store.js";
