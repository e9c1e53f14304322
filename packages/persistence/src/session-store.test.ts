import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { asMessageId, asSessionId, type Message, type Session } from "@switchboard/types";
import { SQLiteSessionStore, StoreCorruptionError } from "./session-store.js";

const id = asSessionId("session-1");

const login: Message = {
  id: asMessageId("m-1"),
  sessionId: id,
  sequence: 1,
  timestamp: "2026-01-01T00:00:01.000Z",
  kind: "UserLogin",
  source: "user",
  payload: null,
};
const greeting: Message = {
  id: asMessageId("m-2"),
  sessionId: id,
  sequence: 2,
  timestamp: "2026-01-01T00:00:02.000Z",
  kind: "AgentResponse",
  source: "triage",
  payload: "Hello!",
};
const transferCall: Message = {
  id: asMessageId("m-3"),
  sessionId: id,
  sequence: 3,
  timestamp: "2026-01-01T00:00:03.000Z",
  kind: "ToolCall",
  source: "triage",
  payload: { callId: "c-1", tool: "transfer_to_planning", args: { reason: "plan" } },
};
const transferResult: Message = {
  id: asMessageId("m-4"),
  sessionId: id,
  sequence: 4,
  timestamp: "2026-01-01T00:00:04.000Z",
  kind: "ToolResult",
  source: "triage",
  payload: {
    callId: "c-1",
    tool: "transfer_to_planning",
    output: "Transferred to planning. Adopt persona immediately.",
    isError: false,
    delegateTo: "planning",
  },
};

function session(history: Message[]): Session {
  return {
    id,
    status: "active",
    activeTopic: "triage",
    escalated: false,
    createdAt: "2026-01-01T00:00:00.000Z",
    lastActiveAt: "2026-01-01T00:00:02.000Z",
    history,
  };
}

describe("SQLiteSessionStore", () => {
  let dir: string;
  let dbPath: string;
  let store: SQLiteSessionStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "switchboard-store-"));
    dbPath = path.join(dir, "sessions.db");
    store = new SQLiteSessionStore(dbPath);
  });

  afterEach(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("round-trips a session with every message kind", async () => {
    await store.create(session([login, greeting]));
    await store.append(id, [transferCall, transferResult]);

    const loaded = await store.get(id);

    expect(loaded).toEqual(session([login, greeting, transferCall, transferResult]));
  });

  it("creates missing parent directories for the database file", async () => {
    const nestedPath = path.join(dir, "nested", "data", "sessions.db");
    const nested = new SQLiteSessionStore(nestedPath);
    try {
      await nested.create(session([login]));

      expect(fs.existsSync(nestedPath)).toBe(true);
      expect((await nested.get(id))?.history).toEqual([login]);
    } finally {
      nested.close();
    }
  });

  it("returns undefined for unknown sessions", async () => {
    await expect(store.get(asSessionId("missing"))).resolves.toBeUndefined();
  });

  it("refuses to overwrite a sequence number", async () => {
    await store.create(session([login, greeting]));

    await expect(store.append(id, [{ ...greeting, payload: "rewritten" }])).rejects.toThrow(/UNIQUE/);
    expect((await store.get(id))?.history[1].payload).toBe("Hello!");
  });

  it("updates metadata and lists by status", async () => {
    await store.create(session([login]));
    await store.update(id, {
      activeTopic: "human",
      escalated: true,
      lastActiveAt: "2026-01-01T00:10:00.000Z",
    });

    expect(await store.listByStatus("active")).toEqual([
      {
        id,
        status: "active",
        activeTopic: "human",
        escalated: true,
        createdAt: "2026-01-01T00:00:00.000Z",
        lastActiveAt: "2026-01-01T00:10:00.000Z",
      },
    ]);

    await store.update(id, { status: "ended" });
    expect(await store.listByStatus("active")).toEqual([]);
    expect((await store.listByStatus("ended")).map((s) => s.id)).toEqual([id]);
  });

  it("survives reopening the database", async () => {
    await store.create(session([login, greeting]));
    store.close();

    store = new SQLiteSessionStore(dbPath);
    expect((await store.get(id))?.history.map((m) => m.sequence)).toEqual([1, 2]);
  });

  it("deletes sessions with their history", async () => {
    await store.create(session([login, greeting]));
    await store.delete(id);

    await expect(store.get(id)).resolves.toBeUndefined();
  });

  it("reports rows that do not decode", async () => {
    await store.create(session([login]));
    const raw = new Database(dbPath);
    raw.prepare("UPDATE messages SET payload = ? WHERE sequence = 1").run('"not null"');
    raw.close();

    await expect(store.get(id)).rejects.toBeInstanceOf(StoreCorruptionError);
  });
});
