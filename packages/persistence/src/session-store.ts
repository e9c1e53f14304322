import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type {
  Message,
  Session,
  SessionId,
  SessionMetadata,
  SessionPatch,
  SessionStatus,
  SessionStore,
} from "@switchboard/types";
import { asMessageId, asSessionId } from "@switchboard/types";

// ─── Row schemas ─────────────────────────────────────────────────────

const SessionRowSchema = z.object({
  id: z.string(),
  status: z.enum(["active", "ended"]),
  active_topic: z.string(),
  escalated: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

const MessageRowSchema = z.object({
  session_id: z.string(),
  sequence: z.number().int().positive(),
  id: z.string(),
  kind: z.string(),
  source: z.string(),
  payload: z.string(),
  timestamp: z.string(),
});

const meta = {
  id: z.string().transform(asMessageId),
  sessionId: z.string().transform(asSessionId),
  sequence: z.number().int().positive(),
  timestamp: z.string(),
  source: z.string(),
};

const MessageSchema = z.discriminatedUnion("kind", [
  z.object({ ...meta, kind: z.literal("UserLogin"), payload: z.null() }),
  z.object({ ...meta, kind: z.literal("UserTask"), payload: z.string() }),
  z.object({ ...meta, kind: z.literal("AgentResponse"), payload: z.string() }),
  z.object({
    ...meta,
    kind: z.literal("ToolCall"),
    payload: z.object({ callId: z.string(), tool: z.string(), args: z.record(z.unknown()) }),
  }),
  z.object({
    ...meta,
    kind: z.literal("ToolResult"),
    payload: z.object({
      callId: z.string(),
      tool: z.string(),
      output: z.string(),
      isError: z.boolean(),
      delegateTo: z.string().optional(),
    }),
  }),
]);

export class StoreCorruptionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreCorruptionError";
  }
}

/**
 * SQLite-backed implementation of SessionStore.
 *
 * `messages` is an append-only ledger keyed by (session_id, sequence) and is
 * the source of truth for history; `sessions` holds the metadata. History is
 * rebuilt from the ledger on load, so a crashed process can resume sessions.
 */
export class SQLiteSessionStore implements SessionStore {
  private db: Database.Database;

  /** Creates the database file, and its directory, when missing. */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  /** Run schema migrations. Idempotent. */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id            TEXT PRIMARY KEY,
        status        TEXT NOT NULL DEFAULT 'active',
        active_topic  TEXT NOT NULL,
        escalated     INTEGER NOT NULL DEFAULT 0,
        created_at    TEXT NOT NULL,
        updated_at    TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        session_id  TEXT NOT NULL,
        sequence    INTEGER NOT NULL,
        id          TEXT NOT NULL,
        kind        TEXT NOT NULL,
        source      TEXT NOT NULL,
        payload     TEXT NOT NULL,
        timestamp   TEXT NOT NULL,
        PRIMARY KEY (session_id, sequence),
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_status
        ON sessions(status, updated_at);
    `);
  }

  async create(session: Session): Promise<void> {
    const insertSession = this.db.prepare(`
      INSERT INTO sessions (id, status, active_topic, escalated, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const tx = this.db.transaction((s: Session) => {
      insertSession.run(s.id, s.status, s.activeTopic, s.escalated ? 1 : 0, s.createdAt, s.lastActiveAt);
      this.insertMessages(s.id, s.history);
    });
    tx(session);
  }

  async get(id: SessionId): Promise<Session | undefined> {
    const raw = this.db.prepare("SELECT * FROM sessions WHERE id = ?").get(id);
    if (raw === undefined) return undefined;
    const metadata = this.decodeSession(raw);

    const rows = this.db
      .prepare("SELECT * FROM messages WHERE session_id = ? ORDER BY sequence ASC")
      .all(id);

    return { ...metadata, history: rows.map((row) => this.decodeMessage(row)) };
  }

  async append(id: SessionId, messages: readonly Message[]): Promise<void> {
    if (messages.length === 0) return;
    const tx = this.db.transaction((batch: readonly Message[]) => this.insertMessages(id, batch));
    tx(messages);
  }

  async update(id: SessionId, patch: SessionPatch): Promise<void> {
    const sets: string[] = [];
    const values: (string | number)[] = [];
    if (patch.status !== undefined) {
      sets.push("status = ?");
      values.push(patch.status);
    }
    if (patch.activeTopic !== undefined) {
      sets.push("active_topic = ?");
      values.push(patch.activeTopic);
    }
    if (patch.escalated !== undefined) {
      sets.push("escalated = ?");
      values.push(patch.escalated ? 1 : 0);
    }
    sets.push("updated_at = ?");
    values.push(patch.lastActiveAt ?? new Date().toISOString());

    this.db.prepare(`UPDATE sessions SET ${sets.join(", ")} WHERE id = ?`).run(...values, id);
  }

  async delete(id: SessionId): Promise<void> {
    this.db.prepare("DELETE FROM messages WHERE session_id = ?").run(id);
    this.db.prepare("DELETE FROM sessions WHERE id = ?").run(id);
  }

  async listByStatus(status: SessionStatus): Promise<SessionMetadata[]> {
    const rows = this.db
      .prepare("SELECT * FROM sessions WHERE status = ? ORDER BY updated_at DESC")
      .all(status);
    return rows.map((row) => this.decodeSession(row));
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }

  private insertMessages(id: SessionId, messages: readonly Message[]): void {
    const insert = this.db.prepare(`
      INSERT INTO messages (session_id, sequence, id, kind, source, payload, timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    for (const msg of messages) {
      insert.run(id, msg.sequence, msg.id, msg.kind, msg.source, JSON.stringify(msg.payload), msg.timestamp);
    }
  }

  private decodeSession(raw: unknown): SessionMetadata {
    const row = SessionRowSchema.safeParse(raw);
    if (!row.success) {
      throw new StoreCorruptionError("Malformed session row", { cause: row.error });
    }
    return {
      id: asSessionId(row.data.id),
      status: row.data.status,
      activeTopic: row.data.active_topic,
      escalated: row.data.escalated !== 0,
      createdAt: row.data.created_at,
      lastActiveAt: row.data.updated_at,
    };
  }

  private decodeMessage(raw: unknown): Message {
    const row = MessageRowSchema.safeParse(raw);
    if (!row.success) {
      throw new StoreCorruptionError("Malformed message row", { cause: row.error });
    }
    const { session_id, sequence, id, kind, source, timestamp } = row.data;
    let payload: unknown;
    try {
      payload = JSON.parse(row.data.payload);
    } catch (err) {
      throw new StoreCorruptionError(`Message ${session_id}#${sequence} has an unreadable payload`, { cause: err });
    }
    const message = MessageSchema.safeParse({ id, sessionId: session_id, sequence, kind, source, timestamp, payload });
    if (!message.success) {
      throw new StoreCorruptionError(`Message ${session_id}#${sequence} does not match its kind`, {
        cause: message.error,
      });
    }
    return message.data;
  }
}
