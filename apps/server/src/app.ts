import { Hono, type Context } from "hono";
import { z } from "zod";
import type { SwitchboardRuntime, Logger } from "@switchboard/core";
import { asSessionId, SwitchboardError, type SwitchboardErrorCode } from "@switchboard/types";

export interface AppOptions {
  runtime: SwitchboardRuntime;
  logger: Logger;
}

const OperatorReplySchema = z.object({
  text: z.string().trim().min(1),
});

const ReleaseSchema = z.object({
  topic: z.string().min(1).optional(),
});

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

const STATUS_BY_CODE: Record<SwitchboardErrorCode, 400 | 404 | 409 | 500 | 502> = {
  SESSION_NOT_FOUND: 404,
  INVALID_STATE: 409,
  ROUTING_ERROR: 400,
  TOOL_EXECUTION_ERROR: 500,
  PROVIDER_ERROR: 502,
  INTERNAL_ERROR: 500,
};

/**
 * HTTP API: session creation and inspection, the operator endpoints for
 * escalated sessions and a health check. Conversation traffic itself goes
 * over the realtime channel.
 */
export function createApp(options: AppOptions): Hono {
  const { runtime } = options;
  const logger = options.logger.child({ component: "http" });
  const app = new Hono();

  app.get("/health", (c) => c.json({ status: "ok", sessions: runtime.liveSessionCount }));

  app.post("/api/session", async (c) => {
    const sessionId = await runtime.createSession();
    return c.json({ session_id: sessionId }, 201);
  });

  app.get("/api/session/:id", async (c) => {
    const session = await runtime.describeSession(asSessionId(c.req.param("id")));
    if (!session) {
      return c.json({ error: `Session ${c.req.param("id")} not found` }, 404);
    }
    return c.json({
      session_id: session.id,
      status: session.status,
      active_topic: session.activeTopic,
      escalated: session.escalated,
      created_at: session.createdAt,
      last_active_at: session.lastActiveAt,
      history_length: session.history.length,
    });
  });

  app.post("/api/session/:id/operator", async (c) => {
    const { text } = await parseBody(c, OperatorReplySchema);
    await runtime.respondAsOperator(asSessionId(c.req.param("id")), text);
    return c.json({ ok: true });
  });

  app.post("/api/session/:id/release", async (c) => {
    const { topic } = await parseBody(c, ReleaseSchema);
    await runtime.releaseEscalation(asSessionId(c.req.param("id")), topic);
    return c.json({ ok: true });
  });

  app.onError((err, c) => {
    if (err instanceof BadRequestError) {
      return c.json({ error: err.message }, 400);
    }
    if (err instanceof SwitchboardError) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) {
        logger.error({ err, path: c.req.path }, "Request failed");
      }
      return c.json({ error: err.message, code: err.code }, status);
    }
    logger.error({ err, path: c.req.path }, "Unhandled request error");
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

/** An empty body parses as `{}` so optional-only schemas accept it. */
async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  const text = await c.req.text();
  let raw: unknown = {};
  if (text.trim() !== "") {
    try {
      raw = JSON.parse(text);
    } catch {
      throw new BadRequestError("Request body must be valid JSON");
    }
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`)
      .join("; ");
    throw new BadRequestError(`Invalid request body: ${detail}`);
  }
  return parsed.data;
}
