import type { RawData } from "ws";
import type { Logger } from "@switchboard/core";
import { SessionNotFoundError, type Runtime, type SessionId } from "@switchboard/types";

/** WebSocket.OPEN */
const OPEN = 1;

/** Close code for a session that does not exist or has ended. */
export const SESSION_NOT_FOUND_CLOSE_CODE = 4404;

/** The part of a `ws` WebSocket the realtime channel uses. */
export interface RealtimeSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

/**
 * Bind a websocket to a session: every text frame from the client is one
 * user message, every AgentResponse goes back as one text frame. The
 * socket closing ends the session.
 */
export async function attachRealtimeChannel(
  runtime: Runtime,
  socket: RealtimeSocket,
  sessionId: SessionId,
  parentLogger: Logger,
): Promise<void> {
  const logger = parentLogger.child({ component: "realtime", sessionId });

  const opening = runtime.openChannel(sessionId, {
    send: (frame) => {
      if (socket.readyState === OPEN) socket.send(frame);
    },
    close: (reason) => {
      if (socket.readyState === OPEN) socket.close(1000, reason);
    },
  });

  const report = (err: unknown) => {
    if (err instanceof SessionNotFoundError) {
      logger.debug("Frame for a closed session dropped");
      return;
    }
    logger.error({ err }, "Realtime channel failure");
  };

  // Listeners go on before the channel opens so nothing sent meanwhile is lost.
  socket.on("message", (data) => {
    opening
      .then(() => runtime.submitUserMessage(sessionId, decodeFrame(data)))
      .catch(report);
  });
  socket.on("close", () => {
    opening.then((handle) => handle.close()).catch(report);
  });
  socket.on("error", (err) => {
    logger.warn({ err }, "Socket error");
  });

  try {
    await opening;
    logger.debug("Realtime channel open");
  } catch (err) {
    if (err instanceof SessionNotFoundError) {
      socket.close(SESSION_NOT_FOUND_CLOSE_CODE, "Session not found");
      return;
    }
    throw err;
  }
}

function decodeFrame(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
