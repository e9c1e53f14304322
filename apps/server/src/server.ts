import { createServer, type Server } from "node:http";
import type { Duplex } from "node:stream";
import { getRequestListener } from "@hono/node-server";
import { WebSocketServer } from "ws";
import type { Hono } from "hono";
import type { Logger } from "@switchboard/core";
import { asSessionId, type Runtime } from "@switchboard/types";
import { attachRealtimeChannel } from "./realtime.js";

const REALTIME_PATH = /^\/ws\/([^/]+)$/;

export interface HttpServerOptions {
  app: Hono;
  runtime: Runtime;
  logger: Logger;
}

export interface HttpServer {
  server: Server;
  wss: WebSocketServer;
}

/** Answers a refused upgrade with a bare HTTP status line. */
function rejectUpgrade(socket: Duplex, status: string): void {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

/**
 * One node:http server for both surfaces: Hono answers requests, and
 * upgrades on `/ws/:sessionId` become realtime channels.
 */
export function createHttpServer(options: HttpServerOptions): HttpServer {
  const { app, runtime, logger } = options;
  const server = createServer(getRequestListener(app.fetch));
  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (req, socket, head) => {
    const match = REALTIME_PATH.exec(new URL(req.url ?? "/", "http://localhost").pathname);
    if (!match) {
      rejectUpgrade(socket, "404 Not Found");
      return;
    }
    let decoded: string;
    try {
      decoded = decodeURIComponent(match[1]);
    } catch (err) {
      logger.warn({ err, url: req.url }, "Rejected upgrade with malformed session id");
      rejectUpgrade(socket, "400 Bad Request");
      return;
    }
    const sessionId = asSessionId(decoded);
    wss.handleUpgrade(req, socket, head, (ws) => {
      attachRealtimeChannel(runtime, ws, sessionId, logger).catch((err: unknown) => {
        logger.error({ err, sessionId }, "Could not open realtime channel");
        ws.close(1011, "Internal error");
      });
    });
  });

  return { server, wss };
}
