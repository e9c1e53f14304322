import path from "node:path";
import {
  createLogger,
  loadConfig,
  SwitchboardRuntime,
  type Logger,
} from "@switchboard/core";
import { SQLiteSessionStore } from "@switchboard/persistence";
import { DocumentStore, KnowledgeBase } from "@switchboard/tools";
import { createApp } from "./app.js";
import { createAgents, registerAgents } from "./agents.js";
import { createModelAdapter } from "./providers.js";
import { createHttpServer, type HttpServer } from "./server.js";

async function main(): Promise<void> {
  const configPath = process.env.SWITCHBOARD_CONFIG ?? "switchboard.config.yaml";
  const config = loadConfig(configPath);
  const logger = createLogger({ level: config.logging.level });

  const store = config.persistence.dbPath
    ? new SQLiteSessionStore(path.resolve(config.persistence.dbPath))
    : undefined;
  const documents = new DocumentStore(path.resolve(config.workspace.documentsDir));
  const knowledge = new KnowledgeBase(path.resolve(config.workspace.knowledgeDir));
  const model = createModelAdapter(config.provider);

  const runtime = new SwitchboardRuntime({ config: config.runtime, store, logger });
  registerAgents(runtime, createAgents({ model, documents, knowledge }));
  await runtime.start();

  const http = createHttpServer({ app: createApp({ runtime, logger }), runtime, logger });
  http.server.listen(config.server.port, config.server.bind, () => {
    logger.info(
      { bind: config.server.bind, port: config.server.port, provider: config.provider.kind },
      "Switchboard server listening",
    );
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    stopServer(runtime, http, logger)
      .then(() => {
        store?.close();
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function stopServer(
  runtime: SwitchboardRuntime,
  { server, wss }: HttpServer,
  logger: Logger,
): Promise<void> {
  await runtime.stop();
  for (const client of wss.clients) {
    client.terminate();
  }
  await new Promise<void>((resolve, reject) => {
    wss.close((err) => (err ? reject(err) : resolve()));
  });
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  logger.info("Server stopped");
}

main().catch((err: unknown) => {
  createLogger({ name: "switchboard" }).fatal({ err }, "Startup failed");
  process.exit(1);
});
