import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { acceptConnection } from "./acceptConnection.js";
import { OpenTriviaQuestionProvider } from "./adapters/OpenTriviaQuestionProvider.js";
import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketPlayerConnection } from "./adapters/WebSocketPlayerConnection.js";
import { createServerApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import { Matchmaker, SessionSupervisor, type GameContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";

export async function startServer(configFile?: string): Promise<void> {
  const config = await loadServerConfig(configFile ? { configFile } : {});
  const logger = createConsoleLogger("trivia-server", config.logLevel);
  const scheduler = new RealScheduler({ logger });
  const supervisor = new SessionSupervisor(logger);

  const context: GameContext = {
    questionProvider: new OpenTriviaQuestionProvider({
      apiUrl: config.questionApiUrl,
      logger,
    }),
    scheduler,
    config: config.game,
    logger,
  };
  const matchmaker = new Matchmaker({ context, supervisor });

  const app = createServerApp({
    port: config.port,
    config: config.game,
    matchmaker,
    supervisor,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  let connectionCount = 0;
  app.get(
    "/ws",
    upgradeWebSocket((_c: Context) => ({
      onOpen(_event: Event, ws: WSContext<WebSocket>): void {
        const rawSocket = ws.raw;
        if (!rawSocket) {
          logger.warn("WebSocket connection missing raw handle");
          return;
        }
        connectionCount += 1;
        const player = new WebSocketPlayerConnection(
          rawSocket,
          `player-${connectionCount}`,
          logger,
        );
        void acceptConnection(player, matchmaker, logger);
      },
    })),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (): void => {
    logger.info("Shutting down", { activeSessions: supervisor.activeCount });
    scheduler.cancelAll();
    server.close();
    process.exit(0);
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void startServer(process.argv[2] ?? process.env["CONFIG_FILE"]).catch((error: unknown) => {
  createConsoleLogger("trivia-server").error("Failed to start server", { error });
  process.exit(1);
});
