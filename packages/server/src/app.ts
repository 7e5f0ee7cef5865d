import { Hono } from "hono";
import type { Context, Next } from "hono";

import type { GameConfig, Matchmaker, SessionSupervisor } from "./core.js";

export interface CreateServerAppOptions {
  readonly port: number;
  readonly config: GameConfig;
  readonly matchmaker: Pick<Matchmaker, "waitingCount">;
  readonly supervisor: Pick<SessionSupervisor, "activeCount">;
}

export function createServerApp({
  port,
  config,
  matchmaker,
  supervisor,
}: CreateServerAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port } }),
  );

  app.get("/api/status", (c: Context) =>
    c.json({
      waitingPlayers: matchmaker.waitingCount,
      activeSessions: supervisor.activeCount,
      playersPerGame: config.playersPerGame,
      roundDurationMs: config.roundDurationMs,
    }),
  );

  return app;
}
