import Fastify, { type FastifyInstance } from "fastify";
import fastifyWebSocket from "@fastify/websocket";
import { z } from "zod";
import { exitProcess, logger, loggerOptions } from "./logger.js";
import { loadSettings, getSettings, updateSettings } from "./modules/settings/index.js";
import { spawnChild } from "./modules/process-channel/index.js";
import { SupervisorClient } from "./modules/supervisor/index.js";
import { registerAppsRoutes } from "./api/apps.js";
import { registerStatsRoutes } from "./api/stats.js";
import { registerSettingsRoutes, type SettingsStore } from "./api/settings.js";
import { registerWsRoutes } from "./api/ws.js";

export const VERSION = "0.1.0";

export interface ServerOptions {
  supervisor: SupervisorClient;
  settings?: SettingsStore;
}

/**
 * Builds the HTTP/WebSocket front end around an already spawned supervisor.
 * Closing the server shuts the supervisor down (once).
 */
export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const { supervisor } = options;
  const settings = options.settings ?? { get: getSettings, update: updateSettings };

  const app = Fastify({ logger: loggerOptions });

  await app.register(fastifyWebSocket);

  // Health check: reports whether the supervisor still answers
  app.get("/api/health", async () => {
    const status = await supervisor.request({ type: "Status" }, z.boolean());
    return {
      status: "ok",
      version: VERSION,
      supervisor: status.type === "Success" ? "ok" : status.error,
      timestamp: Date.now(),
    };
  });

  await registerAppsRoutes(app, supervisor);
  await registerStatsRoutes(app, supervisor);
  await registerSettingsRoutes(app, settings);
  await registerWsRoutes(app);

  app.addHook("onClose", async () => {
    await supervisor.shutdown();
  });

  return app;
}

/** UI process: spawns the supervisor, then serves the API until a signal arrives. */
export async function startUi(): Promise<void> {
  const current = await loadSettings();

  const supervisor = new SupervisorClient(
    spawnChild(["--orchestrator"], { maxFrameBytes: current.maxFrameBytes }),
    { requestTimeoutMs: current.requestTimeoutMs, shutdownTimeoutMs: current.shutdownTimeoutMs },
  );
  logger.info({ pid: supervisor.pid }, "Supervisor started");

  const app = await buildServer({ supervisor });
  const port = Number(process.env.UNLOCKD_PORT ?? 9430);
  const host = process.env.UNLOCKD_HOST ?? "127.0.0.1";

  try {
    await app.listen({ port, host });
    logger.info({ url: `http://${host}:${port}` }, "unlockd ready");
  } catch (err) {
    logger.error({ err }, "Could not start the HTTP server");
    await app.close();
    await exitProcess(1);
  }

  // Graceful shutdown. close() runs the onClose hook, which stops the supervisor
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    app.close()
      .then(
        () => exitProcess(0),
        (err: unknown) => {
          logger.error({ err }, "Shutdown failed");
          return exitProcess(1);
        },
      )
      .catch((err: unknown) => {
        console.error(err);
        process.exit(1);
      });
  };
  process.once("SIGINT",  shutdown);
  process.once("SIGTERM", shutdown);
}
