import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { AppModelSchema } from "../modules/ipc/index.js";
import type { SupervisorClient } from "../modules/supervisor/index.js";
import { logger } from "../logger.js";
import { INVALID_APP_ID, parseAppId, sendResponse } from "./respond.js";
import { appStatus, broadcast } from "./ws.js";

const log = logger.child({ module: "apps" });

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function registerAppsRoutes(app: FastifyInstance, supervisor: SupervisorClient) {
  /**
   * GET /api/apps
   * Owned apps from the catalog.
   *
   * Responses:
   *   200  AppModel[]
   *   503  Steam unreachable / app list unavailable
   */
  app.get("/api/apps", async (_request, reply) => {
    const response = await supervisor.request({ type: "GetOwnedAppList" }, z.array(AppModelSchema));
    return sendResponse(reply, response);
  });

  /**
   * POST /api/apps/:appId/launch
   * Starts the worker process that serves this app's achievements and stats.
   *
   * Responses:
   *   200  { launched: true }
   *   400  Invalid app id
   *   500  Already running / worker could not be started
   */
  app.post<{ Params: { appId: string } }>("/api/apps/:appId/launch", async (request, reply) => {
    const appId = parseAppId(request.params);
    if (appId === null) return reply.status(400).send(INVALID_APP_ID);

    const response = await supervisor.request({ type: "LaunchApp", appId }, z.boolean());
    if (response.type === "Error") return sendResponse(reply, response);

    log.info({ appId }, "App launched");
    broadcast(appStatus(appId, "running"));
    return { launched: response.data };
  });

  /**
   * POST /api/apps/:appId/stop
   * Stops this app's worker.
   *
   * Responses:
   *   200  { stopped: true }
   *   400  Invalid app id
   *   500  Not running
   */
  app.post<{ Params: { appId: string } }>("/api/apps/:appId/stop", async (request, reply) => {
    const appId = parseAppId(request.params);
    if (appId === null) return reply.status(400).send(INVALID_APP_ID);

    const response = await supervisor.request({ type: "StopApp", appId }, z.boolean());
    if (response.type === "Error") return sendResponse(reply, response);

    log.info({ appId }, "App stopped");
    broadcast(appStatus(appId, "stopped"));
    return { stopped: response.data };
  });

  /**
   * POST /api/apps/stop
   * Stops every worker.
   */
  app.post("/api/apps/stop", async (_request, reply) => {
    const response = await supervisor.request({ type: "StopApps" }, z.boolean());
    if (response.type === "Error") return sendResponse(reply, response);

    broadcast(appStatus(null, "stopped"));
    return { stopped: response.data };
  });
}
