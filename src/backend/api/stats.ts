import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  AchievementInfoSchema,
  Float32Schema,
  Int32Schema,
  StatInfoSchema,
  statFlags,
  type Command,
} from "../modules/ipc/index.js";
import type { SupervisorClient } from "../modules/supervisor/index.js";
import { INVALID_APP_ID, parseAppId, sendResponse } from "./respond.js";

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

const AchievementBody = z.object({ unlocked: z.boolean() });

const StatBody = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("integer"), value: Int32Schema }),
  z.object({ kind: z.literal("float"), value: Float32Schema }),
]);

const ResetBody = z.object({ achievementsToo: z.boolean().default(false) });

type ItemParams = { Params: { appId: string; id: string } };

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function registerStatsRoutes(app: FastifyInstance, supervisor: SupervisorClient) {
  /**
   * GET /api/apps/:appId/achievements
   *
   * Responses:
   *   200  AchievementInfo[]
   *   404  App is not launched
   */
  app.get<{ Params: { appId: string } }>("/api/apps/:appId/achievements", async (request, reply) => {
    const appId = parseAppId(request.params);
    if (appId === null) return reply.status(400).send(INVALID_APP_ID);

    const response = await supervisor.request({ type: "GetAchievements", appId }, z.array(AchievementInfoSchema));
    return sendResponse(reply, response);
  });

  /**
   * PUT /api/apps/:appId/achievements/:id
   * Body: { unlocked: boolean }
   */
  app.put<ItemParams>("/api/apps/:appId/achievements/:id", async (request, reply) => {
    const appId = parseAppId(request.params);
    if (appId === null) return reply.status(400).send(INVALID_APP_ID);

    const body = AchievementBody.safeParse(request.body);
    if (!body.success) return reply.status(400).send({ error: body.error.flatten() });

    const command: Command = {
      type: "SetAchievement",
      appId,
      achievementId: request.params.id,
      unlocked: body.data.unlocked,
    };
    const response = await supervisor.request(command, z.boolean());
    if (response.type === "Error") return sendResponse(reply, response);
    return { id: request.params.id, unlocked: body.data.unlocked };
  });

  /**
   * GET /api/apps/:appId/stats
   * Each stat carries its flags (IncrementOnly, Protected, UnknownPermission).
   */
  app.get<{ Params: { appId: string } }>("/api/apps/:appId/stats", async (request, reply) => {
    const appId = parseAppId(request.params);
    if (appId === null) return reply.status(400).send(INVALID_APP_ID);

    const response = await supervisor.request({ type: "GetStats", appId }, z.array(StatInfoSchema));
    if (response.type === "Error") return sendResponse(reply, response);
    return response.data.map((stat) => ({ ...stat, flags: statFlags(stat) }));
  });

  /**
   * PUT /api/apps/:appId/stats/:id
   * Body: { kind: "integer" | "float", value: number }
   *
   * Responses:
   *   200  { id, value }   value as stored by the client
   *   400  Invalid body (integer outside i32, non-finite float)
   */
  app.put<ItemParams>("/api/apps/:appId/stats/:id", async (request, reply) => {
    const appId = parseAppId(request.params);
    if (appId === null) return reply.status(400).send(INVALID_APP_ID);

    const body = StatBody.safeParse(request.body);
    if (!body.success) return reply.status(400).send({ error: body.error.flatten() });

    const statId = request.params.id;
    const command: Command =
      body.data.kind === "integer"
        ? { type: "SetIntStat", appId, statId, value: body.data.value }
        : { type: "SetFloatStat", appId, statId, value: body.data.value };

    const response = await supervisor.request(command, z.number());
    if (response.type === "Error") return sendResponse(reply, response);
    return { id: statId, value: response.data };
  });

  /**
   * POST /api/apps/:appId/reset
   * Body (optional): { achievementsToo?: boolean }
   */
  app.post<{ Params: { appId: string } }>("/api/apps/:appId/reset", async (request, reply) => {
    const appId = parseAppId(request.params);
    if (appId === null) return reply.status(400).send(INVALID_APP_ID);

    const body = ResetBody.safeParse(request.body ?? {});
    if (!body.success) return reply.status(400).send({ error: body.error.flatten() });

    const response = await supervisor.request(
      { type: "ResetStats", appId, achievementsToo: body.data.achievementsToo },
      z.boolean(),
    );
    if (response.type === "Error") return sendResponse(reply, response);
    return { reset: response.data };
  });
}
