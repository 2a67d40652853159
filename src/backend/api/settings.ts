import type { FastifyInstance } from "fastify";
import { SettingsSchema, type Settings } from "../modules/settings/index.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "settings" });

/** Read and persist settings; the server uses the settings module's cache and file. */
export interface SettingsStore {
  get(): Settings;
  update(patch: Partial<Settings>): Settings;
}

export async function registerSettingsRoutes(app: FastifyInstance, store: SettingsStore) {
  // GET /api/settings
  app.get("/api/settings", async () => {
    return store.get();
  });

  // PUT /api/settings
  // Running supervisor and worker processes keep the values they started with.
  app.put("/api/settings", async (request, reply) => {
    const partial = SettingsSchema.partial().strict().safeParse(request.body);
    if (!partial.success) {
      return reply.status(400).send({ error: partial.error.flatten() });
    }

    const updated = store.update(partial.data);
    log.info({ keys: Object.keys(partial.data) }, "Settings updated");
    return updated;
  });
}
