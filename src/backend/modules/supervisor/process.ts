import { logger } from "../../logger.js";
import { getDb, initDb } from "../../db/migrate.js";
import { listOwnedApps } from "../catalog/index.js";
import { loadNativeClient } from "../native/index.js";
import { openParentChannel, spawnChild, type PipeDescriptors } from "../process-channel/index.js";
import { loadSettings } from "../settings/index.js";
import { runSupervisor } from "./supervisor.js";

/**
 * Supervisor process entry: wires settings, the catalog database, the
 * native client and the real process spawner into runSupervisor.
 */
export async function startSupervisorProcess(pipes: PipeDescriptors): Promise<void> {
  const settings = await loadSettings();
  await initDb();
  const client = await loadNativeClient(settings);
  const channel = openParentChannel(pipes, settings.maxFrameBytes);

  logger.info({ role: "supervisor", pid: process.pid }, "Supervisor starting");

  await runSupervisor({
    channel,
    client,
    spawnWorker: (appId) => spawnChild([`--app=${appId}`], { maxFrameBytes: settings.maxFrameBytes }),
    listApps: (session) =>
      listOwnedApps(session, {
        appListUrl: settings.appListUrl,
        catalogMaxAgeHours: settings.catalogMaxAgeHours,
        language: settings.language,
        db: getDb(),
      }),
    ipcTimeoutMs: settings.ipcTimeoutMs,
    shutdownTimeoutMs: settings.shutdownTimeoutMs,
  });
}
