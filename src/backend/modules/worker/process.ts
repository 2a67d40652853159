import { logger } from "../../logger.js";
import { UnlockdError } from "../ipc/index.js";
import { loadKeyValueFile } from "../key-value/index.js";
import { detectSteamRoot, loadNativeClient, statsSchemaPath } from "../native/index.js";
import { openParentChannel, type PipeDescriptors } from "../process-channel/index.js";
import { loadSettings } from "../settings/index.js";
import { runWorker } from "./worker.js";

/** Worker process entry for one app id. */
export async function startWorkerProcess(appId: number, pipes: PipeDescriptors): Promise<void> {
  const settings = await loadSettings();
  const client = await loadNativeClient(settings);
  const channel = openParentChannel(pipes, settings.maxFrameBytes);

  logger.info({ role: "worker", appId, pid: process.pid }, "Worker starting");

  await runWorker({
    appId,
    channel,
    client,
    schema: {
      language: settings.language,
      loadSchema: async () => {
        const root = detectSteamRoot(settings.steamRoot);
        if (!root) {
          throw new UnlockdError("UnknownError", "Steam installation not found");
        }
        return loadKeyValueFile(statsSchemaPath(root, appId));
      },
    },
  });
}
