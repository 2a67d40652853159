/**
 * Child entry for the process-channel tests: a worker with no Steam client
 * behind it, so every command is answered with SteamConnectionFailed.
 * Spawned through spawnChild(); never imported by the suite.
 */
import { UnlockdError } from "../../backend/modules/ipc/index.js";
import { createUnavailableClient } from "../../backend/modules/native/index.js";
import { openParentChannel, parseCliArguments } from "../../backend/modules/process-channel/index.js";
import { runWorker } from "../../backend/modules/worker/index.js";

const mode = parseCliArguments(process.argv.slice(2));
if (mode.role !== "worker") {
  throw new Error(`Expected the worker role, got ${mode.role}`);
}

await runWorker({
  appId: mode.appId,
  channel: openParentChannel(mode.pipes),
  client: createUnavailableClient("No Steam in tests"),
  schema: {
    language: "english",
    loadSchema: async () => {
      throw new UnlockdError("UnknownError", "No schema in tests");
    },
  },
});
process.exit(0);
