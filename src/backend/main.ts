/**
 * Process entry point. The same script runs as the UI process, the
 * supervisor (--orchestrator) or a per-app worker (--app=<id>).
 */
import { exitProcess, logger } from "./logger.js";
import { CliArgumentError, parseCliArguments, type LaunchMode } from "./modules/process-channel/index.js";
import { startSupervisorProcess } from "./modules/supervisor/process.js";
import { startWorkerProcess } from "./modules/worker/process.js";
import { startUi } from "./server.js";

/** Exit code once the role is done; null while the UI keeps serving. */
async function run(mode: LaunchMode): Promise<number | null> {
  switch (mode.role) {
    case "ui":
      await startUi();
      return null;
    case "supervisor":
      await startSupervisorProcess(mode.pipes);
      return 0;
    case "worker":
      await startWorkerProcess(mode.appId, mode.pipes);
      return 0;
  }
}

async function main(): Promise<number | null> {
  let mode: LaunchMode;
  try {
    mode = parseCliArguments(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliArgumentError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
  return run(mode);
}

main()
  .then(
    (code) => (code === null ? undefined : exitProcess(code)),
    (err: unknown) => {
      logger.fatal({ err }, "Process failed");
      return exitProcess(1);
    },
  )
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
