/**
 * ============================================================
 *  Worker — serves one app id for the supervisor
 * ============================================================
 *
 * Opens a single native session for its app id at startup and
 * never retries it. Then, one command at a time:
 *
 *   read frame → decode → handle → write response
 *
 * The loop ends on Shutdown or when the supervisor's pipe closes.
 * No command is fatal: every failure becomes an Error response.
 * ============================================================
 */
import { logger } from "../../logger.js";
import {
  decodeCommand,
  encodeResponse,
  failure,
  isAppCommand,
  success,
  toErrorKind,
  type Command,
  type FramedChannel,
  type Response,
} from "../ipc/index.js";
import { openUserStatsSession, type NativeClient } from "../native/index.js";
import { AppManager, type AppManagerOptions } from "./app-manager.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WorkerOptions {
  appId: number;
  /** Supervisor-facing pipe pair. */
  channel: FramedChannel;
  client: NativeClient;
  schema: AppManagerOptions;
}

type Outcome = { response: Response<unknown>; stop: boolean };

const reply = (response: Response<unknown>): Outcome => ({ response, stop: false });

// ---------------------------------------------------------------------------
// Command handling
// ---------------------------------------------------------------------------

async function attempt<T>(run: () => Promise<T>): Promise<Response<T>> {
  try {
    return success(await run());
  } catch (err) {
    return failure(toErrorKind(err));
  }
}

/**
 * Handles one command for a connected worker.
 * Exported for unit tests; runWorker is the only production caller.
 */
export async function handleWorkerCommand(manager: AppManager, command: Command): Promise<Outcome> {
  if (isAppCommand(command) && command.appId !== manager.appId) {
    return reply(failure("AppMismatchError"));
  }

  switch (command.type) {
    case "Status":
      return reply(success(true));

    case "Shutdown":
      await manager.disconnect();
      return { response: success(true), stop: true };

    case "GetAchievements":
      return reply(await attempt(() => manager.getAchievements()));

    case "GetStats":
      return reply(await attempt(() => manager.getStatistics()));

    case "SetAchievement": {
      const { achievementId, unlocked } = command;
      return reply(
        await attempt(async () => {
          await manager.setAchievement(achievementId, unlocked);
          return true;
        }),
      );
    }

    case "SetIntStat": {
      const { statId, value } = command;
      return reply(await attempt(() => manager.setIntStat(statId, value)));
    }

    case "SetFloatStat": {
      const { statId, value } = command;
      return reply(await attempt(() => manager.setFloatStat(statId, value)));
    }

    case "ResetStats": {
      const { achievementsToo } = command;
      return reply(await attempt(() => manager.resetAllStats(achievementsToo)));
    }

    default:
      return reply(failure("UnknownError"));
  }
}

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

/**
 * Runs until Shutdown or until the supervisor's pipe closes.
 * Resolves normally in both cases; the caller exits with code 0.
 */
export async function runWorker(options: WorkerOptions): Promise<void> {
  const { appId, channel } = options;
  const log = logger.child({ role: "worker", appId });

  let manager: AppManager | null = null;
  try {
    const session = await openUserStatsSession(options.client, appId);
    manager = new AppManager(appId, session, options.schema);
    log.info("Connected to Steam");
  } catch (err) {
    log.error({ err }, "Failed to connect to Steam");
  }

  const send = async (response: Response<unknown>): Promise<boolean> => {
    try {
      await channel.writer.write(encodeResponse(response));
      return true;
    } catch (err) {
      log.warn({ err }, "Failed to send response");
      return false;
    }
  };

  for (;;) {
    let command: Command;
    try {
      command = decodeCommand(await channel.reader.read());
    } catch (err) {
      if (toErrorKind(err) === "SerializationFailed") {
        log.warn({ err }, "Discarding malformed command");
        if (await send(failure("SerializationFailed"))) continue;
      } else {
        log.info({ err }, "Supervisor pipe closed");
      }
      break;
    }

    log.debug({ command: command.type }, "Command received");

    const outcome: Outcome = manager
      ? await handleWorkerCommand(manager, command)
      : reply(failure("SteamConnectionFailed"));

    const sent = await send(outcome.response);
    if (outcome.stop || !sent) break;
  }

  channel.writer.close();
  channel.reader.destroy();
  log.info("Worker stopped");
}
