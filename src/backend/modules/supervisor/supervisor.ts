/**
 * ============================================================
 *  Supervisor — routes UI commands to per-app workers
 * ============================================================
 *
 * Owns the catalog session and the app id → worker map. Nothing
 * else reads or writes either; both live on the Supervisor
 * instance driven by runSupervisor's loop.
 *
 * Per-app commands are relayed: the command is re-encoded for the
 * worker and the worker's reply frame goes back to the UI as-is,
 * without being decoded here.
 * ============================================================
 */
import type { Logger } from "pino";
import { logger } from "../../logger.js";
import {
  FrameTooLargeError,
  PipeTimeoutError,
  decodeCommand,
  encodeCommand,
  encodeResponse,
  failure,
  success,
  toErrorKind,
  type AppCommand,
  type AppModel,
  type Command,
  type FramedChannel,
  type RawFrame,
  type Response,
} from "../ipc/index.js";
import { openCatalogSession, type CatalogSession, type NativeClient } from "../native/index.js";
import type { ChildHandle } from "../process-channel/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SupervisorOptions {
  /** UI-facing pipe pair. */
  channel: FramedChannel;
  client: NativeClient;
  /** Starts a worker for `appId`; throws when the process cannot be created. */
  spawnWorker: (appId: number) => ChildHandle;
  listApps: (session: CatalogSession) => Promise<AppModel[]>;
  /** Deadline for each write to and read from a worker. */
  ipcTimeoutMs: number;
  /** How long a worker may take to exit after Shutdown before it is killed. */
  shutdownTimeoutMs: number;
}

export type SupervisorDeps = Omit<SupervisorOptions, "channel">;

type Outcome = { frame: RawFrame; stop: boolean };

const reply = <T>(response: Response<T>): Outcome => ({ frame: encodeResponse(response), stop: false });

// ---------------------------------------------------------------------------
// Supervisor
// ---------------------------------------------------------------------------

export class Supervisor {
  private session: CatalogSession | null = null;
  private readonly workers = new Map<number, ChildHandle>();
  private readonly log: Logger;

  constructor(private readonly deps: SupervisorDeps) {
    this.log = logger.child({ role: "supervisor" });
  }

  /** App ids with a live worker, in launch order. */
  runningApps(): number[] {
    return [...this.workers.keys()];
  }

  async handle(command: Command): Promise<Outcome> {
    if (!this.session) {
      if (command.type === "Shutdown") {
        return { frame: encodeResponse(success(true)), stop: true };
      }
      try {
        this.session = await openCatalogSession(this.deps.client);
        this.log.info("Connected to Steam");
      } catch (err) {
        this.log.warn({ err }, "Steam connection failed, will retry on the next command");
        return reply(failure("SteamConnectionFailed"));
      }
    }
    return this.dispatch(this.session, command);
  }

  private async dispatch(session: CatalogSession, command: Command): Promise<Outcome> {
    switch (command.type) {
      case "Status":
        return reply(success(true));

      case "GetOwnedAppList":
        try {
          return reply(success(await this.deps.listApps(session)));
        } catch (err) {
          this.log.error({ err }, "Failed to list owned apps");
          return reply(failure(toErrorKind(err)));
        }

      case "LaunchApp":
        return reply(this.launch(command.appId));

      case "StopApp": {
        const handle = this.workers.get(command.appId);
        if (!handle) {
          this.log.warn({ appId: command.appId }, "StopApp for an app that is not running");
          return reply(failure("UnknownError"));
        }
        this.workers.delete(command.appId);
        return { frame: await this.stopWorker(command.appId, handle), stop: false };
      }

      case "StopApps":
        await this.stopAll();
        return reply(success(true));

      case "Shutdown":
        await this.stopAll();
        await this.closeSession(session);
        return { frame: encodeResponse(success(true)), stop: true };

      default:
        return this.relay(command);
    }
  }

  // -------------------------------------------------------------------------
  // Worker lifecycle
  // -------------------------------------------------------------------------

  private launch(appId: number): Response<boolean> {
    if (this.workers.has(appId)) {
      this.log.warn({ appId }, "App is already running");
      return failure("UnknownError");
    }
    try {
      const handle = this.deps.spawnWorker(appId);
      this.workers.set(appId, handle);
      this.log.info({ appId, pid: handle.pid }, "Worker launched");
      return success(true);
    } catch (err) {
      this.log.error({ err, appId }, "Could not start worker");
      return failure("UnknownError");
    }
  }

  /** Sends Shutdown, waits for the exit (bounded) and returns the worker's reply. */
  private async stopWorker(appId: number, handle: ChildHandle): Promise<RawFrame> {
    const frame = await this.exchange(appId, handle, { type: "Shutdown" });
    try {
      const code = await handle.wait(this.deps.shutdownTimeoutMs);
      this.log.info({ appId, code }, "Worker exited");
    } catch (err) {
      this.log.warn({ err, appId }, "Worker did not exit in time, killing it");
      handle.kill();
    }
    handle.close();
    return frame;
  }

  /** Empties the map first, then stops each worker in turn. */
  private async stopAll(): Promise<void> {
    const workers = [...this.workers];
    this.workers.clear();
    for (const [appId, handle] of workers) {
      await this.stopWorker(appId, handle);
    }
  }

  private async closeSession(session: CatalogSession): Promise<void> {
    this.session = null;
    try {
      await session.shutdown();
    } catch (err) {
      this.log.warn({ err }, "Failed to close Steam session");
    }
  }

  /**
   * Closes every worker pipe without a Shutdown exchange: workers see
   * end-of-pipe and exit on their own.
   */
  async release(): Promise<void> {
    for (const [appId, handle] of this.workers) {
      this.log.debug({ appId }, "Closing worker pipes");
      handle.close();
    }
    this.workers.clear();
    if (this.session) await this.closeSession(this.session);
  }

  // -------------------------------------------------------------------------
  // Relaying
  // -------------------------------------------------------------------------

  private async relay(command: AppCommand): Promise<Outcome> {
    const handle = this.workers.get(command.appId);
    if (!handle) return reply(failure("AppMismatchError"));
    return { frame: await this.exchange(command.appId, handle, command), stop: false };
  }

  /**
   * One command out, one frame back. Transport failures become a
   * SocketCommunicationFailed reply; when the worker's pipe may be left
   * mid-frame (deadline expiry, oversized frame) the worker is killed
   * and dropped from the map.
   */
  private async exchange(appId: number, handle: ChildHandle, command: Command): Promise<RawFrame> {
    const outgoing = encodeCommand(command);
    if (!outgoing) return encodeResponse(failure("SerializationFailed"));

    const { ipcTimeoutMs } = this.deps;
    try {
      await handle.channel.writer.write(outgoing, ipcTimeoutMs);
      return await handle.channel.reader.read(ipcTimeoutMs);
    } catch (err) {
      this.log.error({ err, appId, command: command.type }, "Worker communication failed");
      if (err instanceof PipeTimeoutError || err instanceof FrameTooLargeError) {
        this.evict(appId, handle);
      }
      return encodeResponse(failure("SocketCommunicationFailed"));
    }
  }

  private evict(appId: number, handle: ChildHandle): void {
    if (this.workers.get(appId) === handle) this.workers.delete(appId);
    handle.kill();
    handle.close();
    this.log.warn({ appId, pid: handle.pid }, "Worker killed and evicted");
  }
}

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

/**
 * Serves the UI until Shutdown or until the UI's pipe closes.
 * Resolves normally in both cases; the caller exits with code 0.
 */
export async function runSupervisor(options: SupervisorOptions): Promise<void> {
  const { channel, ...deps } = options;
  const supervisor = new Supervisor(deps);
  const log = logger.child({ role: "supervisor" });

  const send = async (frame: RawFrame): Promise<boolean> => {
    try {
      await channel.writer.write(frame);
      return true;
    } catch (err) {
      log.warn({ err }, "Failed to send response");
      return false;
    }
  };

  let stopped = false;
  for (;;) {
    let command: Command;
    try {
      command = decodeCommand(await channel.reader.read());
    } catch (err) {
      if (toErrorKind(err) === "SerializationFailed") {
        log.warn({ err }, "Discarding malformed command");
        if (await send(encodeResponse(failure("SerializationFailed")))) continue;
      } else {
        log.info({ err }, "UI pipe closed");
      }
      break;
    }

    log.debug({ command: command.type }, "Command received");

    const outcome = await supervisor.handle(command);
    const sent = await send(outcome.frame);
    if (outcome.stop) {
      stopped = true;
      break;
    }
    if (!sent) break;
  }

  if (!stopped) await supervisor.release();
  channel.writer.close();
  channel.reader.destroy();
  log.info("Supervisor stopped");
}
