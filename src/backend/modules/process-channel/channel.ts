import { spawn, type ChildProcess } from "child_process";
import { Socket } from "net";
import { Readable, Writable } from "stream";
import { logger } from "../../logger.js";
import {
  DEFAULT_MAX_FRAME_BYTES,
  FrameReader,
  FrameWriter,
  UnlockdError,
  type FramedChannel,
} from "../ipc/index.js";
import type { PipeDescriptors } from "./arguments.js";

const log = logger.child({ module: "process-channel" });

// ---------------------------------------------------------------------------
// Descriptor layout in the child
// ---------------------------------------------------------------------------

// stdio slots 0–2 keep their usual meaning; the two pipes follow them
export const CHILD_TX_FD = 3;
export const CHILD_RX_FD = 4;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** How to start another copy of this program. */
export interface SelfCommand {
  command: string;
  args: string[];
}

/**
 * Parent-side ownership of one spawned process and its pipe pair.
 * `channel.writer` sends to the child, `channel.reader` receives from it.
 */
export interface ChildHandle {
  readonly pid: number;
  readonly channel: FramedChannel;
  /** Resolves with the exit code (null when killed by a signal). */
  wait(timeoutMs?: number): Promise<number | null>;
  /** SIGKILL; the exit is still observed through wait(). */
  kill(): void;
  /** Closes both pipe ends without touching the process. */
  close(): void;
}

export interface SpawnChildOptions {
  maxFrameBytes?: number;
  self?: SelfCommand;
}

export class ChildExitTimeoutError extends UnlockdError {
  constructor(readonly pid: number, readonly timeoutMs: number) {
    super("UnknownError", `Process ${pid} did not exit within ${timeoutMs} ms`);
    this.name = "ChildExitTimeoutError";
  }
}

// ---------------------------------------------------------------------------
// Parent side
// ---------------------------------------------------------------------------

/**
 * The running program re-invoked: node binary, its loader flags
 * (e.g. `--import tsx` in development) and the entry script.
 */
export function selfCommand(): SelfCommand {
  const entry = process.argv[1];
  return {
    command: process.execPath,
    args: entry ? [...process.execArgv, entry] : [...process.execArgv],
  };
}

function destroyQuietly(stream: Readable | Writable | null | undefined): void {
  if (stream && !stream.destroyed) stream.destroy();
}

/**
 * Spawns this program with `extraArgs` plus the two descriptor flags and
 * returns the parent's end of both pipes.
 *
 * Throws UnlockdError("UnknownError") when the process or either pipe
 * could not be created; nothing is left open in that case.
 */
export function spawnChild(extraArgs: readonly string[], options: SpawnChildOptions = {}): ChildHandle {
  const { command, args } = options.self ?? selfCommand();
  const argv = [...args, ...extraArgs, `--tx=${CHILD_TX_FD}`, `--rx=${CHILD_RX_FD}`];

  let child: ChildProcess;
  try {
    child = spawn(command, argv, {
      stdio: ["ignore", "inherit", "inherit", "pipe", "pipe"],
    });
  } catch (err) {
    log.error({ err, argv }, "Unable to spawn a child process");
    throw new UnlockdError("UnknownError", "Unable to spawn a child process", { cause: err });
  }

  const exited = new Promise<number | null>((resolve) => {
    child.once("exit", (code) => resolve(code));
    child.once("error", (err) => {
      log.error({ err, pid: child.pid }, "Child process error");
      resolve(null);
    });
  });

  const fromChild = child.stdio[CHILD_TX_FD];
  const toChild = child.stdio[CHILD_RX_FD];

  if (!child.pid || !(fromChild instanceof Readable) || !(toChild instanceof Writable)) {
    destroyQuietly(fromChild);
    destroyQuietly(toChild);
    child.kill("SIGKILL");
    log.error({ argv }, "Child process spawned without a pid or pipes");
    throw new UnlockdError("UnknownError", "Unable to spawn a child process");
  }

  const pid = child.pid;
  const reader = new FrameReader(fromChild, options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES);
  const writer = new FrameWriter(toChild);

  log.debug({ pid, args: extraArgs }, "Child process spawned");

  return {
    pid,
    channel: { reader, writer },

    wait(timeoutMs?: number) {
      if (timeoutMs === undefined) return exited;
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new ChildExitTimeoutError(pid, timeoutMs)), timeoutMs);
      });
      return Promise.race([exited, timeout]).finally(() => clearTimeout(timer));
    },

    kill() {
      if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
    },

    close() {
      writer.close();
      reader.destroy();
    },
  };
}

// ---------------------------------------------------------------------------
// Child side
// ---------------------------------------------------------------------------

/**
 * Rebuilds this process's pipe pair from the descriptor numbers its parent
 * passed on the command line.
 */
export function openParentChannel(
  pipes: PipeDescriptors,
  maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES,
): FramedChannel {
  try {
    const tx = new Socket({ fd: pipes.tx, readable: false, writable: true });
    const rx = new Socket({ fd: pipes.rx, readable: true, writable: false });
    return {
      reader: new FrameReader(rx, maxFrameBytes),
      writer: new FrameWriter(tx),
    };
  } catch (err) {
    throw new UnlockdError(
      "SocketCommunicationFailed",
      `Cannot open parent pipes (tx=${pipes.tx}, rx=${pipes.rx})`,
      { cause: err },
    );
  }
}
