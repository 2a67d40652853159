/**
 * SupervisorClient — the UI process's handle on its supervisor.
 *
 * Requests go out one at a time, each bounded by `requestTimeoutMs`.
 * A request that times out still owes a reply: the next request first
 * reads and drops it so responses never get paired with the wrong
 * command.
 *
 * shutdown() runs once, however many times it is called.
 */
import { z } from "zod";
import { logger } from "../../logger.js";
import {
  FrameTooLargeError,
  PipeClosedError,
  PipeTimeoutError,
  decodeResponse,
  encodeCommand,
  failure,
  toErrorKind,
  type Command,
  type Response,
} from "../ipc/index.js";
import type { ChildHandle } from "../process-channel/index.js";

const log = logger.child({ module: "supervisor-client" });

export interface SupervisorClientOptions {
  requestTimeoutMs: number;
  shutdownTimeoutMs: number;
}

export class SupervisorClient {
  private queue: Promise<unknown> = Promise.resolve();
  private owedReplies = 0;
  private closed = false;
  private shutdownRun: Promise<void> | null = null;

  constructor(
    private readonly handle: ChildHandle,
    private readonly options: SupervisorClientOptions,
  ) {}

  get pid(): number {
    return this.handle.pid;
  }

  /**
   * Sends `command` and decodes the reply's data with `schema`.
   * Never rejects: transport and decoding failures come back as Error responses.
   */
  request<T>(command: Command, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Response<T>> {
    const run = this.queue.then(() => this.exchange(command, schema));
    this.queue = run;
    return run;
  }

  private async exchange<T>(
    command: Command,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Response<T>> {
    if (this.closed) return failure("SocketCommunicationFailed");

    const frame = encodeCommand(command);
    if (!frame) return failure("SerializationFailed");

    const { reader, writer } = this.handle.channel;
    const timeoutMs = this.options.requestTimeoutMs;
    let draining = true;

    try {
      while (this.owedReplies > 0) {
        await reader.read(timeoutMs);
        this.owedReplies--;
        log.debug({ owed: this.owedReplies }, "Dropped a late reply");
      }

      draining = false;
      await writer.write(frame, timeoutMs);
      return decodeResponse(await reader.read(timeoutMs), schema);
    } catch (err) {
      if (err instanceof PipeTimeoutError) {
        // once written (or queued for writing) the command will be answered
        if (!draining) this.owedReplies++;
        log.warn({ command: command.type, timeoutMs }, "Supervisor request timed out");
      } else if (err instanceof PipeClosedError || err instanceof FrameTooLargeError) {
        // an oversized header stays buffered, so the pipe cannot recover
        this.closed = true;
        log.error({ err, command: command.type }, "Supervisor pipe unusable");
      } else {
        log.error({ err, command: command.type }, "Supervisor request failed");
      }
      return failure(toErrorKind(err));
    }
  }

  /** Shutdown, then a bounded wait for the supervisor to exit. */
  shutdown(): Promise<void> {
    if (!this.shutdownRun) this.shutdownRun = this.runShutdown();
    return this.shutdownRun;
  }

  private async runShutdown(): Promise<void> {
    const response = await this.request({ type: "Shutdown" }, z.boolean());
    if (response.type === "Error") {
      log.warn({ error: response.error }, "Supervisor did not acknowledge Shutdown");
    }
    this.closed = true;

    try {
      const code = await this.handle.wait(this.options.shutdownTimeoutMs);
      log.info({ code }, "Supervisor exited");
    } catch (err) {
      log.warn({ err }, "Supervisor did not exit in time, killing it");
      this.handle.kill();
    }
    this.handle.close();
  }
}
