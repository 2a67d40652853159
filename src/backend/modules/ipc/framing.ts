/**
 * ============================================================
 *  Framing — length-prefixed messages over byte pipes
 * ============================================================
 *
 *   ┌──────────────────────┬───────────────────────────────┐
 *   │ length : u64 LE (8B) │ payload : `length` bytes      │
 *   └──────────────────────┴───────────────────────────────┘
 *
 * The payload is UTF-8 JSON (see protocol.ts), but nothing in this
 * file looks inside it: RawFrame is the opaque unit the supervisor
 * relays between a worker and the UI process.
 *
 * FrameReader hands out whole frames only. A frame stays in the
 * reader's buffer until every byte of it has arrived, so a read that
 * gives up on its deadline never leaves the pipe mid-frame.
 * ============================================================
 */
import type { Readable, Writable } from "stream";
import {
  FrameTooLargeError,
  PipeClosedError,
  PipeTimeoutError,
} from "./errors.js";

export const FRAME_HEADER_BYTES = 8;

/** Upper bound on a single payload unless the caller configures another. */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

// ---------------------------------------------------------------------------
// RawFrame
// ---------------------------------------------------------------------------

export class RawFrame {
  constructor(readonly payload: Buffer) {}

  get length(): number {
    return this.payload.length;
  }

  /** Header + payload, ready to be written to a pipe. */
  toBuffer(): Buffer {
    const header = Buffer.alloc(FRAME_HEADER_BYTES);
    header.writeBigUInt64LE(BigInt(this.payload.length), 0);
    return Buffer.concat([header, this.payload]);
  }
}

// ---------------------------------------------------------------------------
// Deadline helper
// ---------------------------------------------------------------------------

function withDeadline<T>(
  timeoutMs: number | undefined,
  run: (expired: () => boolean, onExpire: (cb: () => void) => void) => Promise<T>,
): Promise<T> {
  if (timeoutMs === undefined) return run(() => false, () => {});

  let expired = false;
  let expireHandler: (() => void) | null = null;
  const timer = setTimeout(() => {
    expired = true;
    expireHandler?.();
  }, timeoutMs);

  return run(
    () => expired,
    (cb) => {
      expireHandler = cb;
    },
  ).finally(() => clearTimeout(timer));
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

export class FrameReader {
  private pending: Buffer = Buffer.alloc(0);
  private closed = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private reading = false;

  constructor(
    private readonly stream: Readable,
    private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES,
  ) {
    stream.on("data", (chunk: Buffer | string) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      this.pending = this.pending.length === 0 ? bytes : Buffer.concat([this.pending, bytes]);
      this.notify();
    });
    stream.on("end", () => this.markClosed());
    stream.on("close", () => this.markClosed());
    stream.on("error", (err: Error) => {
      this.failure = err;
      this.markClosed();
    });
  }

  private markClosed(): void {
    this.closed = true;
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  /** Removes and returns one complete frame, or null if it has not fully arrived. */
  private takeFrame(): RawFrame | null {
    if (this.pending.length < FRAME_HEADER_BYTES) return null;

    const announced = this.pending.readBigUInt64LE(0);
    if (announced > BigInt(this.maxFrameBytes)) {
      throw new FrameTooLargeError(announced, this.maxFrameBytes);
    }

    const end = FRAME_HEADER_BYTES + Number(announced);
    if (this.pending.length < end) return null;

    const payload = Buffer.from(this.pending.subarray(FRAME_HEADER_BYTES, end));
    this.pending = this.pending.subarray(end);
    return new RawFrame(payload);
  }

  /**
   * Resolves with the next frame.
   * Rejects with PipeClosedError when the pipe ends before a whole frame is
   * buffered, and with PipeTimeoutError when `timeoutMs` elapses first.
   */
  read(timeoutMs?: number): Promise<RawFrame> {
    if (this.reading) {
      return Promise.reject(new Error("FrameReader does not support concurrent reads"));
    }
    this.reading = true;

    return withDeadline(timeoutMs, async (expired, onExpire) => {
      onExpire(() => this.notify());
      for (;;) {
        const frame = this.takeFrame();
        if (frame) return frame;

        if (this.closed) {
          const midFrame = this.pending.length > 0;
          throw new PipeClosedError(
            midFrame ? "Pipe closed in the middle of a frame" : "Pipe closed",
            { cause: this.failure ?? undefined },
          );
        }
        if (expired()) throw new PipeTimeoutError(timeoutMs ?? 0);

        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    }).finally(() => {
      this.reading = false;
    });
  }

  /** Stops reading from the underlying stream. */
  destroy(): void {
    this.stream.destroy();
  }
}

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

export class FrameWriter {
  private failure: Error | null = null;

  constructor(private readonly stream: Writable) {
    stream.on("error", (err: Error) => {
      this.failure = err;
    });
  }

  /**
   * Writes one frame. Resolves once the stream has accepted the bytes.
   * Rejects with PipeClosedError on a broken pipe, PipeTimeoutError on expiry.
   */
  write(frame: RawFrame, timeoutMs?: number): Promise<void> {
    if (this.failure || this.stream.destroyed || this.stream.writableEnded) {
      return Promise.reject(
        new PipeClosedError("Cannot write to a closed pipe", { cause: this.failure ?? undefined }),
      );
    }

    return withDeadline(timeoutMs, (_expired, onExpire) =>
      new Promise<void>((resolve, reject) => {
        onExpire(() => reject(new PipeTimeoutError(timeoutMs ?? 0)));
        this.stream.write(frame.toBuffer(), (err) => {
          if (err) reject(new PipeClosedError(err.message, { cause: err }));
          else resolve();
        });
      }),
    );
  }

  /** Ends the stream; the peer sees end-of-pipe once buffered frames drain. */
  close(): void {
    if (!this.stream.writableEnded && !this.stream.destroyed) this.stream.end();
  }
}

// ---------------------------------------------------------------------------
// Channel
// ---------------------------------------------------------------------------

/** One endpoint's view of a duplex pipe pair. */
export interface FramedChannel {
  readonly reader: FrameReader;
  readonly writer: FrameWriter;
}
