/**
 * Error taxonomy shared by every process in the tree.
 *
 * ErrorKind is the only error information that crosses a pipe. Inside a
 * process, failures are thrown as UnlockdError (or one of the transport
 * errors below) and converted to a kind at the point where a response is
 * written.
 */
import { z } from "zod";

export const ERROR_KINDS = [
  "SerializationFailed",
  "SteamConnectionFailed",
  "AppListRetrievalFailed",
  "SocketCommunicationFailed",
  "AppMismatchError",
  "UnknownError",
] as const;

export const ErrorKindSchema = z.enum(ERROR_KINDS);

export type ErrorKind = z.infer<typeof ErrorKindSchema>;

const DESCRIPTIONS: Record<ErrorKind, string> = {
  SerializationFailed:       "Serialization failed",
  SteamConnectionFailed:     "Steam connection failed",
  AppListRetrievalFailed:    "App list retrieval failed",
  SocketCommunicationFailed: "Socket communication failed",
  AppMismatchError:          "App mismatch",
  UnknownError:              "Unknown error",
};

export function describeErrorKind(kind: ErrorKind): string {
  return DESCRIPTIONS[kind];
}

export class UnlockdError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string = describeErrorKind(kind),
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "UnlockdError";
  }
}

// ---------------------------------------------------------------------------
// Transport errors, all surfaced as SocketCommunicationFailed
// ---------------------------------------------------------------------------

/** The pipe ended, errored, or was destroyed before a whole frame arrived. */
export class PipeClosedError extends UnlockdError {
  constructor(message = "Pipe closed", options?: { cause?: unknown }) {
    super("SocketCommunicationFailed", message, options);
    this.name = "PipeClosedError";
  }
}

/** A read or write did not complete before its deadline. */
export class PipeTimeoutError extends UnlockdError {
  constructor(readonly timeoutMs: number) {
    super("SocketCommunicationFailed", `Pipe operation timed out after ${timeoutMs} ms`);
    this.name = "PipeTimeoutError";
  }
}

/** A frame header announced more bytes than the reader accepts. */
export class FrameTooLargeError extends UnlockdError {
  constructor(readonly length: bigint, readonly limit: number) {
    super("SocketCommunicationFailed", `Frame of ${length} bytes exceeds limit of ${limit}`);
    this.name = "FrameTooLargeError";
  }
}

/** Maps any thrown value to the ErrorKind that should cross the pipe. */
export function toErrorKind(err: unknown): ErrorKind {
  return err instanceof UnlockdError ? err.kind : "UnknownError";
}
