/**
 * ============================================================
 *  Wire Protocol — commands and responses
 * ============================================================
 *
 * Every pipe in the process tree carries the same two message
 * kinds, each as one frame (see framing.ts):
 *
 *   Command      — tagged by `type`, sent towards the native client
 *   Response<T>  — { type: "Success", data } | { type: "Error", error }
 *
 * Responses are encoded the same way whatever T is, which lets the
 * supervisor relay a worker's reply without decoding it.
 * ============================================================
 */
import { z } from "zod";
import { logger } from "../../logger.js";
import { ErrorKindSchema, UnlockdError, type ErrorKind } from "./errors.js";
import { RawFrame } from "./framing.js";
import { AppIdSchema, Float32Schema, Int32Schema } from "./records.js";

const log = logger.child({ module: "ipc" });

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

const noArgs = <T extends string>(type: T) => z.object({ type: z.literal(type) });

const forApp = <T extends string>(type: T) =>
  z.object({ type: z.literal(type), appId: AppIdSchema });

export const CommandSchema = z.discriminatedUnion("type", [
  noArgs("GetOwnedAppList"),
  forApp("LaunchApp"),
  forApp("StopApp"),
  noArgs("StopApps"),
  noArgs("Shutdown"),
  noArgs("Status"),
  forApp("GetAchievements"),
  forApp("GetStats"),
  forApp("SetAchievement").extend({
    unlocked:      z.boolean(),
    achievementId: z.string(),
  }),
  forApp("SetIntStat").extend({
    statId: z.string(),
    value:  Int32Schema,
  }),
  forApp("SetFloatStat").extend({
    statId: z.string(),
    value:  Float32Schema,
  }),
  forApp("ResetStats").extend({
    achievementsToo: z.boolean(),
  }),
]);

export type Command = Readonly<z.infer<typeof CommandSchema>>;

export type CommandType = Command["type"];

/** Commands that address one managed app and are served by its worker. */
export type AppCommand = Extract<Command, { appId: number }>;

export function isAppCommand(command: Command): command is AppCommand {
  return "appId" in command;
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export type Response<T> =
  | { readonly type: "Success"; readonly data: T }
  | { readonly type: "Error"; readonly error: ErrorKind };

export function success<T>(data: T): Response<T> {
  return { type: "Success", data };
}

export function failure(error: ErrorKind): Response<never> {
  return { type: "Error", error };
}

const EnvelopeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Success"), data: z.unknown() }),
  z.object({ type: z.literal("Error"), error: ErrorKindSchema }),
]);

/** Unwraps a response into its data, throwing its error kind. */
export function unwrap<T>(response: Response<T>): T {
  if (response.type === "Error") throw new UnlockdError(response.error);
  return response.data;
}

// ---------------------------------------------------------------------------
// Text encoding
// ---------------------------------------------------------------------------

/** JSON cannot carry NaN, ±Infinity or bigint; refuse them instead of writing null. */
function strictReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new TypeError(`Cannot encode non-finite number ${value}`);
  }
  return value;
}

function encodeValue(value: unknown): RawFrame | null {
  try {
    return new RawFrame(Buffer.from(JSON.stringify(value, strictReplacer), "utf8"));
  } catch (err) {
    log.error({ err }, "Serialization error");
    return null;
  }
}

function parsePayload(frame: RawFrame): unknown {
  try {
    return JSON.parse(frame.payload.toString("utf8"));
  } catch (err) {
    throw new UnlockdError("SerializationFailed", "Frame payload is not valid JSON", { cause: err });
  }
}

/** Null when the command holds a value JSON cannot represent. */
export function encodeCommand(command: Command): RawFrame | null {
  return encodeValue(command);
}

export function decodeCommand(frame: RawFrame): Command {
  const parsed = CommandSchema.safeParse(parsePayload(frame));
  if (!parsed.success) {
    throw new UnlockdError("SerializationFailed", `Malformed command: ${parsed.error.message}`);
  }
  return parsed.data;
}

const SERIALIZATION_FAILED_FRAME = new RawFrame(
  Buffer.from(JSON.stringify(failure("SerializationFailed")), "utf8"),
);

/**
 * Encodes a response. When the payload cannot be encoded, the
 * SerializationFailed error response is returned in its place, so a
 * reply is always written.
 */
export function encodeResponse<T>(response: Response<T>): RawFrame {
  return encodeValue(response) ?? SERIALIZATION_FAILED_FRAME;
}

export function decodeResponse<T>(
  frame: RawFrame,
  dataSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Response<T> {
  const envelope = EnvelopeSchema.safeParse(parsePayload(frame));
  if (!envelope.success) {
    throw new UnlockdError("SerializationFailed", `Malformed response: ${envelope.error.message}`);
  }
  if (envelope.data.type === "Error") return failure(envelope.data.error);

  const data = dataSchema.safeParse(envelope.data.data);
  if (!data.success) {
    throw new UnlockdError("SerializationFailed", `Unexpected response data: ${data.error.message}`);
  }
  return success(data.data);
}
