import type { FastifyReply } from "fastify";
import { z } from "zod";
import {
  AppIdSchema,
  describeErrorKind,
  type ErrorKind,
  type Response,
} from "../modules/ipc/index.js";

// ---------------------------------------------------------------------------
// ErrorKind → HTTP status
// ---------------------------------------------------------------------------

export const HTTP_STATUS: Record<ErrorKind, number> = {
  SerializationFailed:       500,
  SteamConnectionFailed:     503,
  AppListRetrievalFailed:    503,
  SocketCommunicationFailed: 502,
  AppMismatchError:          404,
  UnknownError:              500,
};

export interface ErrorBody {
  error: ErrorKind;
  message: string;
}

/**
 * Sends the data of a Success response as JSON, or the mapped status with
 * `{ error, message }` for an Error response.
 */
export function sendResponse<T>(reply: FastifyReply, response: Response<T>): FastifyReply | T {
  if (response.type === "Error") {
    const body: ErrorBody = { error: response.error, message: describeErrorKind(response.error) };
    return reply.status(HTTP_STATUS[response.error]).send(body);
  }
  return response.data;
}

// ---------------------------------------------------------------------------
// Route params
// ---------------------------------------------------------------------------

// decimal digits only: no sign, whitespace, hex or exponent
export const AppIdParams = z.object({
  appId: z.string().regex(/^\d+$/).transform(Number).pipe(AppIdSchema),
});

/** `:appId` as a u32, or null when it is not one. */
export function parseAppId(params: unknown): number | null {
  const parsed = AppIdParams.safeParse(params);
  return parsed.success ? parsed.data.appId : null;
}

export const INVALID_APP_ID = { error: "Invalid app id" } as const;
