import type { FastifyInstance } from "fastify";
import type { WebSocket } from "@fastify/websocket";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type WsEvent =
  | { type: "connected"; timestamp: number }
  | { type: "pong"; timestamp: number }
  // appId null: every running app
  | { type: "app_status"; appId: number | null; status: "running" | "stopped"; timestamp: number };

const ClientMessage = z.object({ type: z.literal("ping") });

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Connected clients registry
// Route modules broadcast app status changes through here without
// holding references to individual sockets.
// ---------------------------------------------------------------------------
const clients = new Set<WebSocket>();

export function broadcast(event: WsEvent): void {
  const message = JSON.stringify(event);
  for (const ws of clients) {
    if (ws.readyState === 1 /* OPEN */) {
      ws.send(message);
    }
  }
}

export function appStatus(appId: number | null, status: "running" | "stopped"): WsEvent {
  return { type: "app_status", appId, status, timestamp: Date.now() };
}

// ---------------------------------------------------------------------------
// Route
// ---------------------------------------------------------------------------
export async function registerWsRoutes(app: FastifyInstance) {
  app.get("/ws", { websocket: true }, (socket) => {
    clients.add(socket);

    socket.send(JSON.stringify({ type: "connected", timestamp: Date.now() } satisfies WsEvent));

    socket.on("message", (raw) => {
      // Clients can send ping to keep the connection alive
      if (ClientMessage.safeParse(parseJson(raw.toString())).success) {
        socket.send(JSON.stringify({ type: "pong", timestamp: Date.now() } satisfies WsEvent));
      }
    });

    socket.on("close", () => {
      clients.delete(socket);
    });

    socket.on("error", () => {
      clients.delete(socket);
    });
  });
}
