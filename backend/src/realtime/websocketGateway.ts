import type { IncomingMessage } from "node:http";
import type { WebSocket, WebSocketServer } from "ws";

import { silentLogger, type Logger } from "../logging";
import { bearerToken, verifyAccessToken } from "../services/accessToken";
import type { UserId } from "../services/chatStore";
import { createConnectionSession, type ConnectionSession } from "./connectionSession";
import type { EventRouter } from "./eventRouter";
import type { PresenceRegistry } from "./presenceRegistry";

export type WebsocketGatewayDeps = Readonly<{
  wss: WebSocketServer;
  jwtSecret: string;
  presence: PresenceRegistry;
  router: Pick<EventRouter, "dispatch">;
  logger?: Logger;

  maxIncomingPayloadBytes?: number;
  heartbeatIntervalMs?: number;
  sendTimeoutMs?: number;
  maxBufferedBytes?: number;
}>;

export type WebsocketGateway = Readonly<{
  close(): Promise<void>;
  connectionCount(): number;
}>;

const DEFAULT_MAX_INCOMING_PAYLOAD_BYTES = 16 * 1024;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;

function closePolicy(ws: WebSocket): void {
  try {
    ws.close(1008, "Policy violation");
  } catch {
    // Ignore; ws may already be closed.
  }
}

export function tokenFromUpgradeRequest(req: IncomingMessage): string | null {
  const fromHeader = bearerToken(req.headers.authorization);
  if (fromHeader) return fromHeader;
  const url = new URL(req.url ?? "/", "http://localhost");
  const fromQuery = url.searchParams.get("token");
  return fromQuery && fromQuery.trim() !== "" ? fromQuery.trim() : null;
}

export function createWebsocketGateway(deps: WebsocketGatewayDeps): WebsocketGateway {
  const maxIncomingPayloadBytes = deps.maxIncomingPayloadBytes ?? DEFAULT_MAX_INCOMING_PAYLOAD_BYTES;
  const heartbeatIntervalMs = deps.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  const logger = deps.logger ?? silentLogger;

  if (!Number.isFinite(maxIncomingPayloadBytes) || maxIncomingPayloadBytes <= 0) {
    throw new Error("websocketGateway requires a positive maxIncomingPayloadBytes.");
  }
  if (!Number.isFinite(heartbeatIntervalMs) || heartbeatIntervalMs <= 0) {
    throw new Error("websocketGateway requires a positive heartbeatIntervalMs.");
  }
  if (typeof deps.jwtSecret !== "string" || deps.jwtSecret.trim() === "") {
    throw new Error("websocketGateway requires a non-empty jwtSecret.");
  }

  const sessions = new Map<WebSocket, ConnectionSession>();
  const alive = new Map<WebSocket, boolean>();

  function authenticate(req: IncomingMessage): UserId | null {
    const token = tokenFromUpgradeRequest(req);
    return token ? verifyAccessToken(deps.jwtSecret, token) : null;
  }

  deps.wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const userId = authenticate(req);
    if (userId === null) {
      logger.warn(`Rejected websocket connection from ${req.socket.remoteAddress ?? "unknown"}: invalid credentials.`);
      closePolicy(ws);
      return;
    }

    const session = createConnectionSession({
      socket: ws,
      userId,
      presence: deps.presence,
      router: deps.router,
      logger,
      maxIncomingPayloadBytes,
      sendTimeoutMs: deps.sendTimeoutMs,
      maxBufferedBytes: deps.maxBufferedBytes
    });
    sessions.set(ws, session);
    alive.set(ws, true);
    ws.on("pong", () => alive.set(ws, true));
    session.onClosed(() => {
      sessions.delete(ws);
      alive.delete(ws);
    });
    logger.info(`User ${userId} connected (session ${session.id}).`);
  });

  const heartbeatTimer = setInterval(() => {
    for (const [ws, session] of sessions) {
      if (alive.get(ws) !== true) {
        logger.warn(`Session ${session.id} missed a heartbeat; terminating.`);
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      ws.ping();
    }
  }, heartbeatIntervalMs);

  return {
    async close(): Promise<void> {
      clearInterval(heartbeatTimer);
      for (const session of Array.from(sessions.values())) {
        session.close(1001, "Server shutting down");
      }
      await new Promise<void>((resolve) => deps.wss.close(() => resolve()));
    },

    connectionCount(): number {
      return sessions.size;
    }
  };
}
