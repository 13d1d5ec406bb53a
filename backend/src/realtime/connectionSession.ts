import { randomUUID } from "node:crypto";
import type { RawData } from "ws";

import { describeError, silentLogger, type Logger } from "../logging";
import type { UserId } from "../services/chatStore";
import type { EventRouter } from "./eventRouter";
import { decodeInboundFrame, encodeOutboundFrame, type OutboundFrame } from "./frames";
import type { PresenceConnection, PresenceRegistry } from "./presenceRegistry";

export type SessionState = "connected" | "reading" | "closed";

const SOCKET_OPEN = 1;

/** The slice of a `ws` WebSocket a session drives. */
export type SessionSocket = {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
};

export type ConnectionSessionDeps = Readonly<{
  socket: SessionSocket;
  userId: UserId;
  presence: Pick<PresenceRegistry, "register" | "unregister">;
  router: Pick<EventRouter, "dispatch">;
  logger?: Logger;
  maxIncomingPayloadBytes?: number;
  sendTimeoutMs?: number;
  maxBufferedBytes?: number;
  idGenerator?: () => string;
}>;

export type ConnectionSession = Readonly<{
  id: string;
  userId: UserId;
  connection: PresenceConnection;
  state(): SessionState;
  /** Resolves once every frame received so far has been processed. */
  idle(): Promise<void>;
  close(code?: number, reason?: string): void;
  onClosed(listener: () => void): void;
}>;

const DEFAULT_MAX_INCOMING_PAYLOAD_BYTES = 16 * 1024;
const DEFAULT_SEND_TIMEOUT_MS = 5_000;
const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export function createConnectionSession(deps: ConnectionSessionDeps): ConnectionSession {
  const logger = deps.logger ?? silentLogger;
  const maxIncomingPayloadBytes = deps.maxIncomingPayloadBytes ?? DEFAULT_MAX_INCOMING_PAYLOAD_BYTES;
  const sendTimeoutMs = deps.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  const maxBufferedBytes = deps.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
  if (!Number.isFinite(maxIncomingPayloadBytes) || maxIncomingPayloadBytes <= 0) {
    throw new Error("connectionSession requires a positive maxIncomingPayloadBytes.");
  }
  if (!Number.isFinite(sendTimeoutMs) || sendTimeoutMs <= 0) {
    throw new Error("connectionSession requires a positive sendTimeoutMs.");
  }
  if (!Number.isFinite(maxBufferedBytes) || maxBufferedBytes <= 0) {
    throw new Error("connectionSession requires a positive maxBufferedBytes.");
  }

  const { socket, userId } = deps;
  const id = (deps.idGenerator ?? (() => randomUUID()))();
  const closedListeners: Array<() => void> = [];
  let state: SessionState = "connected";
  let chain: Promise<void> = Promise.resolve();

  const connection: PresenceConnection = {
    id,
    userId,
    send(frame: OutboundFrame): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (state === "closed" || socket.readyState !== SOCKET_OPEN) {
          reject(new Error(`connection ${id} is not open`));
          return;
        }
        if (socket.bufferedAmount > maxBufferedBytes) {
          reject(new Error(`connection ${id} has ${socket.bufferedAmount} bytes pending`));
          return;
        }
        const timer = setTimeout(() => reject(new Error(`send timed out after ${sendTimeoutMs}ms`)), sendTimeoutMs);
        timer.unref();
        socket.send(encodeOutboundFrame(frame), (error?: Error) => {
          clearTimeout(timer);
          if (error) reject(error);
          else resolve();
        });
      });
    },
    close(): void {
      closeSession(1000, "Closed");
    }
  };

  function finish(): void {
    if (state === "closed") return;
    state = "closed";
    deps.presence.unregister(userId, connection);
    logger.info(`Session ${id} for user ${userId} closed.`);
    for (const listener of closedListeners.splice(0)) listener();
  }

  function closeSession(code: number, reason: string): void {
    finish();
    socket.close(code, reason);
  }

  async function handleFrame(data: RawData): Promise<void> {
    if (state === "closed") return;
    const buffer = toBuffer(data);
    if (buffer.byteLength > maxIncomingPayloadBytes) {
      logger.warn(`Ignored ${buffer.byteLength}-byte frame from user ${userId}; limit is ${maxIncomingPayloadBytes}.`);
      return;
    }
    const decoded = decodeInboundFrame(buffer.toString("utf8"));
    if (!decoded.ok) {
      logger.warn(`Ignored ${decoded.error === "MALFORMED" ? "malformed" : "unknown"} frame from user ${userId}: ${decoded.detail}`);
      return;
    }
    await deps.router.dispatch(userId, decoded.frame);
  }

  socket.on("message", (data: RawData) => {
    chain = chain
      .then(() => handleFrame(data))
      .catch((e: unknown) => {
        logger.error(`Frame from user ${userId} failed: ${describeError(e)}`);
      });
  });
  socket.on("close", () => finish());
  socket.on("error", (error: Error) => {
    logger.warn(`Socket error for user ${userId}: ${error.message}`);
    closeSession(1011, "Transport error");
  });

  const previous = deps.presence.register(userId, connection);
  if (previous) {
    logger.info(`User ${userId} reconnected; session ${id} replaces ${previous.id}.`);
  }
  state = "reading";

  return {
    id,
    userId,
    connection,
    state(): SessionState {
      return state;
    },
    idle(): Promise<void> {
      return chain;
    },
    close(code = 1000, reason = "Closed"): void {
      closeSession(code, reason);
    },
    onClosed(listener: () => void): void {
      if (state === "closed") {
        listener();
        return;
      }
      closedListeners.push(listener);
    }
  };
}
