import { EventEmitter } from "node:events";

import type { Logger } from "../backend/src/logging";
import { createConnectionSession } from "../backend/src/realtime/connectionSession";
import type { DispatchOutcome } from "../backend/src/realtime/eventRouter";
import type { InboundFrame } from "../backend/src/realtime/frames";
import { createPresenceRegistry } from "../backend/src/realtime/presenceRegistry";
import type { UserId } from "../backend/src/services/chatStore";

class FakeSocket extends EventEmitter {
  readyState = 1;
  bufferedAmount = 0;
  readonly sent: string[] = [];
  readonly closes: Array<{ code?: number; reason?: string }> = [];

  send(data: string, cb: (err?: Error) => void): void {
    this.sent.push(data);
    cb();
  }

  close(code?: number, reason?: string): void {
    this.closes.push({ code, reason });
    this.readyState = 3;
    this.emit("close", code ?? 1005, Buffer.from(reason ?? ""));
  }

  receive(payload: unknown): void {
    this.emit("message", Buffer.from(typeof payload === "string" ? payload : JSON.stringify(payload)), false);
  }
}

function recordingRouter(): { seen: Array<{ userId: UserId; frame: InboundFrame }>; dispatch(userId: UserId, frame: InboundFrame): Promise<DispatchOutcome> } {
  const seen: Array<{ userId: UserId; frame: InboundFrame }> = [];
  return {
    seen,
    async dispatch(userId: UserId, frame: InboundFrame): Promise<DispatchOutcome> {
      seen.push({ userId, frame });
      return "handled";
    }
  };
}

function recordingLogger(): Logger & { warnings: string[]; infos: string[] } {
  const warnings: string[] = [];
  const infos: string[] = [];
  return {
    warnings,
    infos,
    info(message: string): void {
      infos.push(message);
    },
    warn(message: string): void {
      warnings.push(message);
    },
    error(): void {}
  };
}

describe("connectionSession", () => {
  it("Given a new session When it is created Then the user is online and reading", () => {
    const presence = createPresenceRegistry();
    const session = createConnectionSession({
      socket: new FakeSocket(),
      userId: 1,
      presence,
      router: recordingRouter(),
      idGenerator: () => "s1"
    });

    expect(session.state()).toBe("reading");
    expect(presence.lookup(1)).toBe(session.connection);
  });

  it("Given inbound frames When they arrive Then they are dispatched in order with the authenticated user id", async () => {
    const socket = new FakeSocket();
    const router = recordingRouter();
    const session = createConnectionSession({ socket, userId: 1, presence: createPresenceRegistry(), router });

    socket.receive({ type: "chat_message", chat_id: "c1", message_id: "m1", content: "one", sender_id: 99 });
    socket.receive({ type: "typing", chat_id: "c1", is_typing: false });
    await session.idle();

    expect(router.seen).toEqual([
      { userId: 1, frame: { type: "chat_message", chatId: "c1", messageId: "m1", content: "one" } },
      { userId: 1, frame: { type: "typing", chatId: "c1", isTyping: false } }
    ]);
  });

  it("Given a malformed frame When it arrives Then it is logged and the session keeps reading", async () => {
    const socket = new FakeSocket();
    const router = recordingRouter();
    const logger = recordingLogger();
    const session = createConnectionSession({ socket, userId: 1, presence: createPresenceRegistry(), router, logger });

    socket.receive("{not json");
    socket.receive({ type: "wave", chat_id: "c1" });
    socket.receive({ type: "read_receipt", chat_id: "c1", message_id: "m1" });
    await session.idle();

    expect(logger.warnings).toEqual([
      "Ignored malformed frame from user 1: Frame is not valid JSON.",
      'Ignored unknown frame from user 1: Unknown frame type "wave".'
    ]);
    expect(router.seen).toHaveLength(1);
    expect(session.state()).toBe("reading");
  });

  it("Given an oversized frame When it arrives Then it is dropped", async () => {
    const socket = new FakeSocket();
    const router = recordingRouter();
    const logger = recordingLogger();
    const session = createConnectionSession({
      socket,
      userId: 1,
      presence: createPresenceRegistry(),
      router,
      logger,
      maxIncomingPayloadBytes: 16
    });

    socket.receive("x".repeat(17));
    await session.idle();

    expect(router.seen).toEqual([]);
    expect(logger.warnings).toEqual(["Ignored 17-byte frame from user 1; limit is 16."]);
  });

  it("Given an outbound frame When sent on the connection Then the wire form is written to the socket", async () => {
    const socket = new FakeSocket();
    const session = createConnectionSession({ socket, userId: 1, presence: createPresenceRegistry(), router: recordingRouter() });

    await session.connection.send({ type: "typing", chatId: "c1", userId: 2, isTyping: true, atMs: 0 });

    expect(socket.sent.map((s) => JSON.parse(s))).toEqual([
      { type: "typing", chat_id: "c1", user_id: 2, is_typing: true, timestamp: "1970-01-01T00:00:00.000Z" }
    ]);
  });

  it("Given a socket with too much buffered When sending Then the send rejects without writing", async () => {
    const socket = new FakeSocket();
    socket.bufferedAmount = 2_048;
    const session = createConnectionSession({
      socket,
      userId: 1,
      presence: createPresenceRegistry(),
      router: recordingRouter(),
      maxBufferedBytes: 1_024,
      idGenerator: () => "s1"
    });

    await expect(
      session.connection.send({ type: "participant_left", chatId: "c1", userId: 3, leftAtMs: 0 })
    ).rejects.toThrow("connection s1 has 2048 bytes pending");
    expect(socket.sent).toEqual([]);
  });

  it("Given a closed socket When the session ends Then presence is cleared and close listeners run once", () => {
    const socket = new FakeSocket();
    const presence = createPresenceRegistry();
    const session = createConnectionSession({ socket, userId: 1, presence, router: recordingRouter() });
    let closedCalls = 0;
    session.onClosed(() => {
      closedCalls += 1;
    });

    session.close(1000, "bye");

    expect(session.state()).toBe("closed");
    expect(presence.lookup(1)).toBeUndefined();
    expect(closedCalls).toBe(1);
    expect(socket.closes).toEqual([{ code: 1000, reason: "bye" }]);
  });

  it("Given a reconnect When the superseded socket closes Then the newer session stays online", () => {
    const presence = createPresenceRegistry();
    const logger = recordingLogger();
    const firstSocket = new FakeSocket();
    createConnectionSession({ socket: firstSocket, userId: 1, presence, router: recordingRouter(), idGenerator: () => "old" });
    const second = createConnectionSession({
      socket: new FakeSocket(),
      userId: 1,
      presence,
      router: recordingRouter(),
      logger,
      idGenerator: () => "new"
    });

    firstSocket.close(1000, "gone");

    expect(presence.lookup(1)).toBe(second.connection);
    expect(logger.infos).toEqual(["User 1 reconnected; session new replaces old."]);
  });

  it("Given a transport error When the socket reports it Then the session closes with 1011", () => {
    const socket = new FakeSocket();
    const presence = createPresenceRegistry();
    const session = createConnectionSession({ socket, userId: 1, presence, router: recordingRouter() });

    socket.emit("error", new Error("ECONNRESET"));

    expect(session.state()).toBe("closed");
    expect(socket.closes).toEqual([{ code: 1011, reason: "Transport error" }]);
    expect(presence.lookup(1)).toBeUndefined();
  });
});
