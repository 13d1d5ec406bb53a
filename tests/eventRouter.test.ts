import type { Logger } from "../backend/src/logging";
import type { BroadcastReport, Broadcaster } from "../backend/src/realtime/broadcastEngine";
import { createEventRouter } from "../backend/src/realtime/eventRouter";
import type { OutboundFrame } from "../backend/src/realtime/frames";
import { createInMemoryChatStore } from "../backend/src/repositories/inMemoryChatStore";
import { createChatService } from "../backend/src/services/chatService";

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

async function setup(): Promise<{ router: ReturnType<typeof createEventRouter>; frames: OutboundFrame[]; logger: ReturnType<typeof recordingLogger> }> {
  const store = createInMemoryChatStore();
  await store.createChat({ chatId: "c1", chatName: null, createdAtMs: 0, participants: [1, 2] });
  const frames: OutboundFrame[] = [];
  const broadcaster: Broadcaster = {
    async broadcast(_chatId: string, frame: OutboundFrame): Promise<BroadcastReport> {
      frames.push(frame);
      return { delivered: [], failed: [], offline: [], notified: 0 };
    }
  };
  const logger = recordingLogger();
  const chatService = createChatService({ store, broadcaster, nowMs: () => 10 });
  return { router: createEventRouter({ chatService, logger }), frames, logger };
}

describe("eventRouter", () => {
  it("Given a member's message When dispatched Then it is handled and broadcast", async () => {
    const { router, frames } = await setup();

    const outcome = await router.dispatch(1, { type: "chat_message", chatId: "c1", messageId: "m1", content: "hi" });

    expect(outcome).toBe("handled");
    expect(frames).toEqual([
      { type: "chat_message", chatId: "c1", messageId: "m1", senderId: 1, content: "hi", sentAtMs: 10 }
    ]);
  });

  it("Given a repeated message When dispatched again Then it is reported as a duplicate", async () => {
    const { router, frames, logger } = await setup();
    await router.dispatch(1, { type: "chat_message", chatId: "c1", messageId: "m1", content: "hi" });

    const outcome = await router.dispatch(1, { type: "chat_message", chatId: "c1", messageId: "m1", content: "hi" });

    expect(outcome).toBe("duplicate");
    expect(frames).toHaveLength(1);
    expect(logger.infos).toEqual(["Ignored duplicate chat_message from user 1 in chat c1."]);
  });

  it("Given a non-member When any frame is dispatched Then it is unauthorized and nothing is broadcast", async () => {
    const { router, frames, logger } = await setup();

    const outcome = await router.dispatch(7, { type: "typing", chatId: "c1", isTyping: true });

    expect(outcome).toBe("unauthorized");
    expect(frames).toEqual([]);
    expect(logger.warnings).toEqual(["Dropped typing from user 7: not a participant of chat c1."]);
  });

  it("Given a non-member's reaction When dispatched Then it is unauthorized and the reaction is not stored", async () => {
    const { router, frames } = await setup();
    await router.dispatch(1, { type: "chat_message", chatId: "c1", messageId: "m1", content: "hi" });

    const outcome = await router.dispatch(5, {
      type: "reaction",
      chatId: "c1",
      reactionId: "r1",
      messageId: "m1",
      reactionCode: "like"
    });

    expect(outcome).toBe("unauthorized");
    expect(frames.map((f) => f.type)).toEqual(["chat_message"]);
  });

  it("Given a reaction frame When dispatched Then the reaction is broadcast", async () => {
    const { router, frames } = await setup();
    await router.dispatch(1, { type: "chat_message", chatId: "c1", messageId: "m1", content: "hi" });

    const outcome = await router.dispatch(2, {
      type: "reaction",
      chatId: "c1",
      reactionId: "r1",
      messageId: "m1",
      reactionCode: "clap"
    });

    expect(outcome).toBe("handled");
    expect(frames[1]).toEqual({
      type: "reaction",
      chatId: "c1",
      reactionId: "r1",
      messageId: "m1",
      userId: 2,
      reactionCode: "clap",
      reactedAtMs: 10
    });
  });

  it("Given a remove_reaction frame When dispatched Then reaction_removed is broadcast", async () => {
    const { router, frames } = await setup();
    await router.dispatch(1, { type: "chat_message", chatId: "c1", messageId: "m1", content: "hi" });
    await router.dispatch(2, { type: "reaction", chatId: "c1", reactionId: "r1", messageId: "m1", reactionCode: "wow" });

    const outcome = await router.dispatch(2, { type: "remove_reaction", chatId: "c1", messageId: "m1", reactionCode: "wow" });

    expect(outcome).toBe("handled");
    expect(frames[2]).toEqual({
      type: "reaction_removed",
      chatId: "c1",
      messageId: "m1",
      userId: 2,
      reactionCode: "wow",
      removedAtMs: 10
    });
  });

  it("Given a read receipt for an unknown message When dispatched Then it is rejected", async () => {
    const { router, frames, logger } = await setup();

    const outcome = await router.dispatch(2, { type: "read_receipt", chatId: "c1", messageId: "missing" });

    expect(outcome).toBe("rejected");
    expect(frames).toEqual([]);
    expect(logger.warnings).toEqual(["Dropped read_receipt from user 2 in chat c1: MESSAGE_NOT_FOUND: Message not found."]);
  });

  it("Given a read receipt for a known message When dispatched Then the receipt is broadcast", async () => {
    const { router, frames } = await setup();
    await router.dispatch(1, { type: "chat_message", chatId: "c1", messageId: "m1", content: "hi" });

    const outcome = await router.dispatch(2, { type: "read_receipt", chatId: "c1", messageId: "m1" });

    expect(outcome).toBe("handled");
    expect(frames[1]).toEqual({ type: "read_receipt", chatId: "c1", userId: 2, messageId: "m1", readAtMs: 10 });
  });
});
