import { ChatStoreError, isChatStoreError } from "../backend/src/services/chatStore";
import { createInMemoryChatStore } from "../backend/src/repositories/inMemoryChatStore";

async function expectStoreError(promise: Promise<unknown>, kind: ChatStoreError["kind"]): Promise<void> {
  try {
    await promise;
  } catch (e: unknown) {
    expect(isChatStoreError(e, kind)).toBe(true);
    return;
  }
  throw new Error(`expected ChatStoreError ${kind}`);
}

describe("inMemoryChatStore", () => {
  it("Given a group chat When messages are inserted Then seq increases and listing is newest first with paging", async () => {
    const store = createInMemoryChatStore();
    await store.createChat({ chatId: "c1", chatName: "Crew", createdAtMs: 1, participants: [1, 2] });

    const a = await store.insertMessage({ messageId: "m1", chatId: "c1", senderId: 1, content: "one", sentAtMs: 10 });
    const b = await store.insertMessage({ messageId: "m2", chatId: "c1", senderId: 2, content: "two", sentAtMs: 11 });
    await store.insertMessage({ messageId: "m3", chatId: "c1", senderId: 1, content: "three", sentAtMs: 12 });

    expect(b.seq).toBeGreaterThan(a.seq);
    expect((await store.listMessages("c1", 2, 0)).map((m) => m.messageId)).toEqual(["m3", "m2"]);
    expect((await store.listMessages("c1", 2, 2)).map((m) => m.messageId)).toEqual(["m1"]);
  });

  it("Given an existing message id When it is inserted again Then ALREADY_EXISTS is thrown and the original is kept", async () => {
    const store = createInMemoryChatStore();
    await store.createChat({ chatId: "c1", chatName: null, createdAtMs: 1, participants: [1, 2] });
    await store.insertMessage({ messageId: "m1", chatId: "c1", senderId: 1, content: "first", sentAtMs: 10 });

    await expectStoreError(
      store.insertMessage({ messageId: "m1", chatId: "c1", senderId: 1, content: "second", sentAtMs: 11 }),
      "ALREADY_EXISTS"
    );
    expect((await store.getMessage("m1"))?.content).toBe("first");
  });

  it("Given a missing chat When a message is inserted Then NOT_FOUND is thrown", async () => {
    const store = createInMemoryChatStore();
    await expectStoreError(
      store.insertMessage({ messageId: "m1", chatId: "nope", senderId: 1, content: "x", sentAtMs: 1 }),
      "NOT_FOUND"
    );
  });

  it("Given a direct chat for a pair When the reversed pair is created Then ALREADY_EXISTS is thrown and lookups agree", async () => {
    const store = createInMemoryChatStore();
    const chat = await store.createDirectChat("d1", 2, 1, 5);

    expect(chat).toEqual({ chatId: "d1", chatName: null, isGroup: false, createdAtMs: 5, participants: [2, 1] });
    await expectStoreError(store.createDirectChat("d2", 1, 2, 6), "ALREADY_EXISTS");
    expect(await store.findDirectChat(1, 2)).toBe("d1");
    expect(await store.findDirectChat(2, 1)).toBe("d1");
    expect(await store.getChat("d2")).toBeNull();
  });

  it("Given several chats When listed for a user Then only the user's chats are returned newest first", async () => {
    const store = createInMemoryChatStore();
    await store.createChat({ chatId: "old", chatName: null, createdAtMs: 1, participants: [1, 2] });
    await store.createChat({ chatId: "new", chatName: null, createdAtMs: 2, participants: [1, 3] });
    await store.createChat({ chatId: "other", chatName: null, createdAtMs: 3, participants: [2, 3] });

    expect((await store.listChatsForUser(1)).map((c) => c.chatId)).toEqual(["new", "old"]);
  });

  it("Given reactions When removing by message, user and code Then every match goes and others stay", async () => {
    const store = createInMemoryChatStore();
    await store.createChat({ chatId: "c1", chatName: null, createdAtMs: 1, participants: [1, 2] });
    await store.insertMessage({ messageId: "m1", chatId: "c1", senderId: 1, content: "x", sentAtMs: 1 });
    await store.insertReaction({ reactionId: "r1", messageId: "m1", userId: 2, reactionCode: "like", reactedAtMs: 2 });
    await store.insertReaction({ reactionId: "r2", messageId: "m1", userId: 2, reactionCode: "like", reactedAtMs: 3 });
    await store.insertReaction({ reactionId: "r3", messageId: "m1", userId: 2, reactionCode: "wow", reactedAtMs: 4 });

    await expectStoreError(
      store.insertReaction({ reactionId: "r1", messageId: "m1", userId: 2, reactionCode: "wow", reactedAtMs: 5 }),
      "ALREADY_EXISTS"
    );
    await expectStoreError(
      store.insertReaction({ reactionId: "r4", messageId: "m1", userId: 2, reactionCode: "shrug", reactedAtMs: 5 }),
      "NOT_FOUND"
    );
    expect(await store.deleteReactions("m1", 2, "like")).toBe(2);
    expect(await store.deleteReactions("m1", 2, "like")).toBe(0);
    expect(await store.deleteReactions("m1", 2, "wow")).toBe(1);
  });

  it("Given a read receipt When a lower seq is upserted Then the high-water mark is kept", async () => {
    const store = createInMemoryChatStore();
    await store.createChat({ chatId: "c1", chatName: null, createdAtMs: 1, participants: [1, 2] });

    expect(await store.upsertReadReceipt(2, "c1", 5, 100)).toEqual({ userId: 2, chatId: "c1", lastReadSeq: 5, readAtMs: 100 });
    expect(await store.upsertReadReceipt(2, "c1", 3, 200)).toEqual({ userId: 2, chatId: "c1", lastReadSeq: 5, readAtMs: 100 });
    expect(await store.upsertReadReceipt(2, "c1", 8, 300)).toEqual({ userId: 2, chatId: "c1", lastReadSeq: 8, readAtMs: 300 });
  });

  it("Given a group chat When participants are added and removed Then membership reflects each change once", async () => {
    const store = createInMemoryChatStore();
    await store.createChat({ chatId: "c1", chatName: null, createdAtMs: 1, participants: [1, 2] });

    expect(await store.addParticipant("c1", 3, 2)).toBe(true);
    expect(await store.addParticipant("c1", 3, 3)).toBe(false);
    expect(await store.isParticipant(3, "c1")).toBe(true);
    expect(await store.removeParticipant("c1", 3)).toBe(true);
    expect(await store.removeParticipant("c1", 3)).toBe(false);
    expect(await store.participants("c1")).toEqual([1, 2]);
    await expectStoreError(store.addParticipant("missing", 3, 4), "NOT_FOUND");
  });
});
