import {
  ChatStoreError,
  directKey,
  type Chat,
  type ChatStore,
  type NewChat,
  type NewMessage,
  type ReactionCatalogEntry,
  type ReadReceipt,
  type StoredMessage,
  type StoredReaction,
  type UserId
} from "../services/chatStore";
import { DEFAULT_REACTION_CATALOG } from "../services/reactionCatalog";

type ChatRecord = {
  chatId: string;
  chatName: string | null;
  isGroup: boolean;
  createdAtMs: number;
  order: number;
  participants: Set<UserId>;
};

type InMemoryChatStoreOptions = Readonly<{
  reactionCatalog?: ReadonlyArray<ReactionCatalogEntry>;
}>;

// Every mutation checks and writes before its first await, so concurrent callers on
// the event loop observe the same atomicity the Postgres constraints give.
export function createInMemoryChatStore(options: InMemoryChatStoreOptions = {}): ChatStore {
  const catalog = options.reactionCatalog ?? DEFAULT_REACTION_CATALOG;
  const chats = new Map<string, ChatRecord>();
  const directChats = new Map<string, string>();
  const messages = new Map<string, StoredMessage>();
  const messagesByChat = new Map<string, StoredMessage[]>();
  const reactions = new Map<string, StoredReaction>();
  const typing = new Map<string, number>();
  const readReceipts = new Map<string, ReadReceipt>();
  let nextSeq = 1;
  let nextOrder = 1;

  function toChat(record: ChatRecord): Chat {
    return {
      chatId: record.chatId,
      chatName: record.chatName,
      isGroup: record.isGroup,
      createdAtMs: record.createdAtMs,
      participants: Array.from(record.participants)
    };
  }

  function requireChat(chatId: string): ChatRecord {
    const record = chats.get(chatId);
    if (!record) throw new ChatStoreError("NOT_FOUND", `Chat ${chatId} does not exist.`);
    return record;
  }

  function claimChatId(chatId: string): void {
    if (chats.has(chatId)) throw new ChatStoreError("ALREADY_EXISTS", `Chat ${chatId} already exists.`);
  }

  return {
    async isParticipant(userId: UserId, chatId: string): Promise<boolean> {
      return chats.get(chatId)?.participants.has(userId) ?? false;
    },

    async participants(chatId: string): Promise<ReadonlyArray<UserId>> {
      const record = chats.get(chatId);
      return record ? Array.from(record.participants) : [];
    },

    async getChat(chatId: string): Promise<Chat | null> {
      const record = chats.get(chatId);
      return record ? toChat(record) : null;
    },

    async listChatsForUser(userId: UserId): Promise<ReadonlyArray<Chat>> {
      return Array.from(chats.values())
        .filter((record) => record.participants.has(userId))
        .sort((a, b) => b.createdAtMs - a.createdAtMs || b.order - a.order)
        .map(toChat);
    },

    async createChat(chat: NewChat): Promise<Chat> {
      claimChatId(chat.chatId);
      const record: ChatRecord = {
        chatId: chat.chatId,
        chatName: chat.chatName,
        isGroup: true,
        createdAtMs: chat.createdAtMs,
        order: nextOrder++,
        participants: new Set(chat.participants)
      };
      chats.set(record.chatId, record);
      return toChat(record);
    },

    async findDirectChat(a: UserId, b: UserId): Promise<string | null> {
      return directChats.get(directKey(a, b)) ?? null;
    },

    async createDirectChat(chatId: string, a: UserId, b: UserId, createdAtMs: number): Promise<Chat> {
      const key = directKey(a, b);
      if (directChats.has(key)) {
        throw new ChatStoreError("ALREADY_EXISTS", `A direct chat for ${key} already exists.`);
      }
      claimChatId(chatId);
      const record: ChatRecord = {
        chatId,
        chatName: null,
        isGroup: false,
        createdAtMs,
        order: nextOrder++,
        participants: new Set([a, b])
      };
      chats.set(chatId, record);
      directChats.set(key, chatId);
      return toChat(record);
    },

    async insertMessage(message: NewMessage): Promise<StoredMessage> {
      if (messages.has(message.messageId)) {
        throw new ChatStoreError("ALREADY_EXISTS", `Message ${message.messageId} already exists.`);
      }
      requireChat(message.chatId);
      const stored: StoredMessage = { ...message, seq: nextSeq++ };
      messages.set(stored.messageId, stored);
      const list = messagesByChat.get(stored.chatId) ?? [];
      list.push(stored);
      messagesByChat.set(stored.chatId, list);
      return stored;
    },

    async getMessage(messageId: string): Promise<StoredMessage | null> {
      return messages.get(messageId) ?? null;
    },

    async listMessages(chatId: string, limit: number, offset: number): Promise<ReadonlyArray<StoredMessage>> {
      const list = messagesByChat.get(chatId) ?? [];
      return list
        .slice()
        .reverse()
        .slice(offset, offset + limit);
    },

    async listReactionCatalog(): Promise<ReadonlyArray<ReactionCatalogEntry>> {
      return catalog;
    },

    async insertReaction(reaction: StoredReaction): Promise<void> {
      if (reactions.has(reaction.reactionId)) {
        throw new ChatStoreError("ALREADY_EXISTS", `Reaction ${reaction.reactionId} already exists.`);
      }
      if (!messages.has(reaction.messageId)) {
        throw new ChatStoreError("NOT_FOUND", `Message ${reaction.messageId} does not exist.`);
      }
      if (!catalog.some((entry) => entry.reactionCode === reaction.reactionCode)) {
        throw new ChatStoreError("NOT_FOUND", `Reaction code ${reaction.reactionCode} is not in the catalog.`);
      }
      reactions.set(reaction.reactionId, reaction);
    },

    async deleteReactions(messageId: string, userId: UserId, reactionCode: string): Promise<number> {
      let removed = 0;
      for (const [reactionId, reaction] of reactions) {
        if (reaction.messageId === messageId && reaction.userId === userId && reaction.reactionCode === reactionCode) {
          reactions.delete(reactionId);
          removed += 1;
        }
      }
      return removed;
    },

    async addParticipant(chatId: string, userId: UserId, _joinedAtMs: number): Promise<boolean> {
      const record = requireChat(chatId);
      if (record.participants.has(userId)) return false;
      record.participants.add(userId);
      return true;
    },

    async removeParticipant(chatId: string, userId: UserId): Promise<boolean> {
      const record = requireChat(chatId);
      return record.participants.delete(userId);
    },

    async storeTyping(userId: UserId, chatId: string, atMs: number): Promise<void> {
      typing.set(`${userId}:${chatId}`, atMs);
    },

    async upsertReadReceipt(userId: UserId, chatId: string, seq: number, atMs: number): Promise<ReadReceipt> {
      const key = `${userId}:${chatId}`;
      const existing = readReceipts.get(key);
      if (existing && existing.lastReadSeq >= seq) return existing;
      const receipt: ReadReceipt = { userId, chatId, lastReadSeq: seq, readAtMs: atMs };
      readReceipts.set(key, receipt);
      return receipt;
    }
  };
}
