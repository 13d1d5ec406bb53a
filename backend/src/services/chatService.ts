import { randomUUID } from "node:crypto";

import { describeError, silentLogger, type Logger } from "../logging";
import type { Broadcaster } from "../realtime/broadcastEngine";
import {
  isChatStoreError,
  type Chat,
  type ChatStore,
  type ReactionCatalogEntry,
  type ReadReceipt,
  type StoredMessage,
  type StoredReaction,
  type UserId
} from "./chatStore";
import { createDirectChatResolver, SelfDirectChatError, type DirectChatResolver } from "./directChatResolver";
import type { ProfileDirectory } from "./profileDirectory";

export type ErrorCode =
  | "INVALID_INPUT"
  | "CHAT_NOT_FOUND"
  | "MESSAGE_NOT_FOUND"
  | "INVALID_REACTION_CODE"
  | "SELF_CHAT_FORBIDDEN"
  | "CHAT_ALREADY_EXISTS"
  | "DIRECT_CHAT_IMMUTABLE"
  | "UNAUTHORIZED_ACTION"
  | "STORE_UNAVAILABLE";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type CreateChatInput = Readonly<{
  chatId?: unknown;
  chatName?: unknown;
  participants?: unknown;
}>;

export type SendMessageInput = Readonly<{
  messageId: unknown;
  content: unknown;
}>;

export type AddReactionInput = Readonly<{
  reactionId: unknown;
  reactionCode: unknown;
}>;

export type PageInput = Readonly<{
  limit?: unknown;
  offset?: unknown;
}>;

export type SendMessageOutcome =
  | Readonly<{ created: true; message: StoredMessage }>
  | Readonly<{ created: false; messageId: string }>;

export type AddReactionOutcome =
  | Readonly<{ created: true; reaction: StoredReaction }>
  | Readonly<{ created: false; reactionId: string }>;

export type RemoveReactionOutcome = Readonly<{ chatId: string; removed: number }>;

export type ChatServiceDeps = Readonly<{
  store: ChatStore;
  profiles?: ProfileDirectory;
  broadcaster?: Broadcaster;
  resolver?: DirectChatResolver;
  logger?: Logger;
  nowMs?: () => number;
  idGenerator?: () => string;
  maxContentLength?: number;
}>;

export type ChatService = Readonly<{
  isParticipant(userId: UserId, chatId: string): Promise<Result<boolean>>;
  createChat(userId: UserId, input: CreateChatInput): Promise<Result<Chat>>;
  getOrCreateDirectChat(userId: UserId, otherUserId: unknown): Promise<Result<{ chatId: string }>>;
  listChats(userId: UserId): Promise<Result<ReadonlyArray<Chat>>>;
  getChat(userId: UserId, chatId: string): Promise<Result<Chat>>;
  listMessages(userId: UserId, chatId: string, page?: PageInput): Promise<Result<ReadonlyArray<StoredMessage>>>;
  sendMessage(userId: UserId, chatId: string, input: SendMessageInput): Promise<Result<SendMessageOutcome>>;
  addReaction(userId: UserId, messageId: string, input: AddReactionInput): Promise<Result<AddReactionOutcome>>;
  removeReaction(userId: UserId, messageId: string, reactionCode: unknown): Promise<Result<RemoveReactionOutcome>>;
  addParticipant(userId: UserId, chatId: string, targetUserId: unknown): Promise<Result<{ added: boolean }>>;
  removeParticipant(userId: UserId, chatId: string, targetUserId: unknown): Promise<Result<{ removed: boolean }>>;
  setTyping(userId: UserId, chatId: string, isTyping: boolean): Promise<Result<{ isTyping: boolean }>>;
  markRead(userId: UserId, chatId: string, messageId: unknown): Promise<Result<ReadReceipt>>;
  listReactionCatalog(): Promise<Result<ReadonlyArray<ReactionCatalogEntry>>>;
}>;

export const DEFAULT_MESSAGE_PAGE_SIZE = 50;
export const MAX_MESSAGE_PAGE_SIZE = 200;
const DEFAULT_MAX_CONTENT_LENGTH = 4000;
const MAX_ID_LENGTH = 128;
const MAX_CHAT_NAME_LENGTH = 100;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function asId(value: unknown): string | null {
  if (!isNonEmptyString(value)) return null;
  const trimmed = value.trim();
  return trimmed.length <= MAX_ID_LENGTH ? trimmed : null;
}

export function asUserId(value: unknown): UserId | null {
  const n = typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  return typeof n === "number" && Number.isSafeInteger(n) && n > 0 ? n : null;
}

function asPageInt(value: unknown): number | null {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value.trim()) : value;
  return typeof n === "number" && Number.isInteger(n) ? n : null;
}

export function normalizePage(page: PageInput = {}): { limit: number; offset: number } {
  const limitRaw = asPageInt(page.limit);
  const offsetRaw = asPageInt(page.offset);
  const limit = limitRaw !== null && limitRaw > 0 ? Math.min(limitRaw, MAX_MESSAGE_PAGE_SIZE) : DEFAULT_MESSAGE_PAGE_SIZE;
  const offset = offsetRaw !== null && offsetRaw >= 0 ? offsetRaw : 0;
  return { limit, offset };
}

export function createChatService(deps: ChatServiceDeps): ChatService {
  const store = deps.store;
  const logger = deps.logger ?? silentLogger;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const idGenerator = deps.idGenerator ?? (() => randomUUID());
  const maxContentLength = deps.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH;
  if (!Number.isInteger(maxContentLength) || maxContentLength <= 0) {
    throw new Error("chatService requires a positive maxContentLength.");
  }
  const resolver = deps.resolver ?? createDirectChatResolver({ store, idGenerator, nowMs });

  async function guard<T>(operation: string, work: () => Promise<Result<T>>): Promise<Result<T>> {
    try {
      return await work();
    } catch (e: unknown) {
      logger.error(`chatService.${operation} failed: ${describeError(e)}`);
      return err("STORE_UNAVAILABLE", "Chat storage is unavailable.");
    }
  }

  async function memberChat(userId: UserId, chatId: string): Promise<Chat | null> {
    const chat = await store.getChat(chatId);
    if (!chat || !chat.participants.includes(userId)) return null;
    return chat;
  }

  // A direct chat carries no name of its own; each viewer sees the other participant's.
  async function withDisplayName(chat: Chat, viewer: UserId): Promise<Chat> {
    if (chat.isGroup || !deps.profiles) return chat;
    const other = chat.participants.find((p) => p !== viewer);
    if (other === undefined) return chat;
    try {
      const profile = await deps.profiles.getDisplayProfile(other);
      return profile ? { ...chat, chatName: profile.displayName } : chat;
    } catch (e: unknown) {
      logger.warn(`Display name lookup failed for user ${other}: ${describeError(e)}`);
      return chat;
    }
  }

  async function broadcast(...args: Parameters<Broadcaster["broadcast"]>): Promise<void> {
    if (!deps.broadcaster) return;
    await deps.broadcaster.broadcast(...args);
  }

  return {
    async isParticipant(userId: UserId, chatId: string): Promise<Result<boolean>> {
      return guard<boolean>("isParticipant", async () => ok(await store.isParticipant(userId, chatId)));
    },

    async createChat(userId: UserId, input: CreateChatInput): Promise<Result<Chat>> {
      if (!Array.isArray(input.participants)) {
        return err("INVALID_INPUT", "participants must be an array of user ids.");
      }
      const participants: UserId[] = [userId];
      for (const raw of input.participants) {
        const id = asUserId(raw);
        if (id === null) return err("INVALID_INPUT", "participants must be an array of user ids.", { participant: raw });
        if (!participants.includes(id)) participants.push(id);
      }
      if (participants.length < 2) {
        return err("INVALID_INPUT", "A chat needs at least one other participant.");
      }

      let chatId: string;
      if (input.chatId === undefined || input.chatId === null) {
        chatId = idGenerator();
      } else {
        const provided = asId(input.chatId);
        if (!provided) return err("INVALID_INPUT", "chat_id must be a non-empty string.");
        chatId = provided;
      }

      let chatName: string | null = null;
      if (input.chatName !== undefined && input.chatName !== null) {
        if (typeof input.chatName !== "string" || input.chatName.trim().length > MAX_CHAT_NAME_LENGTH) {
          return err("INVALID_INPUT", `chat_name must be a string of at most ${MAX_CHAT_NAME_LENGTH} characters.`);
        }
        chatName = input.chatName.trim() || null;
      }

      return guard<Chat>("createChat", async () => {
        try {
          const chat = await store.createChat({ chatId, chatName, createdAtMs: nowMs(), participants });
          return ok(chat);
        } catch (e: unknown) {
          if (isChatStoreError(e, "ALREADY_EXISTS")) {
            return err("CHAT_ALREADY_EXISTS", "A chat with this id already exists.", { chatId });
          }
          throw e;
        }
      });
    },

    async getOrCreateDirectChat(userId: UserId, otherUserId: unknown): Promise<Result<{ chatId: string }>> {
      const other = asUserId(otherUserId);
      if (other === null) return err("INVALID_INPUT", "user_id must be a positive integer.");

      return guard<{ chatId: string }>("getOrCreateDirectChat", async () => {
        try {
          return ok({ chatId: await resolver.getOrCreate(userId, other) });
        } catch (e: unknown) {
          if (e instanceof SelfDirectChatError) {
            return err("SELF_CHAT_FORBIDDEN", "Cannot open a direct chat with yourself.");
          }
          throw e;
        }
      });
    },

    async listChats(userId: UserId): Promise<Result<ReadonlyArray<Chat>>> {
      return guard<ReadonlyArray<Chat>>("listChats", async () => {
        const chats = await store.listChatsForUser(userId);
        return ok(await Promise.all(chats.map((chat) => withDisplayName(chat, userId))));
      });
    },

    async getChat(userId: UserId, chatId: string): Promise<Result<Chat>> {
      return guard<Chat>("getChat", async () => {
        const chat = await memberChat(userId, chatId);
        if (!chat) return err("CHAT_NOT_FOUND", "Chat not found.", { chatId });
        return ok(await withDisplayName(chat, userId));
      });
    },

    async listMessages(userId: UserId, chatId: string, page?: PageInput): Promise<Result<ReadonlyArray<StoredMessage>>> {
      const { limit, offset } = normalizePage(page);
      return guard<ReadonlyArray<StoredMessage>>("listMessages", async () => {
        if (!(await store.isParticipant(userId, chatId))) {
          return err("CHAT_NOT_FOUND", "Chat not found.", { chatId });
        }
        return ok(await store.listMessages(chatId, limit, offset));
      });
    },

    async sendMessage(userId: UserId, chatId: string, input: SendMessageInput): Promise<Result<SendMessageOutcome>> {
      const messageId = asId(input.messageId);
      if (!messageId) return err("INVALID_INPUT", "message_id must be a non-empty string.");
      if (typeof input.content !== "string" || input.content.trim() === "") {
        return err("INVALID_INPUT", "content must be a non-empty string.");
      }
      const content = input.content;
      if (content.length > maxContentLength) {
        return err("INVALID_INPUT", `content exceeds ${maxContentLength} characters.`, { maxLength: maxContentLength });
      }

      return guard<SendMessageOutcome>("sendMessage", async () => {
        if (!(await store.isParticipant(userId, chatId))) {
          return err("CHAT_NOT_FOUND", "Chat not found.", { chatId });
        }

        let message: StoredMessage;
        try {
          message = await store.insertMessage({ messageId, chatId, senderId: userId, content, sentAtMs: nowMs() });
        } catch (e: unknown) {
          if (isChatStoreError(e, "ALREADY_EXISTS")) return ok<SendMessageOutcome>({ created: false, messageId });
          if (isChatStoreError(e, "NOT_FOUND")) return err("CHAT_NOT_FOUND", "Chat not found.", { chatId });
          throw e;
        }

        await broadcast(chatId, {
          type: "chat_message",
          chatId,
          messageId: message.messageId,
          senderId: message.senderId,
          content: message.content,
          sentAtMs: message.sentAtMs
        });
        return ok<SendMessageOutcome>({ created: true, message });
      });
    },

    async addReaction(userId: UserId, messageId: string, input: AddReactionInput): Promise<Result<AddReactionOutcome>> {
      const reactionId = asId(input.reactionId);
      if (!reactionId) return err("INVALID_INPUT", "reaction_id must be a non-empty string.");
      if (!isNonEmptyString(input.reactionCode)) return err("INVALID_INPUT", "reaction_code is required.");
      const reactionCode = input.reactionCode.trim();

      return guard<AddReactionOutcome>("addReaction", async () => {
        const message = await store.getMessage(messageId);
        if (!message || !(await store.isParticipant(userId, message.chatId))) {
          return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
        }
        const catalog = await store.listReactionCatalog();
        if (!catalog.some((entry) => entry.reactionCode === reactionCode)) {
          return err("INVALID_REACTION_CODE", "Unknown reaction code.", { reactionCode });
        }

        const reaction: StoredReaction = { reactionId, messageId, userId, reactionCode, reactedAtMs: nowMs() };
        try {
          await store.insertReaction(reaction);
        } catch (e: unknown) {
          if (isChatStoreError(e, "ALREADY_EXISTS")) return ok<AddReactionOutcome>({ created: false, reactionId });
          if (isChatStoreError(e, "NOT_FOUND")) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
          throw e;
        }

        await broadcast(message.chatId, { type: "reaction", chatId: message.chatId, ...reaction });
        return ok<AddReactionOutcome>({ created: true, reaction });
      });
    },

    async removeReaction(userId: UserId, messageId: string, reactionCode: unknown): Promise<Result<RemoveReactionOutcome>> {
      if (!isNonEmptyString(reactionCode)) return err("INVALID_INPUT", "reaction_code is required.");
      const code = reactionCode.trim();

      return guard<RemoveReactionOutcome>("removeReaction", async () => {
        const message = await store.getMessage(messageId);
        if (!message || !(await store.isParticipant(userId, message.chatId))) {
          return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
        }
        const removed = await store.deleteReactions(messageId, userId, code);
        await broadcast(message.chatId, {
          type: "reaction_removed",
          chatId: message.chatId,
          messageId,
          userId,
          reactionCode: code,
          removedAtMs: nowMs()
        });
        return ok({ chatId: message.chatId, removed });
      });
    },

    async addParticipant(userId: UserId, chatId: string, targetUserId: unknown): Promise<Result<{ added: boolean }>> {
      const target = asUserId(targetUserId);
      if (target === null) return err("INVALID_INPUT", "user_id must be a positive integer.");

      return guard<{ added: boolean }>("addParticipant", async () => {
        const chat = await memberChat(userId, chatId);
        if (!chat) return err("CHAT_NOT_FOUND", "Chat not found.", { chatId });
        if (!chat.isGroup) return err("DIRECT_CHAT_IMMUTABLE", "Direct chats always have exactly two participants.");

        const joinedAtMs = nowMs();
        const added = await store.addParticipant(chatId, target, joinedAtMs);
        if (added) {
          await broadcast(chatId, { type: "participant_joined", chatId, userId: target, joinedAtMs });
        }
        return ok({ added });
      });
    },

    async removeParticipant(userId: UserId, chatId: string, targetUserId: unknown): Promise<Result<{ removed: boolean }>> {
      const target = asUserId(targetUserId);
      if (target === null) return err("INVALID_INPUT", "user_id must be a positive integer.");

      return guard<{ removed: boolean }>("removeParticipant", async () => {
        const chat = await memberChat(userId, chatId);
        if (!chat) return err("CHAT_NOT_FOUND", "Chat not found.", { chatId });
        if (target !== userId) {
          return err("UNAUTHORIZED_ACTION", "Participants can only remove themselves.");
        }
        if (!chat.isGroup) return err("DIRECT_CHAT_IMMUTABLE", "Direct chats always have exactly two participants.");

        const removed = await store.removeParticipant(chatId, target);
        if (removed) {
          await broadcast(chatId, { type: "participant_left", chatId, userId: target, leftAtMs: nowMs() });
        }
        return ok({ removed });
      });
    },

    async setTyping(userId: UserId, chatId: string, isTyping: boolean): Promise<Result<{ isTyping: boolean }>> {
      return guard<{ isTyping: boolean }>("setTyping", async () => {
        if (!(await store.isParticipant(userId, chatId))) {
          return err("CHAT_NOT_FOUND", "Chat not found.", { chatId });
        }
        const atMs = nowMs();
        try {
          await store.storeTyping(userId, chatId, atMs);
        } catch (e: unknown) {
          logger.warn(`Typing state for user ${userId} in chat ${chatId} not stored: ${describeError(e)}`);
        }
        await broadcast(chatId, { type: "typing", chatId, userId, isTyping, atMs }, { excludeUserId: userId });
        return ok({ isTyping });
      });
    },

    async markRead(userId: UserId, chatId: string, messageId: unknown): Promise<Result<ReadReceipt>> {
      const id = asId(messageId);
      if (!id) return err("INVALID_INPUT", "message_id must be a non-empty string.");

      return guard<ReadReceipt>("markRead", async () => {
        if (!(await store.isParticipant(userId, chatId))) {
          return err("CHAT_NOT_FOUND", "Chat not found.", { chatId });
        }
        const message = await store.getMessage(id);
        if (!message || message.chatId !== chatId) {
          return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId: id });
        }
        const readAtMs = nowMs();
        const receipt = await store.upsertReadReceipt(userId, chatId, message.seq, readAtMs);
        await broadcast(
          chatId,
          { type: "read_receipt", chatId, userId, messageId: id, readAtMs },
          { excludeUserId: userId }
        );
        return ok(receipt);
      });
    },

    async listReactionCatalog(): Promise<Result<ReadonlyArray<ReactionCatalogEntry>>> {
      return guard<ReadonlyArray<ReactionCatalogEntry>>("listReactionCatalog", async () => ok(await store.listReactionCatalog()));
    }
  };
}
