export type UserId = number;

export type Chat = Readonly<{
  chatId: string;
  chatName: string | null;
  isGroup: boolean;
  createdAtMs: number;
  participants: ReadonlyArray<UserId>;
}>;

export type StoredMessage = Readonly<{
  messageId: string;
  chatId: string;
  senderId: UserId;
  content: string;
  sentAtMs: number;
  seq: number;
}>;

export type StoredReaction = Readonly<{
  reactionId: string;
  messageId: string;
  userId: UserId;
  reactionCode: string;
  reactedAtMs: number;
}>;

export type ReactionCatalogEntry = Readonly<{
  reactionCode: string;
  emoji: string;
}>;

export type ReadReceipt = Readonly<{
  userId: UserId;
  chatId: string;
  lastReadSeq: number;
  readAtMs: number;
}>;

export type NewChat = Readonly<{
  chatId: string;
  chatName: string | null;
  createdAtMs: number;
  participants: ReadonlyArray<UserId>;
}>;

export type NewMessage = Readonly<{
  messageId: string;
  chatId: string;
  senderId: UserId;
  content: string;
  sentAtMs: number;
}>;

export type ChatStoreErrorKind = "ALREADY_EXISTS" | "NOT_FOUND" | "UNAVAILABLE";

export class ChatStoreError extends Error {
  readonly kind: ChatStoreErrorKind;

  constructor(kind: ChatStoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChatStoreError";
    this.kind = kind;
  }
}

export function isChatStoreError(e: unknown, kind?: ChatStoreErrorKind): e is ChatStoreError {
  if (!(e instanceof ChatStoreError)) return false;
  return kind === undefined || e.kind === kind;
}

/**
 * Durable chat state. Implementations signal conflicts and missing references
 * with {@link ChatStoreError}; any other failure is treated as unavailability.
 */
export type ChatStore = Readonly<{
  isParticipant(userId: UserId, chatId: string): Promise<boolean>;
  participants(chatId: string): Promise<ReadonlyArray<UserId>>;
  getChat(chatId: string): Promise<Chat | null>;
  /** Chats the user belongs to, newest first. */
  listChatsForUser(userId: UserId): Promise<ReadonlyArray<Chat>>;

  /** Always a group chat. Throws ALREADY_EXISTS on a duplicate id. */
  createChat(chat: NewChat): Promise<Chat>;
  findDirectChat(a: UserId, b: UserId): Promise<string | null>;
  /** Throws ALREADY_EXISTS when the id or the unordered pair is taken. */
  createDirectChat(chatId: string, a: UserId, b: UserId, createdAtMs: number): Promise<Chat>;

  /** Assigns the per-chat seq. Throws ALREADY_EXISTS on a duplicate message id. */
  insertMessage(message: NewMessage): Promise<StoredMessage>;
  getMessage(messageId: string): Promise<StoredMessage | null>;
  /** Newest first. */
  listMessages(chatId: string, limit: number, offset: number): Promise<ReadonlyArray<StoredMessage>>;

  listReactionCatalog(): Promise<ReadonlyArray<ReactionCatalogEntry>>;
  /** Throws ALREADY_EXISTS on a duplicate reaction id. */
  insertReaction(reaction: StoredReaction): Promise<void>;
  /** Removes every reaction matching (message, user, code); returns how many went. */
  deleteReactions(messageId: string, userId: UserId, reactionCode: string): Promise<number>;

  /** Returns false when the user was already a participant. */
  addParticipant(chatId: string, userId: UserId, joinedAtMs: number): Promise<boolean>;
  /** Returns false when the user was not a participant. */
  removeParticipant(chatId: string, userId: UserId): Promise<boolean>;

  storeTyping(userId: UserId, chatId: string, atMs: number): Promise<void>;
  /** High-water mark: a lower seq never replaces a higher one. */
  upsertReadReceipt(userId: UserId, chatId: string, seq: number, atMs: number): Promise<ReadReceipt>;
}>;

export function directKey(a: UserId, b: UserId): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}
