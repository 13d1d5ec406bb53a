import type { Pool, PoolClient, QueryResult } from "pg";

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

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function asNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function pgErrorCode(e: unknown): string | null {
  if (typeof e !== "object" || e === null) return null;
  const code = (e as Record<string, unknown>).code;
  return typeof code === "string" ? code : null;
}

export function toChatStoreError(e: unknown): ChatStoreError {
  if (e instanceof ChatStoreError) return e;
  const message = e instanceof Error ? e.message : String(e);
  const code = pgErrorCode(e);
  if (code === UNIQUE_VIOLATION) return new ChatStoreError("ALREADY_EXISTS", message, { cause: e });
  if (code === FOREIGN_KEY_VIOLATION) return new ChatStoreError("NOT_FOUND", message, { cause: e });
  return new ChatStoreError("UNAVAILABLE", message, { cause: e });
}

async function guarded<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (e: unknown) {
    throw toChatStoreError(e);
  }
}

async function inTransaction<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (e: unknown) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
}

function parseParticipants(value: unknown): UserId[] {
  if (!Array.isArray(value)) return [];
  return value.map(asNumber).filter((n) => Number.isInteger(n));
}

function parseChat(row: Record<string, unknown>): Chat | null {
  const chatId = asString(row.chat_id);
  const createdAtMs = asNumber(row.created_at_ms);
  if (!chatId || !Number.isFinite(createdAtMs)) return null;
  return {
    chatId,
    chatName: typeof row.chat_name === "string" ? row.chat_name : null,
    isGroup: row.is_group === true,
    createdAtMs,
    participants: parseParticipants(row.participants)
  };
}

function parseMessage(row: Record<string, unknown>): StoredMessage | null {
  const messageId = asString(row.message_id);
  const chatId = asString(row.chat_id);
  const senderId = asNumber(row.sender_id);
  const content = asString(row.content);
  const sentAtMs = asNumber(row.sent_at_ms);
  const seq = asNumber(row.seq);
  if (!messageId || !chatId || !content) return null;
  if (!Number.isInteger(senderId) || !Number.isFinite(sentAtMs) || !Number.isFinite(seq)) return null;
  return { messageId, chatId, senderId, content, sentAtMs, seq };
}

function parseReadReceipt(row: Record<string, unknown>): ReadReceipt {
  return {
    userId: asNumber(row.user_id),
    chatId: asString(row.chat_id),
    lastReadSeq: asNumber(row.last_read_seq),
    readAtMs: asNumber(row.read_at_ms)
  };
}

const CHAT_COLUMNS = `c.chat_id, c.chat_name, c.is_group, c.created_at_ms,
  ARRAY(SELECT p.user_id FROM chat_participants p WHERE p.chat_id = c.chat_id ORDER BY p.joined_at_ms, p.user_id) AS participants`;

type QueryRunner = (text: string, values: unknown[]) => Promise<QueryResult>;

const MESSAGE_COLUMNS = "message_id, chat_id, sender_id, content, sent_at_ms, seq";

export function createPostgresChatStore(pool: Pool): ChatStore {
  async function selectChat(run: QueryRunner, chatId: string): Promise<Chat | null> {
    const res = await run(`SELECT ${CHAT_COLUMNS} FROM chats c WHERE c.chat_id = $1`, [chatId]);
    const row = res.rows[0];
    return row ? parseChat(row) : null;
  }

  async function insertParticipants(
    client: PoolClient,
    chatId: string,
    participants: ReadonlyArray<UserId>,
    joinedAtMs: number
  ): Promise<void> {
    for (const userId of participants) {
      await client.query(
        `INSERT INTO chat_participants (chat_id, user_id, joined_at_ms)
         VALUES ($1, $2, $3)
         ON CONFLICT (chat_id, user_id) DO NOTHING`,
        [chatId, userId, joinedAtMs]
      );
    }
  }

  async function requireCreated(client: PoolClient, chatId: string): Promise<Chat> {
    const chat = await selectChat((text, values) => client.query(text, values), chatId);
    if (!chat) throw new ChatStoreError("UNAVAILABLE", `Chat ${chatId} vanished after creation.`);
    return chat;
  }

  return {
    async isParticipant(userId: UserId, chatId: string): Promise<boolean> {
      return guarded(async () => {
        const res = await pool.query("SELECT 1 FROM chat_participants WHERE chat_id = $1 AND user_id = $2", [
          chatId,
          userId
        ]);
        return (res.rowCount ?? 0) > 0;
      });
    },

    async participants(chatId: string): Promise<ReadonlyArray<UserId>> {
      return guarded(async () => {
        const res = await pool.query(
          "SELECT user_id FROM chat_participants WHERE chat_id = $1 ORDER BY joined_at_ms, user_id",
          [chatId]
        );
        return res.rows.map((row: Record<string, unknown>) => asNumber(row.user_id)).filter((n) => Number.isInteger(n));
      });
    },

    async getChat(chatId: string): Promise<Chat | null> {
      return guarded(() => selectChat((text, values) => pool.query(text, values), chatId));
    },

    async listChatsForUser(userId: UserId): Promise<ReadonlyArray<Chat>> {
      return guarded(async () => {
        const res = await pool.query(
          `SELECT ${CHAT_COLUMNS}
           FROM chats c
           JOIN chat_participants mine ON mine.chat_id = c.chat_id AND mine.user_id = $1
           ORDER BY c.created_at_ms DESC, c.chat_id`,
          [userId]
        );
        const chats: Chat[] = [];
        for (const row of res.rows) {
          const chat = parseChat(row);
          if (chat) chats.push(chat);
        }
        return chats;
      });
    },

    async createChat(chat: NewChat): Promise<Chat> {
      return guarded(() =>
        inTransaction(pool, async (client) => {
          await client.query(
            `INSERT INTO chats (chat_id, chat_name, is_group, direct_key, created_at_ms)
             VALUES ($1, $2, true, NULL, $3)`,
            [chat.chatId, chat.chatName, chat.createdAtMs]
          );
          await insertParticipants(client, chat.chatId, chat.participants, chat.createdAtMs);
          return requireCreated(client, chat.chatId);
        })
      );
    },

    async findDirectChat(a: UserId, b: UserId): Promise<string | null> {
      return guarded(async () => {
        const res = await pool.query("SELECT chat_id FROM chats WHERE direct_key = $1", [directKey(a, b)]);
        const row = res.rows[0];
        return row ? asString(row.chat_id) || null : null;
      });
    },

    async createDirectChat(chatId: string, a: UserId, b: UserId, createdAtMs: number): Promise<Chat> {
      return guarded(() =>
        inTransaction(pool, async (client) => {
          await client.query(
            `INSERT INTO chats (chat_id, chat_name, is_group, direct_key, created_at_ms)
             VALUES ($1, NULL, false, $2, $3)`,
            [chatId, directKey(a, b), createdAtMs]
          );
          await insertParticipants(client, chatId, [a, b], createdAtMs);
          return requireCreated(client, chatId);
        })
      );
    },

    async insertMessage(message: NewMessage): Promise<StoredMessage> {
      return guarded(async () => {
        const res = await pool.query(
          `INSERT INTO messages (message_id, chat_id, sender_id, content, sent_at_ms)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${MESSAGE_COLUMNS}`,
          [message.messageId, message.chatId, message.senderId, message.content, message.sentAtMs]
        );
        const row = res.rows[0];
        const stored = row ? parseMessage(row) : null;
        if (!stored) throw new ChatStoreError("UNAVAILABLE", `Message ${message.messageId} was not returned.`);
        return stored;
      });
    },

    async getMessage(messageId: string): Promise<StoredMessage | null> {
      return guarded(async () => {
        const res = await pool.query(`SELECT ${MESSAGE_COLUMNS} FROM messages WHERE message_id = $1`, [messageId]);
        const row = res.rows[0];
        return row ? parseMessage(row) : null;
      });
    },

    async listMessages(chatId: string, limit: number, offset: number): Promise<ReadonlyArray<StoredMessage>> {
      return guarded(async () => {
        const res = await pool.query(
          `SELECT ${MESSAGE_COLUMNS}
           FROM messages
           WHERE chat_id = $1
           ORDER BY seq DESC
           LIMIT $2 OFFSET $3`,
          [chatId, limit, offset]
        );
        const list: StoredMessage[] = [];
        for (const row of res.rows) {
          const message = parseMessage(row);
          if (message) list.push(message);
        }
        return list;
      });
    },

    async listReactionCatalog(): Promise<ReadonlyArray<ReactionCatalogEntry>> {
      return guarded(async () => {
        const res = await pool.query("SELECT reaction_code, emoji FROM reaction_catalog ORDER BY reaction_code");
        return res.rows.map((row: Record<string, unknown>) => ({
          reactionCode: asString(row.reaction_code),
          emoji: asString(row.emoji)
        }));
      });
    },

    async insertReaction(reaction: StoredReaction): Promise<void> {
      await guarded(() =>
        pool.query(
          `INSERT INTO message_reactions (reaction_id, message_id, user_id, reaction_code, reacted_at_ms)
           VALUES ($1, $2, $3, $4, $5)`,
          [reaction.reactionId, reaction.messageId, reaction.userId, reaction.reactionCode, reaction.reactedAtMs]
        )
      );
    },

    async deleteReactions(messageId: string, userId: UserId, reactionCode: string): Promise<number> {
      return guarded(async () => {
        const res = await pool.query(
          "DELETE FROM message_reactions WHERE message_id = $1 AND user_id = $2 AND reaction_code = $3",
          [messageId, userId, reactionCode]
        );
        return res.rowCount ?? 0;
      });
    },

    async addParticipant(chatId: string, userId: UserId, joinedAtMs: number): Promise<boolean> {
      return guarded(async () => {
        const res = await pool.query(
          `INSERT INTO chat_participants (chat_id, user_id, joined_at_ms)
           VALUES ($1, $2, $3)
           ON CONFLICT (chat_id, user_id) DO NOTHING`,
          [chatId, userId, joinedAtMs]
        );
        return (res.rowCount ?? 0) > 0;
      });
    },

    async removeParticipant(chatId: string, userId: UserId): Promise<boolean> {
      return guarded(async () => {
        const res = await pool.query("DELETE FROM chat_participants WHERE chat_id = $1 AND user_id = $2", [
          chatId,
          userId
        ]);
        if ((res.rowCount ?? 0) > 0) return true;
        const exists = await pool.query("SELECT 1 FROM chats WHERE chat_id = $1", [chatId]);
        if ((exists.rowCount ?? 0) === 0) throw new ChatStoreError("NOT_FOUND", `Chat ${chatId} does not exist.`);
        return false;
      });
    },

    async storeTyping(userId: UserId, chatId: string, atMs: number): Promise<void> {
      await guarded(() =>
        pool.query(
          `INSERT INTO typing_indicators (user_id, chat_id, updated_at_ms)
           VALUES ($1, $2, $3)
           ON CONFLICT (user_id, chat_id) DO UPDATE SET updated_at_ms = EXCLUDED.updated_at_ms`,
          [userId, chatId, atMs]
        )
      );
    },

    async upsertReadReceipt(userId: UserId, chatId: string, seq: number, atMs: number): Promise<ReadReceipt> {
      return guarded(async () => {
        const res = await pool.query(
          `INSERT INTO message_read_receipts (user_id, chat_id, last_read_seq, read_at_ms)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (user_id, chat_id) DO UPDATE
             SET last_read_seq = EXCLUDED.last_read_seq, read_at_ms = EXCLUDED.read_at_ms
             WHERE message_read_receipts.last_read_seq < EXCLUDED.last_read_seq
           RETURNING user_id, chat_id, last_read_seq, read_at_ms`,
          [userId, chatId, seq, atMs]
        );
        const row = res.rows[0];
        if (row) return parseReadReceipt(row);
        const current = await pool.query(
          "SELECT user_id, chat_id, last_read_seq, read_at_ms FROM message_read_receipts WHERE user_id = $1 AND chat_id = $2",
          [userId, chatId]
        );
        const existing = current.rows[0];
        if (!existing) throw new ChatStoreError("UNAVAILABLE", `Read receipt for ${userId} in ${chatId} was not stored.`);
        return parseReadReceipt(existing);
      });
    }
  };
}
