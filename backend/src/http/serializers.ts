import type { Chat, ReactionCatalogEntry, StoredMessage } from "../services/chatStore";

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

export function chatToJson(chat: Chat): Record<string, unknown> {
  return {
    chat_id: chat.chatId,
    chat_name: chat.chatName,
    is_group: chat.isGroup,
    created_at: iso(chat.createdAtMs),
    participants: chat.participants
  };
}

export function messageToJson(message: StoredMessage): Record<string, unknown> {
  return {
    message_id: message.messageId,
    chat_id: message.chatId,
    sender_id: message.senderId,
    content: message.content,
    sent_at: iso(message.sentAtMs),
    seq: message.seq
  };
}

export function catalogEntryToJson(entry: ReactionCatalogEntry): Record<string, unknown> {
  return { reaction_code: entry.reactionCode, emoji: entry.emoji };
}
