import type { UserId } from "../services/chatStore";

// Inbound frames. Sender identity and timestamps are never taken from the client.

export type InboundChatMessage = Readonly<{
  type: "chat_message";
  chatId: string;
  messageId: string;
  content: string;
}>;

export type InboundReaction = Readonly<{
  type: "reaction";
  chatId: string;
  reactionId: string;
  messageId: string;
  reactionCode: string;
}>;

export type InboundRemoveReaction = Readonly<{
  type: "remove_reaction";
  chatId: string;
  messageId: string;
  reactionCode: string;
}>;

export type InboundTyping = Readonly<{
  type: "typing";
  chatId: string;
  isTyping: boolean;
}>;

export type InboundReadReceipt = Readonly<{
  type: "read_receipt";
  chatId: string;
  messageId: string;
}>;

export type InboundFrame =
  | InboundChatMessage
  | InboundReaction
  | InboundRemoveReaction
  | InboundTyping
  | InboundReadReceipt;

export type InboundFrameType = InboundFrame["type"];

// Outbound frames.

export type ChatMessageFrame = Readonly<{
  type: "chat_message";
  chatId: string;
  messageId: string;
  senderId: UserId;
  content: string;
  sentAtMs: number;
}>;

export type ReactionFrame = Readonly<{
  type: "reaction";
  chatId: string;
  reactionId: string;
  messageId: string;
  userId: UserId;
  reactionCode: string;
  reactedAtMs: number;
}>;

export type ReactionRemovedFrame = Readonly<{
  type: "reaction_removed";
  chatId: string;
  messageId: string;
  userId: UserId;
  reactionCode: string;
  removedAtMs: number;
}>;

export type TypingFrame = Readonly<{
  type: "typing";
  chatId: string;
  userId: UserId;
  isTyping: boolean;
  atMs: number;
}>;

export type ReadReceiptFrame = Readonly<{
  type: "read_receipt";
  chatId: string;
  userId: UserId;
  messageId: string;
  readAtMs: number;
}>;

export type ParticipantJoinedFrame = Readonly<{
  type: "participant_joined";
  chatId: string;
  userId: UserId;
  joinedAtMs: number;
}>;

export type ParticipantLeftFrame = Readonly<{
  type: "participant_left";
  chatId: string;
  userId: UserId;
  leftAtMs: number;
}>;

export type OutboundFrame =
  | ChatMessageFrame
  | ReactionFrame
  | ReactionRemovedFrame
  | TypingFrame
  | ReadReceiptFrame
  | ParticipantJoinedFrame
  | ParticipantLeftFrame;

export type DecodeFailure = Readonly<{
  ok: false;
  error: "MALFORMED" | "UNKNOWN_TYPE";
  detail: string;
}>;

export type DecodeResult = Readonly<{ ok: true; frame: InboundFrame }> | DecodeFailure;

function safeJsonParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function malformed(detail: string): DecodeFailure {
  return { ok: false, error: "MALFORMED", detail };
}

function requireIds(
  raw: Record<string, unknown>,
  fields: ReadonlyArray<string>
): { ok: true; values: Record<string, string> } | DecodeFailure {
  const values: Record<string, string> = {};
  for (const field of fields) {
    const value = raw[field];
    if (!isNonEmptyString(value)) return malformed(`${field} must be a non-empty string.`);
    values[field] = value.trim();
  }
  return { ok: true, values };
}

export function decodeInboundFrame(text: string): DecodeResult {
  const parsed = safeJsonParse(text);
  if (!parsed.ok) return malformed("Frame is not valid JSON.");
  const raw = parsed.value;
  if (!isRecord(raw)) return malformed("Frame must be a JSON object.");
  if (typeof raw.type !== "string") return malformed("Frame type is missing.");

  switch (raw.type) {
    case "chat_message": {
      const ids = requireIds(raw, ["chat_id", "message_id"]);
      if (!ids.ok) return ids;
      if (typeof raw.content !== "string") return malformed("content must be a string.");
      return {
        ok: true,
        frame: { type: "chat_message", chatId: ids.values.chat_id, messageId: ids.values.message_id, content: raw.content }
      };
    }
    case "reaction": {
      const ids = requireIds(raw, ["chat_id", "reaction_id", "message_id", "reaction_code"]);
      if (!ids.ok) return ids;
      return {
        ok: true,
        frame: {
          type: "reaction",
          chatId: ids.values.chat_id,
          reactionId: ids.values.reaction_id,
          messageId: ids.values.message_id,
          reactionCode: ids.values.reaction_code
        }
      };
    }
    case "remove_reaction": {
      const ids = requireIds(raw, ["chat_id", "message_id", "reaction_code"]);
      if (!ids.ok) return ids;
      return {
        ok: true,
        frame: {
          type: "remove_reaction",
          chatId: ids.values.chat_id,
          messageId: ids.values.message_id,
          reactionCode: ids.values.reaction_code
        }
      };
    }
    case "typing": {
      const ids = requireIds(raw, ["chat_id"]);
      if (!ids.ok) return ids;
      if (typeof raw.is_typing !== "boolean") return malformed("is_typing must be a boolean.");
      return { ok: true, frame: { type: "typing", chatId: ids.values.chat_id, isTyping: raw.is_typing } };
    }
    case "read_receipt": {
      const ids = requireIds(raw, ["chat_id", "message_id"]);
      if (!ids.ok) return ids;
      return {
        ok: true,
        frame: { type: "read_receipt", chatId: ids.values.chat_id, messageId: ids.values.message_id }
      };
    }
    default:
      return { ok: false, error: "UNKNOWN_TYPE", detail: `Unknown frame type "${raw.type}".` };
  }
}

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

export function toWireFrame(frame: OutboundFrame): Record<string, unknown> {
  switch (frame.type) {
    case "chat_message":
      return {
        type: frame.type,
        chat_id: frame.chatId,
        message_id: frame.messageId,
        sender_id: frame.senderId,
        content: frame.content,
        sent_at: iso(frame.sentAtMs)
      };
    case "reaction":
      return {
        type: frame.type,
        chat_id: frame.chatId,
        reaction_id: frame.reactionId,
        message_id: frame.messageId,
        user_id: frame.userId,
        reaction_code: frame.reactionCode,
        reacted_at: iso(frame.reactedAtMs)
      };
    case "reaction_removed":
      return {
        type: frame.type,
        chat_id: frame.chatId,
        message_id: frame.messageId,
        user_id: frame.userId,
        reaction_code: frame.reactionCode,
        removed_at: iso(frame.removedAtMs)
      };
    case "typing":
      return {
        type: frame.type,
        chat_id: frame.chatId,
        user_id: frame.userId,
        is_typing: frame.isTyping,
        timestamp: iso(frame.atMs)
      };
    case "read_receipt":
      return {
        type: frame.type,
        chat_id: frame.chatId,
        user_id: frame.userId,
        message_id: frame.messageId,
        read_at: iso(frame.readAtMs)
      };
    case "participant_joined":
      return { type: frame.type, chat_id: frame.chatId, user_id: frame.userId, joined_at: iso(frame.joinedAtMs) };
    case "participant_left":
      return { type: frame.type, chat_id: frame.chatId, user_id: frame.userId, left_at: iso(frame.leftAtMs) };
    default: {
      const unreachable: never = frame;
      throw new Error(`Unhandled outbound frame: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function encodeOutboundFrame(frame: OutboundFrame): string {
  return JSON.stringify(toWireFrame(frame));
}
