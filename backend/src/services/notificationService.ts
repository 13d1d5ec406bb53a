import { describeError, silentLogger, type Logger } from "../logging";
import type { ChatMessageFrame } from "../realtime/frames";
import type { Chat, ChatStore, UserId } from "./chatStore";
import type { DisplayProfile, ProfileDirectory } from "./profileDirectory";
import type { PushPayload, PushSender } from "./pushService";
import type { TaskPool } from "./taskPool";

export type ChatNotifierDeps = Readonly<{
  store: Pick<ChatStore, "getChat">;
  profiles: ProfileDirectory;
  push: PushSender;
  pool: TaskPool;
  logger?: Logger;
}>;

export type ChatNotifier = Readonly<{
  /** Schedules one push per recipient; returns how many were accepted by the pool. */
  notifyOffline(frame: ChatMessageFrame, recipients: ReadonlyArray<UserId>): Promise<number>;
}>;

export const PREVIEW_MAX_CHARS = 180;

export function previewText(content: string): string {
  const chars = Array.from(content);
  if (chars.length <= PREVIEW_MAX_CHARS) return content;
  return `${chars.slice(0, PREVIEW_MAX_CHARS - 1).join("")}…`;
}

export function buildMessagePush(frame: ChatMessageFrame, sender: DisplayProfile, chat: Chat): PushPayload {
  const title = chat.isGroup && chat.chatName ? `${sender.displayName} in ${chat.chatName}` : sender.displayName;
  const payload: PushPayload = {
    title,
    body: previewText(frame.content),
    sound: "default",
    badge: 1,
    data: { type: "chat_message", chat_id: frame.chatId, message_id: frame.messageId }
  };
  return sender.avatarUrl ? { ...payload, imageUrl: sender.avatarUrl } : payload;
}

export function createChatNotifier(deps: ChatNotifierDeps): ChatNotifier {
  const logger = deps.logger ?? silentLogger;

  return {
    async notifyOffline(frame: ChatMessageFrame, recipients: ReadonlyArray<UserId>): Promise<number> {
      if (recipients.length === 0) return 0;

      let sender: DisplayProfile | null;
      let chat: Chat | null;
      try {
        [sender, chat] = await Promise.all([
          deps.profiles.getDisplayProfile(frame.senderId),
          deps.store.getChat(frame.chatId)
        ]);
      } catch (e: unknown) {
        logger.error(`Notification lookup failed for message ${frame.messageId}: ${describeError(e)}`);
        return 0;
      }
      if (!sender) {
        logger.warn(`No display profile for user ${frame.senderId}; skipping notifications for ${frame.messageId}.`);
        return 0;
      }
      if (!chat) {
        logger.warn(`Chat ${frame.chatId} not found; skipping notifications for ${frame.messageId}.`);
        return 0;
      }

      const payload = buildMessagePush(frame, sender, chat);
      let scheduled = 0;
      for (const recipient of recipients) {
        const accepted = deps.pool.submit(`push user=${recipient} message=${frame.messageId}`, (signal) =>
          deps.push.sendNotification(signal, recipient, payload)
        );
        if (accepted) {
          scheduled += 1;
        } else {
          logger.warn(`Push queue full; dropped notification for user ${recipient} (message ${frame.messageId}).`);
        }
      }
      return scheduled;
    }
  };
}
