import { describeError, silentLogger, type Logger } from "../logging";
import type { ChatStore, UserId } from "../services/chatStore";
import type { ChatNotifier } from "../services/notificationService";
import type { OutboundFrame } from "./frames";
import type { PresenceRegistry } from "./presenceRegistry";

export type BroadcastOptions = Readonly<{
  excludeUserId?: UserId;
}>;

export type BroadcastReport = Readonly<{
  delivered: ReadonlyArray<UserId>;
  failed: ReadonlyArray<UserId>;
  offline: ReadonlyArray<UserId>;
  notified: number;
}>;

export type Broadcaster = Readonly<{
  broadcast(chatId: string, frame: OutboundFrame, options?: BroadcastOptions): Promise<BroadcastReport>;
}>;

export type BroadcastEngineDeps = Readonly<{
  store: Pick<ChatStore, "participants">;
  presence: Pick<PresenceRegistry, "lookup">;
  notifier?: Pick<ChatNotifier, "notifyOffline">;
  logger?: Logger;
}>;

const EMPTY_REPORT: BroadcastReport = { delivered: [], failed: [], offline: [], notified: 0 };

export function createBroadcastEngine(deps: BroadcastEngineDeps): Broadcaster {
  const logger = deps.logger ?? silentLogger;

  return {
    async broadcast(chatId: string, frame: OutboundFrame, options: BroadcastOptions = {}): Promise<BroadcastReport> {
      let participants: ReadonlyArray<UserId>;
      try {
        participants = await deps.store.participants(chatId);
      } catch (e: unknown) {
        logger.error(`Broadcast of ${frame.type} to chat ${chatId} skipped; participant lookup failed: ${describeError(e)}`);
        return EMPTY_REPORT;
      }

      const online: Array<Readonly<{ userId: UserId; send: Promise<void> }>> = [];
      const offline: UserId[] = [];
      for (const userId of participants) {
        if (userId === options.excludeUserId) continue;
        const connection = deps.presence.lookup(userId);
        if (!connection) {
          offline.push(userId);
          continue;
        }
        online.push({ userId, send: connection.send(frame) });
      }

      const settled = await Promise.allSettled(online.map((entry) => entry.send));
      const delivered: UserId[] = [];
      const failed: UserId[] = [];
      settled.forEach((outcome, index) => {
        const userId = online[index].userId;
        if (outcome.status === "fulfilled") {
          delivered.push(userId);
        } else {
          failed.push(userId);
          logger.warn(`Failed to deliver ${frame.type} in chat ${chatId} to user ${userId}: ${describeError(outcome.reason)}`);
        }
      });

      let notified = 0;
      if (frame.type === "chat_message" && deps.notifier) {
        const recipients = offline.filter((userId) => userId !== frame.senderId);
        if (recipients.length > 0) {
          notified = await deps.notifier.notifyOffline(frame, recipients);
        }
      }

      return { delivered, failed, offline, notified };
    }
  };
}
