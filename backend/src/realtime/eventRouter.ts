import { silentLogger, type Logger } from "../logging";
import type { UserId } from "../services/chatStore";
import type { ChatService, Result, ServiceError } from "../services/chatService";
import type { InboundFrame } from "./frames";

export type DispatchOutcome = "handled" | "duplicate" | "unauthorized" | "rejected";

export type EventRouterDeps = Readonly<{
  chatService: Pick<
    ChatService,
    "isParticipant" | "sendMessage" | "addReaction" | "removeReaction" | "setTyping" | "markRead"
  >;
  logger?: Logger;
}>;

export type EventRouter = Readonly<{
  dispatch(userId: UserId, frame: InboundFrame): Promise<DispatchOutcome>;
}>;

function describeServiceError(error: ServiceError): string {
  return `${error.code}: ${error.message}`;
}

export function createEventRouter(deps: EventRouterDeps): EventRouter {
  const logger = deps.logger ?? silentLogger;
  const chatService = deps.chatService;

  function settle<T>(userId: UserId, frame: InboundFrame, result: Result<T>, isDuplicate?: (value: T) => boolean): DispatchOutcome {
    if (!result.ok) {
      logger.warn(`Dropped ${frame.type} from user ${userId} in chat ${frame.chatId}: ${describeServiceError(result.error)}`);
      return "rejected";
    }
    if (isDuplicate && isDuplicate(result.value)) {
      logger.info(`Ignored duplicate ${frame.type} from user ${userId} in chat ${frame.chatId}.`);
      return "duplicate";
    }
    return "handled";
  }

  return {
    async dispatch(userId: UserId, frame: InboundFrame): Promise<DispatchOutcome> {
      const membership = await chatService.isParticipant(userId, frame.chatId);
      if (!membership.ok) {
        logger.warn(`Dropped ${frame.type} from user ${userId}: ${describeServiceError(membership.error)}`);
        return "rejected";
      }
      if (!membership.value) {
        logger.warn(`Dropped ${frame.type} from user ${userId}: not a participant of chat ${frame.chatId}.`);
        return "unauthorized";
      }

      switch (frame.type) {
        case "chat_message": {
          const result = await chatService.sendMessage(userId, frame.chatId, {
            messageId: frame.messageId,
            content: frame.content
          });
          return settle(userId, frame, result, (value) => !value.created);
        }
        case "reaction": {
          const result = await chatService.addReaction(userId, frame.messageId, {
            reactionId: frame.reactionId,
            reactionCode: frame.reactionCode
          });
          return settle(userId, frame, result, (value) => !value.created);
        }
        case "remove_reaction":
          return settle(userId, frame, await chatService.removeReaction(userId, frame.messageId, frame.reactionCode));
        case "typing":
          return settle(userId, frame, await chatService.setTyping(userId, frame.chatId, frame.isTyping));
        case "read_receipt":
          return settle(userId, frame, await chatService.markRead(userId, frame.chatId, frame.messageId));
        default: {
          const unreachable: never = frame;
          throw new Error(`Unhandled inbound frame: ${JSON.stringify(unreachable)}`);
        }
      }
    }
  };
}
