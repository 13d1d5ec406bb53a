import type { Logger } from "../../logging";
import type { PushPayload, PushSendOutcome, PushToken, PushTransport } from "../pushService";

export function createLoggingPushTransport(logger: Logger): PushTransport {
  return {
    name: "log",
    async send(token: PushToken, payload: PushPayload): Promise<PushSendOutcome> {
      logger.info(`Push to user ${token.userId} (${token.platform}): ${payload.title}: ${payload.body}`);
      return { ok: true };
    }
  };
}
