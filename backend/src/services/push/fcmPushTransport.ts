import * as admin from "firebase-admin";

import { describeError } from "../../logging";
import type { PushPayload, PushSendOutcome, PushToken, PushTransport } from "../pushService";

// Codes after which a token will never succeed again and should be forgotten.
const PERMANENT_ERROR_CODES: ReadonlySet<string> = new Set([
  "messaging/registration-token-not-registered",
  "messaging/invalid-registration-token"
]);

export type FcmPushTransportDeps = Readonly<{
  messaging: Pick<admin.messaging.Messaging, "send">;
}>;

function errorCode(e: unknown): string | null {
  if (typeof e !== "object" || e === null) return null;
  const code = (e as Record<string, unknown>).code;
  return typeof code === "string" ? code : null;
}

export function buildFcmMessage(token: PushToken, payload: PushPayload): admin.messaging.Message {
  const message: admin.messaging.TokenMessage = {
    token: token.token,
    notification: {
      title: payload.title,
      body: payload.body,
      ...(payload.imageUrl ? { imageUrl: payload.imageUrl } : {})
    },
    android: {
      notification: { sound: payload.sound }
    },
    apns: {
      payload: {
        aps: { sound: payload.sound, badge: payload.badge }
      }
    }
  };
  return payload.data ? { ...message, data: { ...payload.data } } : message;
}

export function initializeFirebaseMessaging(credentialsPath: string): admin.messaging.Messaging {
  const app = admin.initializeApp({ credential: admin.credential.cert(credentialsPath) });
  return app.messaging();
}

export function createFcmPushTransport(deps: FcmPushTransportDeps): PushTransport {
  return {
    name: "fcm",
    async send(token: PushToken, payload: PushPayload, signal: AbortSignal): Promise<PushSendOutcome> {
      if (signal.aborted) return { ok: false, permanent: false, reason: "cancelled" };
      try {
        await deps.messaging.send(buildFcmMessage(token, payload));
        return { ok: true };
      } catch (e: unknown) {
        const code = errorCode(e);
        return {
          ok: false,
          permanent: code !== null && PERMANENT_ERROR_CODES.has(code),
          reason: code ? `${code}: ${describeError(e)}` : describeError(e)
        };
      }
    }
  };
}
