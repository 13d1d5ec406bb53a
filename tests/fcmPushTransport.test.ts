import type * as admin from "firebase-admin";

import { buildFcmMessage, createFcmPushTransport } from "../backend/src/services/push/fcmPushTransport";
import type { PushPayload, PushToken } from "../backend/src/services/pushService";

const TOKEN: PushToken = { userId: 5, token: "fcm-token", platform: "ios", deviceId: null, lastSeenAtMs: 0 };

const PAYLOAD: PushPayload = {
  title: "Sam in Climbing",
  body: "see you at six",
  sound: "default",
  badge: 1,
  data: { type: "chat_message", chat_id: "c1", message_id: "m1" }
};

function fakeMessaging(failWith?: unknown): { sent: admin.messaging.Message[]; send(message: admin.messaging.Message): Promise<string> } {
  const sent: admin.messaging.Message[] = [];
  return {
    sent,
    async send(message: admin.messaging.Message): Promise<string> {
      sent.push(message);
      if (failWith !== undefined) throw failWith;
      return "projects/test/messages/1";
    }
  };
}

describe("fcmPushTransport", () => {
  it("Given a payload with data When building the message Then notification, data and platform sound fields are set", () => {
    expect(buildFcmMessage(TOKEN, PAYLOAD)).toEqual({
      token: "fcm-token",
      notification: { title: "Sam in Climbing", body: "see you at six" },
      android: { notification: { sound: "default" } },
      apns: { payload: { aps: { sound: "default", badge: 1 } } },
      data: { type: "chat_message", chat_id: "c1", message_id: "m1" }
    });
  });

  it("Given an image url When building the message Then it is carried on the notification", () => {
    const message = buildFcmMessage(TOKEN, { ...PAYLOAD, imageUrl: "https://cdn.example.test/a.png" });

    expect(message.notification).toEqual({
      title: "Sam in Climbing",
      body: "see you at six",
      imageUrl: "https://cdn.example.test/a.png"
    });
  });

  it("Given a successful send When the transport sends Then it reports ok", async () => {
    const messaging = fakeMessaging();
    const transport = createFcmPushTransport({ messaging });

    const outcome = await transport.send(TOKEN, PAYLOAD, new AbortController().signal);

    expect(outcome).toEqual({ ok: true });
    expect(messaging.sent).toHaveLength(1);
  });

  it("Given an unregistered token error When the transport sends Then the failure is permanent", async () => {
    const failure = Object.assign(new Error("Requested entity was not found."), {
      code: "messaging/registration-token-not-registered"
    });
    const transport = createFcmPushTransport({ messaging: fakeMessaging(failure) });

    const outcome = await transport.send(TOKEN, PAYLOAD, new AbortController().signal);

    expect(outcome).toEqual({
      ok: false,
      permanent: true,
      reason: "messaging/registration-token-not-registered: Requested entity was not found."
    });
  });

  it("Given a transient error When the transport sends Then the failure is not permanent", async () => {
    const failure = Object.assign(new Error("Service unavailable"), { code: "messaging/server-unavailable" });
    const transport = createFcmPushTransport({ messaging: fakeMessaging(failure) });

    const outcome = await transport.send(TOKEN, PAYLOAD, new AbortController().signal);

    expect(outcome).toEqual({ ok: false, permanent: false, reason: "messaging/server-unavailable: Service unavailable" });
  });

  it("Given an invalid-argument error about the payload When the transport sends Then the token is not treated as dead", async () => {
    const failure = Object.assign(new Error("notification.image is not a valid URL"), { code: "messaging/invalid-argument" });
    const transport = createFcmPushTransport({ messaging: fakeMessaging(failure) });

    const outcome = await transport.send(TOKEN, { ...PAYLOAD, imageUrl: "not a url" }, new AbortController().signal);

    expect(outcome).toEqual({
      ok: false,
      permanent: false,
      reason: "messaging/invalid-argument: notification.image is not a valid URL"
    });
  });

  it("Given an aborted signal When the transport sends Then nothing reaches FCM", async () => {
    const messaging = fakeMessaging();
    const transport = createFcmPushTransport({ messaging });
    const controller = new AbortController();
    controller.abort();

    const outcome = await transport.send(TOKEN, PAYLOAD, controller.signal);

    expect(outcome).toEqual({ ok: false, permanent: false, reason: "cancelled" });
    expect(messaging.sent).toEqual([]);
  });
});
