import { createInMemoryPushTokenRepository } from "../backend/src/repositories/inMemoryPushTokenRepository";
import {
  createPushService,
  PushDeliveryError,
  type PushPayload,
  type PushSendOutcome,
  type PushToken,
  type PushTransport
} from "../backend/src/services/pushService";
import { createFcmPushTransport } from "../backend/src/services/push/fcmPushTransport";

const PAYLOAD: PushPayload = { title: "Alex", body: "hi", sound: "default", badge: 1 };

function token(userId: number, value: string, platform: "ios" | "android" = "ios"): PushToken {
  return { userId, token: value, platform, deviceId: null, lastSeenAtMs: 0 };
}

function scriptedTransport(outcomes: Record<string, PushSendOutcome | Error>): PushTransport & { sent: string[] } {
  const sent: string[] = [];
  return {
    name: "scripted",
    sent,
    async send(t: PushToken): Promise<PushSendOutcome> {
      sent.push(t.token);
      const outcome = outcomes[t.token] ?? { ok: true };
      if (outcome instanceof Error) throw outcome;
      return outcome;
    }
  };
}

async function expectDeliveryFailure(promise: Promise<unknown>, failure: PushDeliveryError["failure"]): Promise<PushDeliveryError> {
  try {
    await promise;
  } catch (e: unknown) {
    if (!(e instanceof PushDeliveryError)) throw e;
    expect(e.failure).toBe(failure);
    return e;
  }
  throw new Error("expected a PushDeliveryError");
}

describe("pushService", () => {
  it("Given a valid registration When saveToken is called Then the token is stored for the caller", async () => {
    const repo = createInMemoryPushTokenRepository();
    const service = createPushService({ repo, transport: scriptedTransport({}), nowMs: () => 42 });

    const result = await service.saveToken(7, { token: "  device-token-a ", platform: "android", deviceId: "pixel" });
    if (!result.ok) throw new Error("unreachable");

    expect(result.value).toEqual({ userId: 7, token: "device-token-a", platform: "android", deviceId: "pixel", lastSeenAtMs: 42 });
    expect(await repo.listTokens(7)).toEqual([result.value]);
  });

  it("Given an unknown platform When saveToken is called Then INVALID_INPUT is returned", async () => {
    const service = createPushService({ repo: createInMemoryPushTokenRepository(), transport: scriptedTransport({}) });

    const result = await service.saveToken(7, { token: "t", platform: "web" });

    expect(result).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "platform must be ios or android.", context: { platform: "web" } }
    });
  });

  it("Given a token owned by someone else When deleteToken is called Then TOKEN_NOT_FOUND is returned and the token stays", async () => {
    const repo = createInMemoryPushTokenRepository([token(1, "owned-by-1")]);
    const service = createPushService({ repo, transport: scriptedTransport({}) });

    const result = await service.deleteToken(2, "owned-by-1");

    expect(result.ok).toBe(false);
    if (result.ok) throw new Error("unreachable");
    expect(result.error.code).toBe("TOKEN_NOT_FOUND");
    expect(await repo.listTokens(1)).toHaveLength(1);
  });

  it("Given a user without tokens When sendNotification is called Then it fails with NO_TOKENS", async () => {
    const service = createPushService({ repo: createInMemoryPushTokenRepository(), transport: scriptedTransport({}) });

    const error = await expectDeliveryFailure(service.sendNotification(new AbortController().signal, 3, PAYLOAD), "NO_TOKENS");

    expect(error.userId).toBe(3);
  });

  it("Given an aborted signal When sendNotification is called Then nothing is sent", async () => {
    const transport = scriptedTransport({});
    const service = createPushService({ repo: createInMemoryPushTokenRepository([token(3, "a")]), transport });
    const controller = new AbortController();
    controller.abort();

    await expectDeliveryFailure(service.sendNotification(controller.signal, 3, PAYLOAD), "ABORTED");

    expect(transport.sent).toEqual([]);
  });

  it("Given one permanent failure among two tokens When sending Then the bad token is removed and the report lists both", async () => {
    const repo = createInMemoryPushTokenRepository([token(3, "good"), token(3, "stale", "android")]);
    const transport = scriptedTransport({ stale: { ok: false, permanent: true, reason: "not registered" } });
    const service = createPushService({ repo, transport });

    const report = await service.sendNotification(new AbortController().signal, 3, PAYLOAD);

    expect(report).toEqual({
      userId: 3,
      results: [
        { token: "good", ok: true },
        { token: "stale", ok: false, permanent: true, reason: "not registered" }
      ]
    });
    expect((await repo.listTokens(3)).map((t) => t.token)).toEqual(["good"]);
  });

  it("Given every token failing When sending Then ALL_FAILED carries each reason and transient tokens are kept", async () => {
    const repo = createInMemoryPushTokenRepository([token(3, "a"), token(3, "b")]);
    const transport = scriptedTransport({
      a: new Error("socket hang up"),
      b: { ok: false, permanent: false, reason: "unavailable" }
    });
    const service = createPushService({ repo, transport });

    const error = await expectDeliveryFailure(service.sendNotification(new AbortController().signal, 3, PAYLOAD), "ALL_FAILED");

    expect(error.message).toBe("All push deliveries to user 3 failed: socket hang up; unavailable");
    expect(await repo.listTokens(3)).toHaveLength(2);
  });

  it("Given FCM rejects the payload as an invalid argument When sending Then delivery fails and the valid token is kept", async () => {
    const repo = createInMemoryPushTokenRepository([token(3, "valid")]);
    const failure = Object.assign(new Error("notification.image is not a valid URL"), { code: "messaging/invalid-argument" });
    const messaging = {
      async send(): Promise<string> {
        throw failure;
      }
    };
    const service = createPushService({ repo, transport: createFcmPushTransport({ messaging }) });

    const error = await expectDeliveryFailure(
      service.sendNotification(new AbortController().signal, 3, { ...PAYLOAD, imageUrl: "not a url" }),
      "ALL_FAILED"
    );

    expect(error.message).toBe(
      "All push deliveries to user 3 failed: messaging/invalid-argument: notification.image is not a valid URL"
    );
    expect(await repo.listTokens(3)).toEqual([token(3, "valid")]);
  });
});
