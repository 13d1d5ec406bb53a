import { describeError, silentLogger, type Logger } from "../logging";
import type { UserId } from "./chatStore";

export type PushPlatform = "ios" | "android";

export type PushToken = Readonly<{
  userId: UserId;
  token: string;
  platform: PushPlatform;
  deviceId: string | null;
  lastSeenAtMs: number;
}>;

export type PushPayload = Readonly<{
  title: string;
  body: string;
  sound: string;
  badge: number;
  imageUrl?: string;
  data?: Readonly<Record<string, string>>;
}>;

export type PushSendOutcome = Readonly<{ ok: true }> | Readonly<{ ok: false; permanent: boolean; reason: string }>;

export type PushTransport = Readonly<{
  name: string;
  send(token: PushToken, payload: PushPayload, signal: AbortSignal): Promise<PushSendOutcome>;
}>;

export type PushTokenRepository = Readonly<{
  /** Upsert by token; a token registered again moves to the new owner. */
  saveToken(token: PushToken): Promise<void>;
  listTokens(userId: UserId): Promise<ReadonlyArray<PushToken>>;
  /** With a userId, only a token owned by that user is removed. */
  deleteToken(token: string, userId?: UserId): Promise<boolean>;
}>;

export type PushTokenResult = Readonly<{
  token: string;
  ok: boolean;
  permanent?: boolean;
  reason?: string;
}>;

export type PushDeliveryReport = Readonly<{
  userId: UserId;
  results: ReadonlyArray<PushTokenResult>;
}>;

export type PushSender = Readonly<{
  sendNotification(signal: AbortSignal, userId: UserId, payload: PushPayload): Promise<PushDeliveryReport>;
}>;

export type PushDeliveryFailure = "NO_TOKENS" | "ALL_FAILED" | "ABORTED";

export class PushDeliveryError extends Error {
  readonly userId: UserId;
  readonly failure: PushDeliveryFailure;

  constructor(userId: UserId, failure: PushDeliveryFailure, message: string) {
    super(message);
    this.name = "PushDeliveryError";
    this.userId = userId;
    this.failure = failure;
  }
}

export type ErrorCode = "INVALID_INPUT" | "TOKEN_NOT_FOUND";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type SaveTokenInput = Readonly<{
  token: unknown;
  platform: unknown;
  deviceId?: unknown;
}>;

export type PushServiceDeps = Readonly<{
  repo: PushTokenRepository;
  transport: PushTransport;
  logger?: Logger;
  nowMs?: () => number;
}>;

export type PushService = PushSender &
  Readonly<{
    saveToken(userId: UserId, input: SaveTokenInput): Promise<Result<PushToken>>;
    deleteToken(userId: UserId, token: unknown): Promise<Result<{ token: string }>>;
  }>;

const MAX_TOKEN_LENGTH = 4096;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function isPlatform(value: unknown): value is PushPlatform {
  return value === "ios" || value === "android";
}

export function createPushService(deps: PushServiceDeps): PushService {
  const logger = deps.logger ?? silentLogger;
  const nowMs = deps.nowMs ?? (() => Date.now());

  async function sendToToken(token: PushToken, payload: PushPayload, signal: AbortSignal): Promise<PushTokenResult> {
    let outcome: PushSendOutcome;
    try {
      outcome = await deps.transport.send(token, payload, signal);
    } catch (e: unknown) {
      outcome = { ok: false, permanent: false, reason: describeError(e) };
    }
    if (outcome.ok) return { token: token.token, ok: true };

    if (outcome.permanent) {
      try {
        await deps.repo.deleteToken(token.token);
        logger.info(`Removed invalid ${token.platform} push token for user ${token.userId}: ${outcome.reason}`);
      } catch (e: unknown) {
        logger.error(`Failed to remove invalid push token for user ${token.userId}: ${describeError(e)}`);
      }
    }
    return { token: token.token, ok: false, permanent: outcome.permanent, reason: outcome.reason };
  }

  return {
    async saveToken(userId: UserId, input: SaveTokenInput): Promise<Result<PushToken>> {
      if (!isNonEmptyString(input.token) || input.token.length > MAX_TOKEN_LENGTH) {
        return err("INVALID_INPUT", "token is required.");
      }
      if (!isPlatform(input.platform)) {
        return err("INVALID_INPUT", "platform must be ios or android.", { platform: input.platform });
      }
      const deviceId = isNonEmptyString(input.deviceId) ? input.deviceId.trim() : null;
      const token: PushToken = {
        userId,
        token: input.token.trim(),
        platform: input.platform,
        deviceId,
        lastSeenAtMs: nowMs()
      };
      await deps.repo.saveToken(token);
      return ok(token);
    },

    async deleteToken(userId: UserId, token: unknown): Promise<Result<{ token: string }>> {
      if (!isNonEmptyString(token)) return err("INVALID_INPUT", "token is required.");
      const removed = await deps.repo.deleteToken(token.trim(), userId);
      if (!removed) return err("TOKEN_NOT_FOUND", "Push token not found.");
      return ok({ token: token.trim() });
    },

    async sendNotification(signal: AbortSignal, userId: UserId, payload: PushPayload): Promise<PushDeliveryReport> {
      if (signal.aborted) {
        throw new PushDeliveryError(userId, "ABORTED", `Push delivery to user ${userId} was cancelled.`);
      }
      const tokens = await deps.repo.listTokens(userId);
      if (tokens.length === 0) {
        throw new PushDeliveryError(userId, "NO_TOKENS", `No push tokens registered for user ${userId}.`);
      }

      const results = await Promise.all(tokens.map((token) => sendToToken(token, payload, signal)));
      if (results.every((r) => !r.ok)) {
        const reasons = results.map((r) => r.reason ?? "unknown").join("; ");
        throw new PushDeliveryError(userId, "ALL_FAILED", `All push deliveries to user ${userId} failed: ${reasons}`);
      }
      return { userId, results };
    }
  };
}
