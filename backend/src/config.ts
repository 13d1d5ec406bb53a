import { resolvePostgresSettingsFromEnv, type PostgresSettings } from "./repositories/postgresCore";

export type PushSettings = Readonly<{
  concurrency: number;
  maxQueued: number;
  timeoutMs: number;
}>;

export type WebsocketSettings = Readonly<{
  maxIncomingPayloadBytes: number;
  heartbeatIntervalMs: number;
  sendTimeoutMs: number;
  maxBufferedBytes: number;
}>;

export type ServerConfig = Readonly<{
  port: number;
  jwtSecret: string;
  appVersion: string;
  requireDatabase: boolean;
  postgres: PostgresSettings | null;
  firebaseCredentialsPath: string | null;
  corsAllowedOrigins: string;
  push: PushSettings;
  websocket: WebsocketSettings;
}>;

const DEFAULT_PORT = 8080;
const DEFAULT_CORS_ALLOWED_ORIGINS = "http://localhost,http://127.0.0.1";

export const DEFAULT_PUSH_SETTINGS: PushSettings = {
  concurrency: 8,
  maxQueued: 1_000,
  timeoutMs: 5_000
};

export const DEFAULT_WEBSOCKET_SETTINGS: WebsocketSettings = {
  maxIncomingPayloadBytes: 16 * 1024,
  heartbeatIntervalMs: 30_000,
  sendTimeoutMs: 5_000,
  maxBufferedBytes: 1024 * 1024
};

function positiveInt(raw: string | undefined, fallback: number): number {
  if (typeof raw !== "string" || raw.trim() === "") return fallback;
  const n = Number(raw.trim());
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function nonEmpty(raw: string | undefined): string | null {
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim();
  return trimmed === "" ? null : trimmed;
}

export function resolveServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const jwtSecret = nonEmpty(env.JWT_SECRET);
  if (!jwtSecret) {
    throw new Error("Missing JWT_SECRET environment variable.");
  }

  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    jwtSecret,
    appVersion: nonEmpty(env.APP_VERSION) ?? "dev",
    requireDatabase: env.REQUIRE_DATABASE === "true",
    postgres: resolvePostgresSettingsFromEnv(env),
    firebaseCredentialsPath: nonEmpty(env.FIREBASE_CREDENTIALS_FILE),
    corsAllowedOrigins: nonEmpty(env.CORS_ALLOWED_ORIGINS) ?? DEFAULT_CORS_ALLOWED_ORIGINS,
    push: {
      concurrency: positiveInt(env.PUSH_CONCURRENCY, DEFAULT_PUSH_SETTINGS.concurrency),
      maxQueued: positiveInt(env.PUSH_QUEUE_LIMIT, DEFAULT_PUSH_SETTINGS.maxQueued),
      timeoutMs: positiveInt(env.PUSH_TIMEOUT_MS, DEFAULT_PUSH_SETTINGS.timeoutMs)
    },
    websocket: {
      maxIncomingPayloadBytes: positiveInt(env.WS_MAX_PAYLOAD_BYTES, DEFAULT_WEBSOCKET_SETTINGS.maxIncomingPayloadBytes),
      heartbeatIntervalMs: positiveInt(env.WS_HEARTBEAT_INTERVAL_MS, DEFAULT_WEBSOCKET_SETTINGS.heartbeatIntervalMs),
      sendTimeoutMs: positiveInt(env.WS_SEND_TIMEOUT_MS, DEFAULT_WEBSOCKET_SETTINGS.sendTimeoutMs),
      maxBufferedBytes: positiveInt(env.WS_MAX_BUFFERED_BYTES, DEFAULT_WEBSOCKET_SETTINGS.maxBufferedBytes)
    }
  };
}
