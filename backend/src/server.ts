import http from "node:http";

import { WebSocketServer } from "ws";

import { resolveServerConfigFromEnv } from "./config";
import { createApp } from "./http/app";
import { createConsoleLogger, describeError } from "./logging";
import { createBroadcastEngine } from "./realtime/broadcastEngine";
import { createEventRouter } from "./realtime/eventRouter";
import { createPresenceRegistry } from "./realtime/presenceRegistry";
import { createWebsocketGateway } from "./realtime/websocketGateway";
import { createInMemoryChatStore } from "./repositories/inMemoryChatStore";
import { createInMemoryProfileDirectory } from "./repositories/inMemoryProfileDirectory";
import { createInMemoryPushTokenRepository } from "./repositories/inMemoryPushTokenRepository";
import { createPostgresChatStore } from "./repositories/postgresChatStore";
import { createPostgresPool, ensurePostgresSchema } from "./repositories/postgresCore";
import { createPostgresProfileDirectory } from "./repositories/postgresProfileDirectory";
import { createPostgresPushTokenRepository } from "./repositories/postgresPushTokenRepository";
import { createChatService } from "./services/chatService";
import { createChatNotifier } from "./services/notificationService";
import { createFcmPushTransport, initializeFirebaseMessaging } from "./services/push/fcmPushTransport";
import { createLoggingPushTransport } from "./services/push/loggingPushTransport";
import { createPushService } from "./services/pushService";
import { createTaskPool } from "./services/taskPool";

const logger = createConsoleLogger();

async function main(): Promise<void> {
  const config = resolveServerConfigFromEnv();

  if (config.requireDatabase && !config.postgres) {
    throw new Error("REQUIRE_DATABASE=true but no PostgreSQL URL was found. Set DATABASE_URL or NEON_DATABASE_URL.");
  }
  const postgresPool = config.postgres ? createPostgresPool(config.postgres) : null;
  if (postgresPool) {
    await ensurePostgresSchema(postgresPool);
    logger.info(`Persistence mode: PostgreSQL (${config.postgres?.sourceEnvKey})`);
  } else {
    logger.warn("Persistence mode: in-memory. Chats are lost on restart.");
  }

  const store = postgresPool ? createPostgresChatStore(postgresPool) : createInMemoryChatStore();
  const profiles = postgresPool ? createPostgresProfileDirectory(postgresPool) : createInMemoryProfileDirectory();
  const pushTokens = postgresPool ? createPostgresPushTokenRepository(postgresPool) : createInMemoryPushTokenRepository();

  const pushTransport = config.firebaseCredentialsPath
    ? createFcmPushTransport({ messaging: initializeFirebaseMessaging(config.firebaseCredentialsPath) })
    : createLoggingPushTransport(logger);
  if (!config.firebaseCredentialsPath) {
    logger.warn("Push not configured (FIREBASE_CREDENTIALS_FILE unset). Falling back to console output.");
  }
  const pushService = createPushService({ repo: pushTokens, transport: pushTransport, logger });
  const pushPool = createTaskPool({ ...config.push, logger });
  const notifier = createChatNotifier({ store, profiles, push: pushService, pool: pushPool, logger });

  const presence = createPresenceRegistry();
  const broadcaster = createBroadcastEngine({ store, presence, notifier, logger });
  const chatService = createChatService({ store, profiles, broadcaster, logger });
  const router = createEventRouter({ chatService, logger });

  const app = createApp({
    jwtSecret: config.jwtSecret,
    chatService,
    pushService,
    appVersion: config.appVersion,
    corsAllowedOrigins: config.corsAllowedOrigins,
    healthCheck: postgresPool
      ? async () => {
          await postgresPool.query("SELECT 1");
          return true;
        }
      : undefined,
    logger
  });

  const server = http.createServer(app);
  const wss = new WebSocketServer({ server, path: "/ws/chat" });
  const gateway = createWebsocketGateway({
    wss,
    jwtSecret: config.jwtSecret,
    presence,
    router,
    logger,
    maxIncomingPayloadBytes: config.websocket.maxIncomingPayloadBytes,
    heartbeatIntervalMs: config.websocket.heartbeatIntervalMs,
    sendTimeoutMs: config.websocket.sendTimeoutMs,
    maxBufferedBytes: config.websocket.maxBufferedBytes
  });

  server.listen(config.port, () => {
    logger.info(`Chat backend ${config.appVersion} listening on http://localhost:${config.port}`);
  });

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down.");
    await gateway.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await pushPool.idle();
    if (postgresPool) {
      await postgresPool.end();
    }
  };

  process.on("SIGINT", () => {
    void shutdown().finally(() => process.exit(0));
  });
  process.on("SIGTERM", () => {
    void shutdown().finally(() => process.exit(0));
  });
}

main().catch((e: unknown) => {
  logger.error(`Startup failed: ${describeError(e)}`);
  process.exit(1);
});
