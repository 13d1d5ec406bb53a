import express, { type Express, type NextFunction, type Request, type Response } from "express";

import { describeError, silentLogger, type Logger } from "../logging";
import type { ChatService } from "../services/chatService";
import type { PushService } from "../services/pushService";
import { createChatRoutes } from "./chatRoutes";
import { corsMiddleware, createOriginPolicy } from "./cors";
import { asyncRoute } from "./errors";
import { createPushRoutes } from "./pushRoutes";

export type AppDeps = Readonly<{
  jwtSecret: string;
  chatService: ChatService;
  pushService: Pick<PushService, "saveToken" | "deleteToken">;
  appVersion: string;
  corsAllowedOrigins?: string;
  /** Resolves false (or rejects) when a backing store cannot be reached. */
  healthCheck?: () => Promise<boolean>;
  logger?: Logger;
  nowMs?: () => number;
}>;

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger ?? silentLogger;
  const nowMs = deps.nowMs ?? (() => Date.now());

  const originPolicy = createOriginPolicy(deps.corsAllowedOrigins ?? "");
  if (originPolicy.rejected.length > 0) {
    logger.warn(`Ignoring unparseable CORS origins: ${originPolicy.rejected.join(", ")}`);
  }

  const app = express();
  app.disable("x-powered-by");
  app.use(corsMiddleware(originPolicy));
  app.use(express.json({ limit: "32kb" }));

  app.get(
    "/health",
    asyncRoute(async (_req, res) => {
      let healthy: boolean;
      try {
        healthy = deps.healthCheck ? await deps.healthCheck() : true;
      } catch (e: unknown) {
        logger.warn(`Health check failed: ${describeError(e)}`);
        healthy = false;
      }
      res.status(healthy ? 200 : 503).json({
        status: healthy ? "ok" : "unavailable",
        version: deps.appVersion,
        timestamp: new Date(nowMs()).toISOString()
      });
    })
  );

  app.use("/api", createChatRoutes({ jwtSecret: deps.jwtSecret, chatService: deps.chatService }));
  app.use("/api", createPushRoutes({ jwtSecret: deps.jwtSecret, pushService: deps.pushService }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ code: "NOT_FOUND", message: "Route not found." });
  });

  // Final error boundary.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (typeof error === "object" && error !== null && (error as Record<string, unknown>).type === "entity.parse.failed") {
      res.status(400).json({ code: "INVALID_INPUT", message: "Request body is not valid JSON." });
      return;
    }
    logger.error(`${req.method} ${req.path} failed: ${describeError(error)}`);
    res.status(500).json({ code: "INTERNAL_ERROR", message: "Internal error." });
  });

  return app;
}
