import { Router } from "express";

import type { PushService } from "../services/pushService";
import { authenticateRequest } from "./auth";
import { asyncRoute, sendError } from "./errors";
import { bodyOf } from "./request";

export type PushRoutesDeps = Readonly<{
  jwtSecret: string;
  pushService: Pick<PushService, "saveToken" | "deleteToken">;
}>;

export function createPushRoutes(deps: PushRoutesDeps): Router {
  const router = Router();

  router.post(
    "/push/register",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, deps.jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const body = bodyOf(req);
      const result = await deps.pushService.saveToken(auth.value, {
        token: body.token,
        platform: body.platform,
        deviceId: body.device_id
      });
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ status: "success" });
    })
  );

  router.delete(
    "/push/unregister",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, deps.jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await deps.pushService.deleteToken(auth.value, bodyOf(req).token);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ status: "success" });
    })
  );

  return router;
}
