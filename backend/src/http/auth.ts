import type { Request } from "express";

import { bearerToken, verifyAccessToken } from "../services/accessToken";
import type { UserId } from "../services/chatStore";
import type { HttpError } from "./errors";

export type AuthResult = { ok: true; value: UserId } | { ok: false; error: HttpError };

export function authenticateRequest(req: Request, jwtSecret: string): AuthResult {
  const token = bearerToken(req.header("authorization"));
  const userId = token ? verifyAccessToken(jwtSecret, token) : null;
  if (userId === null) {
    return { ok: false, error: { code: "INVALID_SESSION", message: "Missing or invalid bearer token." } };
  }
  return { ok: true, value: userId };
}
