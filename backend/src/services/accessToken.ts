import jwt from "jsonwebtoken";

import type { UserId } from "./chatStore";

/**
 * Verifies an HS256 bearer token issued by the auth service and returns the
 * user id it names, either as a numeric `user_id` claim or a numeric `sub`.
 */
export function verifyAccessToken(jwtSecret: string, token: string): UserId | null {
  try {
    const decoded = jwt.verify(token, jwtSecret, { algorithms: ["HS256"] });
    if (typeof decoded !== "object" || decoded === null) return null;
    const payload = decoded as Record<string, unknown>;
    const claim =
      typeof payload.user_id === "number"
        ? payload.user_id
        : typeof payload.sub === "string" && /^\d+$/.test(payload.sub)
          ? Number(payload.sub)
          : null;
    return claim !== null && Number.isSafeInteger(claim) && claim > 0 ? claim : null;
  } catch {
    return null;
  }
}

export function bearerToken(header: string | undefined): string | null {
  if (typeof header !== "string") return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  if (!match) return null;
  const token = match[1].trim();
  return token === "" ? null : token;
}
