import type { Pool } from "pg";

import type { UserId } from "../services/chatStore";
import type { PushToken, PushTokenRepository } from "../services/pushService";

function toPushToken(row: Record<string, unknown>): PushToken | null {
  const platform = row.platform;
  if (platform !== "ios" && platform !== "android") return null;
  return {
    userId: Number(row.user_id),
    token: String(row.token),
    platform,
    deviceId: typeof row.device_id === "string" ? row.device_id : null,
    lastSeenAtMs: Number(row.last_seen_at_ms)
  };
}

export function createPostgresPushTokenRepository(pool: Pool): PushTokenRepository {
  return {
    async saveToken(token: PushToken): Promise<void> {
      await pool.query(
        `INSERT INTO push_tokens (token, user_id, platform, device_id, last_seen_at_ms)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (token) DO UPDATE SET
           user_id = EXCLUDED.user_id,
           platform = EXCLUDED.platform,
           device_id = EXCLUDED.device_id,
           last_seen_at_ms = EXCLUDED.last_seen_at_ms`,
        [token.token, token.userId, token.platform, token.deviceId, token.lastSeenAtMs]
      );
    },

    async listTokens(userId: UserId): Promise<ReadonlyArray<PushToken>> {
      const res = await pool.query(
        "SELECT token, user_id, platform, device_id, last_seen_at_ms FROM push_tokens WHERE user_id = $1",
        [userId]
      );
      const tokens: PushToken[] = [];
      for (const row of res.rows) {
        const token = toPushToken(row);
        if (token) tokens.push(token);
      }
      return tokens;
    },

    async deleteToken(token: string, userId?: UserId): Promise<boolean> {
      const res =
        userId === undefined
          ? await pool.query("DELETE FROM push_tokens WHERE token = $1", [token])
          : await pool.query("DELETE FROM push_tokens WHERE token = $1 AND user_id = $2", [token, userId]);
      return (res.rowCount ?? 0) > 0;
    }
  };
}
