import type { Pool } from "pg";

import type { UserId } from "../services/chatStore";
import type { DisplayProfile, ProfileDirectory } from "../services/profileDirectory";

function toDisplayProfile(row: Record<string, unknown>): DisplayProfile {
  return {
    userId: Number(row.user_id),
    displayName: String(row.display_name),
    avatarUrl: typeof row.avatar_url === "string" && row.avatar_url.trim() !== "" ? row.avatar_url : null
  };
}

export function createPostgresProfileDirectory(pool: Pool): ProfileDirectory {
  return {
    async getDisplayProfile(userId: UserId): Promise<DisplayProfile | null> {
      const res = await pool.query("SELECT user_id, display_name, avatar_url FROM profiles WHERE user_id = $1", [userId]);
      if (res.rowCount !== 1) return null;
      return toDisplayProfile(res.rows[0]);
    }
  };
}
