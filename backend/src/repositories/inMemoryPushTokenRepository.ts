import type { UserId } from "../services/chatStore";
import type { PushToken, PushTokenRepository } from "../services/pushService";

export function createInMemoryPushTokenRepository(initial: ReadonlyArray<PushToken> = []): PushTokenRepository {
  const byToken = new Map<string, PushToken>();
  for (const token of initial) byToken.set(token.token, token);

  return {
    async saveToken(token: PushToken): Promise<void> {
      byToken.set(token.token, token);
    },

    async listTokens(userId: UserId): Promise<ReadonlyArray<PushToken>> {
      return Array.from(byToken.values()).filter((t) => t.userId === userId);
    },

    async deleteToken(token: string, userId?: UserId): Promise<boolean> {
      const existing = byToken.get(token);
      if (!existing) return false;
      if (userId !== undefined && existing.userId !== userId) return false;
      return byToken.delete(token);
    }
  };
}
