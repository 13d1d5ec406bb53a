import { randomUUID } from "node:crypto";

import { isChatStoreError, type ChatStore, type UserId } from "./chatStore";

export class SelfDirectChatError extends Error {
  readonly userId: UserId;

  constructor(userId: UserId) {
    super(`User ${userId} cannot open a direct chat with themselves.`);
    this.name = "SelfDirectChatError";
    this.userId = userId;
  }
}

export type DirectChatResolverDeps = Readonly<{
  store: Pick<ChatStore, "findDirectChat" | "createDirectChat">;
  idGenerator?: () => string;
  nowMs?: () => number;
  maxAttempts?: number;
}>;

export type DirectChatResolver = Readonly<{
  /** Commutative and idempotent: both orderings of a pair resolve to one chat id. */
  getOrCreate(a: UserId, b: UserId): Promise<string>;
}>;

const DEFAULT_MAX_ATTEMPTS = 3;

export function createDirectChatResolver(deps: DirectChatResolverDeps): DirectChatResolver {
  const idGenerator = deps.idGenerator ?? (() => randomUUID());
  const nowMs = deps.nowMs ?? (() => Date.now());
  const maxAttempts = deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  if (!Number.isInteger(maxAttempts) || maxAttempts <= 0) {
    throw new Error("directChatResolver requires a positive maxAttempts.");
  }

  return {
    async getOrCreate(a: UserId, b: UserId): Promise<string> {
      if (a === b) throw new SelfDirectChatError(a);

      for (let attempt = 1; ; attempt += 1) {
        const existing = await deps.store.findDirectChat(a, b);
        if (existing) return existing;

        try {
          const created = await deps.store.createDirectChat(idGenerator(), a, b, nowMs());
          return created.chatId;
        } catch (e: unknown) {
          // Lost a race for the pair (or drew a taken id); the next lookup settles it.
          if (!isChatStoreError(e, "ALREADY_EXISTS") || attempt >= maxAttempts) throw e;
        }
      }
    }
  };
}
