import type { UserId } from "../services/chatStore";
import type { OutboundFrame } from "./frames";

export type PresenceConnection = Readonly<{
  id: string;
  userId: UserId;
  /** Rejects when the frame could not be handed to the transport in time. */
  send(frame: OutboundFrame): Promise<void>;
  close(): void;
}>;

/**
 * In-process map of online users to their single live connection.
 * Registering again replaces the previous binding (last writer wins) without
 * closing it; the superseded session keeps running until its socket ends.
 */
export type PresenceRegistry = Readonly<{
  /** Returns the connection that was replaced, if any. */
  register(userId: UserId, connection: PresenceConnection): PresenceConnection | undefined;
  /**
   * Idempotent. When `connection` is given the entry is removed only if it is
   * still the one bound to `userId`.
   */
  unregister(userId: UserId, connection?: PresenceConnection): boolean;
  lookup(userId: UserId): PresenceConnection | undefined;
  snapshot(): ReadonlySet<UserId>;
  size(): number;
}>;

export function createPresenceRegistry(): PresenceRegistry {
  const byUserId = new Map<UserId, PresenceConnection>();

  return {
    register(userId: UserId, connection: PresenceConnection): PresenceConnection | undefined {
      const previous = byUserId.get(userId);
      byUserId.set(userId, connection);
      return previous === connection ? undefined : previous;
    },

    unregister(userId: UserId, connection?: PresenceConnection): boolean {
      const current = byUserId.get(userId);
      if (!current) return false;
      if (connection && current !== connection) return false;
      return byUserId.delete(userId);
    },

    lookup(userId: UserId): PresenceConnection | undefined {
      return byUserId.get(userId);
    },

    snapshot(): ReadonlySet<UserId> {
      return new Set(byUserId.keys());
    },

    size(): number {
      return byUserId.size;
    }
  };
}
