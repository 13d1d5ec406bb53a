import type { UserId } from "../services/chatStore";
import type { DisplayProfile, ProfileDirectory } from "../services/profileDirectory";

export type InMemoryProfileDirectory = ProfileDirectory &
  Readonly<{
    upsert(profile: DisplayProfile): void;
  }>;

export function createInMemoryProfileDirectory(profiles: ReadonlyArray<DisplayProfile> = []): InMemoryProfileDirectory {
  const byUserId = new Map<UserId, DisplayProfile>();
  for (const profile of profiles) byUserId.set(profile.userId, profile);

  return {
    async getDisplayProfile(userId: UserId): Promise<DisplayProfile | null> {
      return byUserId.get(userId) ?? null;
    },
    upsert(profile: DisplayProfile): void {
      byUserId.set(profile.userId, profile);
    }
  };
}
