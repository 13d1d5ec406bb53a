import type { UserId } from "./chatStore";

export type DisplayProfile = Readonly<{
  userId: UserId;
  displayName: string;
  avatarUrl: string | null;
}>;

export type ProfileDirectory = Readonly<{
  getDisplayProfile(userId: UserId): Promise<DisplayProfile | null>;
}>;
