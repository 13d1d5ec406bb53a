import type { ReactionCatalogEntry } from "./chatStore";

export const DEFAULT_REACTION_CATALOG: ReadonlyArray<ReactionCatalogEntry> = [
  { reactionCode: "like", emoji: "👍" },
  { reactionCode: "laugh", emoji: "😂" },
  { reactionCode: "clap", emoji: "👏" },
  { reactionCode: "heart", emoji: "❤️" },
  { reactionCode: "wow", emoji: "😮" }
];
