import { Pool, type PoolConfig } from "pg";

import { DEFAULT_REACTION_CATALOG } from "../services/reactionCatalog";

export type PostgresSettings = Readonly<{
  connectionString: string;
  ssl?: boolean;
  /** Verify the server certificate when ssl is on; off only for self-signed hosts. */
  rejectUnauthorized?: boolean;
  sourceEnvKey: "DATABASE_URL" | "NEON_DATABASE_URL";
}>;

function asBoolean(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().toLowerCase() === "true";
}

export function resolvePostgresSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): PostgresSettings | null {
  const dbUrl = env.DATABASE_URL;
  const neonDbUrl = env.NEON_DATABASE_URL;
  const connectionString =
    typeof dbUrl === "string" && dbUrl.trim() !== ""
      ? dbUrl.trim()
      : typeof neonDbUrl === "string" && neonDbUrl.trim() !== ""
        ? neonDbUrl.trim()
        : "";
  if (typeof connectionString !== "string" || connectionString.trim() === "") {
    return null;
  }
  return {
    connectionString,
    ssl: asBoolean(env.DATABASE_SSL),
    rejectUnauthorized: env.DATABASE_SSL_REJECT_UNAUTHORIZED?.trim().toLowerCase() !== "false",
    sourceEnvKey: typeof dbUrl === "string" && dbUrl.trim() !== "" ? "DATABASE_URL" : "NEON_DATABASE_URL"
  };
}

export function postgresPoolConfig(settings: PostgresSettings): PoolConfig {
  return {
    connectionString: settings.connectionString,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    ssl: settings.ssl === true ? { rejectUnauthorized: settings.rejectUnauthorized !== false } : undefined
  };
}

export function createPostgresPool(settings: PostgresSettings): Pool {
  return new Pool(postgresPoolConfig(settings));
}

export async function ensurePostgresSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS profiles (
      user_id BIGINT PRIMARY KEY,
      display_name TEXT NOT NULL,
      avatar_url TEXT,
      updated_at_ms BIGINT NOT NULL
    )
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS chats (
      chat_id TEXT PRIMARY KEY,
      chat_name TEXT,
      is_group BOOLEAN NOT NULL DEFAULT true,
      direct_key TEXT UNIQUE,
      created_at_ms BIGINT NOT NULL,
      CHECK (is_group OR direct_key IS NOT NULL)
    )
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS chat_participants (
      chat_id TEXT NOT NULL REFERENCES chats(chat_id) ON DELETE CASCADE,
      user_id BIGINT NOT NULL,
      joined_at_ms BIGINT NOT NULL,
      PRIMARY KEY (chat_id, user_id)
    )
  `);
  await pool.query("CREATE INDEX IF NOT EXISTS idx_chat_participants_user_id ON chat_participants(user_id)");

  await pool.query(`
    CREATE TABLE IF NOT EXISTS messages (
      message_id TEXT PRIMARY KEY,
      chat_id TEXT NOT NULL REFERENCES chats(chat_id) ON DELETE CASCADE,
      sender_id BIGINT NOT NULL,
      content TEXT NOT NULL CHECK (length(content) > 0),
      sent_at_ms BIGINT NOT NULL,
      seq BIGSERIAL NOT NULL
    )
  `);
  await pool.query("CREATE INDEX IF NOT EXISTS idx_messages_chat_id_seq ON messages(chat_id, seq DESC)");

  await pool.query(`
    CREATE TABLE IF NOT EXISTS reaction_catalog (
      reaction_code TEXT PRIMARY KEY,
      emoji TEXT NOT NULL
    )
  `);
  for (const entry of DEFAULT_REACTION_CATALOG) {
    await pool.query(
      "INSERT INTO reaction_catalog (reaction_code, emoji) VALUES ($1, $2) ON CONFLICT (reaction_code) DO NOTHING",
      [entry.reactionCode, entry.emoji]
    );
  }

  await pool.query(`
    CREATE TABLE IF NOT EXISTS message_reactions (
      reaction_id TEXT PRIMARY KEY,
      message_id TEXT NOT NULL REFERENCES messages(message_id) ON DELETE CASCADE,
      user_id BIGINT NOT NULL,
      reaction_code TEXT NOT NULL REFERENCES reaction_catalog(reaction_code),
      reacted_at_ms BIGINT NOT NULL
    )
  `);
  await pool.query(
    "CREATE INDEX IF NOT EXISTS idx_message_reactions_lookup ON message_reactions(message_id, user_id, reaction_code)"
  );

  await pool.query(`
    CREATE TABLE IF NOT EXISTS message_read_receipts (
      user_id BIGINT NOT NULL,
      chat_id TEXT NOT NULL REFERENCES chats(chat_id) ON DELETE CASCADE,
      last_read_seq BIGINT NOT NULL,
      read_at_ms BIGINT NOT NULL,
      PRIMARY KEY (user_id, chat_id)
    )
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS typing_indicators (
      user_id BIGINT NOT NULL,
      chat_id TEXT NOT NULL REFERENCES chats(chat_id) ON DELETE CASCADE,
      updated_at_ms BIGINT NOT NULL,
      PRIMARY KEY (user_id, chat_id)
    )
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS push_tokens (
      token TEXT PRIMARY KEY,
      user_id BIGINT NOT NULL,
      platform TEXT NOT NULL CHECK (platform IN ('ios', 'android')),
      device_id TEXT,
      last_seen_at_ms BIGINT NOT NULL
    )
  `);
  await pool.query("CREATE INDEX IF NOT EXISTS idx_push_tokens_user_id ON push_tokens(user_id)");
}
