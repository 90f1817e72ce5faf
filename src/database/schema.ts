/**
 * Schema bootstrap, applied by DatabaseConnection.migrate() at startup
 */

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS users (
      user_id BIGINT PRIMARY KEY,
      username TEXT,
      status TEXT NOT NULL CHECK (status IN ('pending', 'approved', 'rejected', 'superadmin')),
      tz_offset_minutes INTEGER NOT NULL DEFAULT 0,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`,
  // At most one superadmin
  `CREATE UNIQUE INDEX IF NOT EXISTS users_single_superadmin
      ON users ((status)) WHERE status = 'superadmin'`,
  `CREATE TABLE IF NOT EXISTS channels (
      platform TEXT NOT NULL CHECK (platform IN ('telegram', 'vk')),
      external_id TEXT NOT NULL,
      title TEXT NOT NULL,
      can_post BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (platform, external_id)
    )`,
  `CREATE TABLE IF NOT EXISTS scheduled_posts (
      post_id SERIAL PRIMARY KEY,
      owner_id BIGINT NOT NULL,
      source_chat_id BIGINT NOT NULL,
      source_message_id BIGINT NOT NULL,
      source_text TEXT,
      source_photo_file_id TEXT,
      fallback_chat_id BIGINT,
      fallback_message_id BIGINT,
      targets JSONB NOT NULL,
      requested_time TEXT,
      dispatch_at TIMESTAMPTZ NOT NULL,
      state TEXT NOT NULL CHECK (state IN ('scheduled', 'dispatching', 'sent', 'failed', 'cancelled')),
      results JSONB NOT NULL DEFAULT '[]'::jsonb,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`,
  `CREATE INDEX IF NOT EXISTS scheduled_posts_due
      ON scheduled_posts (dispatch_at) WHERE state = 'scheduled'`,
  `CREATE INDEX IF NOT EXISTS scheduled_posts_owner
      ON scheduled_posts (owner_id, dispatch_at)`,
];
