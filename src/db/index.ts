// src/db/index.ts

import type Database from "better-sqlite3";
import { StorageError, describeError } from "./errors";
import { logger } from "../utils/logger";

export * from "./connection";
export * from "./errors";
export * from "./retry";
export * as schema from "./schema";

export const SCHEMA_VERSION = 1;

const TABLES = `
  CREATE TABLE IF NOT EXISTS message_checkpoints (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    channel_id TEXT NOT NULL,
    thread_id TEXT,
    last_message_id TEXT NOT NULL,
    last_seen_at INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS thread_ownerships (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    thread_id TEXT NOT NULL UNIQUE,
    original_user_id TEXT NOT NULL,
    created_by TEXT NOT NULL,
    creation_time INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS configurations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    config_key TEXT NOT NULL UNIQUE,
    config_value TEXT NOT NULL,
    value_type TEXT NOT NULL DEFAULT 'string'
      CHECK (value_type IN ('string', 'int', 'bool', 'duration')),
    category TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
`;

// NULL thread ids would compare as distinct in a plain UNIQUE constraint,
// so the natural key is enforced over IFNULL(thread_id, '').
const INDEXES = `
  CREATE UNIQUE INDEX IF NOT EXISTS uq_message_checkpoints_context
    ON message_checkpoints(channel_id, IFNULL(thread_id, ''));
  CREATE INDEX IF NOT EXISTS idx_message_checkpoints_channel_thread
    ON message_checkpoints(channel_id, thread_id);
  CREATE INDEX IF NOT EXISTS idx_message_checkpoints_last_seen
    ON message_checkpoints(last_seen_at);

  CREATE INDEX IF NOT EXISTS idx_thread_ownerships_thread_id
    ON thread_ownerships(thread_id);
  CREATE INDEX IF NOT EXISTS idx_thread_ownerships_creation_time
    ON thread_ownerships(creation_time);

  CREATE INDEX IF NOT EXISTS idx_configurations_category
    ON configurations(category);
  CREATE INDEX IF NOT EXISTS idx_configurations_key_category
    ON configurations(config_key, category);
`;

/**
 * Create all tables and indexes.
 * Safe to call on every startup — uses IF NOT EXISTS throughout.
 */
export function initializeDatabase(sqlite: Database.Database): void {
  try {
    sqlite.exec(TABLES);
    sqlite.exec(INDEXES);

    const current = sqlite.pragma("user_version", { simple: true });
    if (typeof current !== "number" || current < SCHEMA_VERSION) {
      sqlite.pragma(`user_version = ${SCHEMA_VERSION}`);
    }
  } catch (error) {
    throw new StorageError(
      `failed to initialize schema: ${describeError(error)}`,
      { cause: error },
    );
  }

  logger.info(`Database schema ready (version ${SCHEMA_VERSION})`);
}

export function schemaVersion(sqlite: Database.Database): number {
  const version = sqlite.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}
