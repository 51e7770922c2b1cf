import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";

// Timestamps are stored as Unix seconds; drizzle maps them to Date.

export const messageCheckpoints = sqliteTable("message_checkpoints", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  channelId: text("channel_id").notNull(),
  threadId: text("thread_id"), // null = the channel itself
  lastMessageId: text("last_message_id").notNull(),
  lastSeenAt: integer("last_seen_at", { mode: "timestamp" }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
});

export const threadOwnerships = sqliteTable("thread_ownerships", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  threadId: text("thread_id").notNull().unique(),
  originalUserId: text("original_user_id").notNull(),
  createdBy: text("created_by").notNull(), // bot or user that opened the thread
  creationTime: integer("creation_time", { mode: "timestamp" }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
});

export const CONFIG_VALUE_TYPES = ["string", "int", "bool", "duration"] as const;

export const configurations = sqliteTable("configurations", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  key: text("config_key").notNull().unique(),
  value: text("config_value").notNull(),
  type: text("value_type", { enum: CONFIG_VALUE_TYPES })
    .notNull()
    .default("string"),
  category: text("category").notNull(),
  description: text("description").notNull().default(""),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
});

export type MessageCheckpoint = typeof messageCheckpoints.$inferSelect;
export type ThreadOwnership = typeof threadOwnerships.$inferSelect;
export type Configuration = typeof configurations.$inferSelect;
export type ConfigValueType = (typeof CONFIG_VALUE_TYPES)[number];
