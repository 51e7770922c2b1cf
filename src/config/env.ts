// src/config/env.ts

import type { DatabaseConfig } from "../db/connection";
import { LogLevel, parseLogLevel } from "../utils/logger";
import { parseDuration } from "../utils/duration";
import { ConfigError } from "./errors";

export interface AppConfig {
  database: DatabaseConfig;
  recoveryWindowMs: number;
  threadOwnershipMaxAgeMs: number;
  configReloadIntervalMs: number; // 0 = no auto-reload
  logLevel: LogLevel;
  logFile: string | null;
  discordToken: string | null;
}

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  DATABASE_PATH: "data/kb-bot.db",
  DATABASE_BUSY_TIMEOUT_MS: "5000",
  DATABASE_MAX_LIFETIME: "1h",
  MESSAGE_RECOVERY_WINDOW_MINUTES: "5",
  THREAD_OWNERSHIP_MAX_AGE: "720h",
  CONFIG_RELOAD_INTERVAL: "5m",
  LOG_LEVEL: "info",
};

function read(env: Env, name: keyof typeof DEFAULTS): string {
  const value = env[name]?.trim();
  return value ? value : DEFAULTS[name];
}

function readInteger(env: Env, name: keyof typeof DEFAULTS, min: number): number {
  const raw = read(env, name);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(name, `${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readDuration(env: Env, name: keyof typeof DEFAULTS): number {
  const raw = read(env, name);
  const value = parseDuration(raw);
  if (value === null) {
    throw new ConfigError(
      name,
      `${name} must be a duration like "30s", "5m" or "1h30m", got "${raw}"`,
    );
  }
  return value;
}

/**
 * Builds the process configuration from environment variables.
 * Call `dotenv.config()` first if a .env file should be honoured.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevelRaw = read(env, "LOG_LEVEL");
  const logLevel = parseLogLevel(logLevelRaw);
  if (!logLevel) {
    throw new ConfigError(
      "LOG_LEVEL",
      `LOG_LEVEL must be one of debug, info, warn, error, got "${logLevelRaw}"`,
    );
  }

  return {
    database: {
      path: read(env, "DATABASE_PATH"),
      busyTimeoutMs: readInteger(env, "DATABASE_BUSY_TIMEOUT_MS", 0),
      maxLifetimeMs: readDuration(env, "DATABASE_MAX_LIFETIME"),
    },
    recoveryWindowMs: readInteger(env, "MESSAGE_RECOVERY_WINDOW_MINUTES", 1) * 60_000,
    threadOwnershipMaxAgeMs: readDuration(env, "THREAD_OWNERSHIP_MAX_AGE"),
    configReloadIntervalMs: readDuration(env, "CONFIG_RELOAD_INTERVAL"),
    logLevel,
    logFile: env.LOG_FILE?.trim() || null,
    discordToken: env.DISCORD_BOT_TOKEN?.trim() || null,
  };
}
