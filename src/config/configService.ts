// src/config/configService.ts

import { describeError } from "../db/errors";
import type { OperationOptions } from "../db/retry";
import type {
  ConfigValueType,
  Configuration,
  StorageService,
} from "../storage/types";
import { parseDuration } from "../utils/duration";
import { logger } from "../utils/logger";
import { ConfigError } from "./errors";

export type ConfigChangeListener = (
  key: string,
  oldValue: string | null,
  newValue: string | null,
) => void;

const TRUE_VALUES = new Set(["true", "1", "yes", "on", "enabled"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off", "disabled"]);

const MAX_KEY_LENGTH = 255;
const MAX_VALUE_LENGTH = 65_535;

export function parseBoolean(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

function parseInteger(value: string): number | null {
  if (!/^[-+]?\d+$/.test(value.trim())) return null;
  const parsed = parseInt(value, 10);
  // past 2^53 the digits would be rounded away
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function matchesType(type: ConfigValueType, value: string): boolean {
  switch (type) {
    case "string":
      return true;
    case "int":
      return parseInteger(value) !== null;
    case "bool":
      return parseBoolean(value) !== null;
    case "duration":
      return parseDuration(value) !== null;
  }
}

/**
 * In-memory view of the configurations table. Reads hit the cache;
 * writes go to storage first, then the cache, then listeners.
 */
export class DatabaseConfigService {
  private cache = new Map<string, Configuration>();
  private listeners: ConfigChangeListener[] = [];
  private reloadInterval: NodeJS.Timeout | null = null;

  constructor(private readonly storage: StorageService) {}

  initialize(options: OperationOptions = {}): Promise<void> {
    return this.reload(options);
  }

  close(): void {
    this.stopAutoReload();
    this.cache.clear();
  }

  async reload(options: OperationOptions = {}): Promise<void> {
    let configs: Configuration[];
    try {
      configs = await this.storage.configurations.getAll(options);
    } catch (error) {
      throw new ConfigError(
        "",
        `failed to load configurations from database: ${describeError(error)}`,
        { cause: error },
      );
    }

    const previous = this.cache;
    this.cache = new Map(configs.map((config) => [config.key, config]));

    for (const [key, config] of this.cache) {
      const old = previous.get(key);
      if (!old || old.value !== config.value) {
        this.notify(key, old?.value ?? null, config.value);
      }
    }
    for (const [key, old] of previous) {
      if (!this.cache.has(key)) this.notify(key, old.value, null);
    }
  }

  // ─── READS ────────────────────────────────────────────────────

  get(key: string): string {
    const config = this.cache.get(key);
    if (!config) {
      throw new ConfigError(key, `configuration not found: ${key}`);
    }
    return config.value;
  }

  getWithDefault(key: string, defaultValue: string): string {
    return this.cache.get(key)?.value ?? defaultValue;
  }

  getInt(key: string): number {
    const value = parseInteger(this.get(key));
    if (value === null) {
      throw new ConfigError(key, `invalid integer value for ${key}`);
    }
    return value;
  }

  getIntWithDefault(key: string, defaultValue: number): number {
    const raw = this.cache.get(key)?.value;
    const value = raw === undefined ? null : parseInteger(raw);
    return value ?? defaultValue;
  }

  getBool(key: string): boolean {
    const value = parseBoolean(this.get(key));
    if (value === null) {
      throw new ConfigError(key, `invalid boolean value for ${key}`);
    }
    return value;
  }

  getBoolWithDefault(key: string, defaultValue: boolean): boolean {
    const raw = this.cache.get(key)?.value;
    const value = raw === undefined ? null : parseBoolean(raw);
    return value ?? defaultValue;
  }

  /** Duration in milliseconds. */
  getDuration(key: string): number {
    const value = parseDuration(this.get(key));
    if (value === null) {
      throw new ConfigError(key, `invalid duration value for ${key}`);
    }
    return value;
  }

  getDurationWithDefault(key: string, defaultValue: number): number {
    const raw = this.cache.get(key)?.value;
    const value = raw === undefined ? null : parseDuration(raw);
    return value ?? defaultValue;
  }

  getByCategory(category: string): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, config] of this.cache) {
      if (config.category === category) result[key] = config.value;
    }
    return result;
  }

  getAll(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, config] of this.cache) {
      result[key] = config.value;
    }
    return result;
  }

  // ─── WRITES ───────────────────────────────────────────────────

  validate(key: string, value: string): void {
    if (key === "") {
      throw new ConfigError(key, "configuration key cannot be empty");
    }
    if (key.length > MAX_KEY_LENGTH) {
      throw new ConfigError(
        key,
        `configuration key too long (max ${MAX_KEY_LENGTH} characters)`,
      );
    }
    if (value.length > MAX_VALUE_LENGTH) {
      throw new ConfigError(
        key,
        `configuration value too long (max ${MAX_VALUE_LENGTH} characters)`,
      );
    }

    if (
      (key.endsWith("_RATE_LIMIT_PER_MINUTE") || key.endsWith("_RATE_LIMIT_PER_DAY")) &&
      parseInteger(value) === null
    ) {
      throw new ConfigError(key, "rate limit values must be integers");
    }

    if (key.endsWith("_ENABLED") && parseBoolean(value) === null) {
      throw new ConfigError(
        key,
        "boolean configuration values must be true/false, 1/0, yes/no, on/off, or enabled/disabled",
      );
    }
  }

  async set(
    key: string,
    value: string,
    category: string,
    description = "",
    type: ConfigValueType = "string",
    options: OperationOptions = {},
  ): Promise<Configuration> {
    this.validate(key, value);
    if (!matchesType(type, value)) {
      throw new ConfigError(key, `invalid value for type ${type}: "${value}"`);
    }

    let stored: Configuration;
    try {
      stored = await this.storage.configurations.upsert(
        { key, value, type, category, description },
        options,
      );
    } catch (error) {
      throw new ConfigError(
        key,
        `failed to store configuration: ${describeError(error)}`,
        { cause: error },
      );
    }

    const oldValue = this.cache.get(key)?.value ?? null;
    this.cache.set(key, stored);
    if (oldValue !== value) this.notify(key, oldValue, value);
    return stored;
  }

  async delete(key: string, options: OperationOptions = {}): Promise<void> {
    try {
      await this.storage.configurations.delete(key, options);
    } catch (error) {
      throw new ConfigError(
        key,
        `failed to delete configuration: ${describeError(error)}`,
        { cause: error },
      );
    }

    const old = this.cache.get(key);
    this.cache.delete(key);
    if (old) this.notify(key, old.value, null);
  }

  async healthCheck(options: OperationOptions = {}): Promise<void> {
    try {
      await this.storage.healthCheck(options);
    } catch (error) {
      throw new ConfigError(
        "",
        `storage service health check failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    // An empty cache is normal on a fresh install; reload to prove we can read.
    if (this.cache.size === 0) await this.reload(options);
  }

  // ─── AUTO-RELOAD ──────────────────────────────────────────────

  startAutoReload(intervalMs: number): void {
    if (this.reloadInterval) {
      throw new ConfigError("", "auto-reload already running");
    }

    this.reloadInterval = setInterval(() => {
      this.reload({ signal: AbortSignal.timeout(30_000) }).catch((error) => {
        logger.error("Configuration auto-reload failed", error);
      });
    }, intervalMs);
    this.reloadInterval.unref();

    logger.info(`🔄 Configuration auto-reload every ${intervalMs}ms`);
  }

  stopAutoReload(): void {
    if (this.reloadInterval) {
      clearInterval(this.reloadInterval);
      this.reloadInterval = null;
    }
  }

  // ─── LISTENERS ────────────────────────────────────────────────

  addChangeListener(listener: ConfigChangeListener): void {
    this.listeners.push(listener);
  }

  removeChangeListener(listener: ConfigChangeListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  private notify(key: string, oldValue: string | null, newValue: string | null) {
    for (const listener of this.listeners) {
      try {
        listener(key, oldValue, newValue);
      } catch (error) {
        logger.error(`Config listener threw for ${key}`, error);
      }
    }
  }
}
