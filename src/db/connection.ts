// src/db/connection.ts

import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { differenceInMilliseconds } from "date-fns";
import * as schema from "./schema";
import { ConnectionError, StorageError, describeError } from "./errors";
import {
  CONNECT_RETRY_POLICY,
  EXECUTE_RETRY_POLICY,
  OperationOptions,
  RetryPolicy,
  abortable,
  throwIfCancelled,
  withRetry,
} from "./retry";
import { logger } from "../utils/logger";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export const MEMORY_DATABASE = ":memory:";

export interface DatabaseConfig {
  path: string; // file path, or ":memory:"
  busyTimeoutMs: number;
  maxLifetimeMs: number; // 0 = never recycle
}

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: AppDatabase;
  openedAt: Date;
}

export type DatabaseOpener = (
  config: DatabaseConfig,
) => Database.Database | Promise<Database.Database>;

export interface ConnectionManagerOptions {
  opener?: DatabaseOpener;
  connectPolicy?: RetryPolicy;
  executePolicy?: RetryPolicy;
  now?: () => Date;
}

/** One open in flight, shared by every caller that arrives while it runs. */
interface PendingOpen {
  promise: Promise<DatabaseHandle>;
  controller: AbortController;
  waiters: number;
  settled: boolean;
}

const CONNECT_OPERATION = "connect to database";

export function openSqlite(config: DatabaseConfig): Database.Database {
  if (config.path !== MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(path.resolve(config.path)), { recursive: true });
  }

  const sqlite = new Database(config.path, { timeout: config.busyTimeoutMs });
  if (config.path !== MEMORY_DATABASE) {
    sqlite.pragma("journal_mode = WAL");
  }
  return sqlite;
}

/**
 * Owns the single better-sqlite3 handle. SQLite gives us one connection
 * per handle, so the "pool" is one open handle that is reopened after
 * `maxLifetimeMs`, or lazily after a close by the driver.
 */
export class ConnectionManager {
  private handle: DatabaseHandle | null = null;
  private connecting: PendingOpen | null = null;
  private closed = false;

  private readonly opener: DatabaseOpener;
  private readonly connectPolicy: RetryPolicy;
  private readonly executePolicy: RetryPolicy;
  private readonly now: () => Date;

  constructor(
    private readonly config: DatabaseConfig,
    options: ConnectionManagerOptions = {},
  ) {
    this.opener = options.opener ?? openSqlite;
    this.connectPolicy = options.connectPolicy ?? CONNECT_RETRY_POLICY;
    this.executePolicy = options.executePolicy ?? EXECUTE_RETRY_POLICY;
    this.now = options.now ?? (() => new Date());
  }

  get databasePath(): string {
    return this.config.path;
  }

  isConnected(): boolean {
    return this.handle !== null && this.handle.sqlite.open;
  }

  /**
   * Returns a live handle, opening (with retries) when needed.
   *
   * Concurrent callers share one open. A caller's signal only cancels that
   * caller's wait; the open itself is abandoned once every waiter has gone.
   */
  async connect(options: OperationOptions = {}): Promise<DatabaseHandle> {
    this.assertOpen();
    throwIfCancelled(CONNECT_OPERATION, options.signal);

    if (this.handle) {
      if (this.handle.sqlite.open && !this.isExpired(this.handle)) {
        return this.handle;
      }
      logger.info(`Recycling database handle for ${this.config.path}`);
      this.release();
    }

    const pending = this.connecting ?? this.startOpen();
    pending.waiters++;
    try {
      return await abortable(pending.promise, CONNECT_OPERATION, options.signal);
    } finally {
      pending.waiters--;
      if (pending.waiters === 0 && !pending.settled) {
        if (this.connecting === pending) this.connecting = null;
        pending.controller.abort(new Error("no callers waiting"));
      }
    }
  }

  /**
   * Runs `task` against a live handle, retrying transient failures with
   * the execute policy.
   */
  execute<T>(
    operation: string,
    task: (handle: DatabaseHandle) => T | Promise<T>,
    options: OperationOptions = {},
  ): Promise<T> {
    return withRetry(
      operation,
      this.executePolicy,
      async () => {
        const handle = await this.connect(options);
        return task(handle);
      },
      options,
    );
  }

  close(): void {
    this.closed = true;
    this.release();
  }

  private startOpen(): PendingOpen {
    const controller = new AbortController();
    const pending: PendingOpen = {
      controller,
      waiters: 0,
      settled: false,
      promise: this.open({ signal: controller.signal }).finally(() => {
        pending.settled = true;
        if (this.connecting === pending) this.connecting = null;
      }),
    };
    this.connecting = pending;
    return pending;
  }

  private async open(options: OperationOptions): Promise<DatabaseHandle> {
    let handle: DatabaseHandle;
    try {
      handle = await withRetry(
        CONNECT_OPERATION,
        this.connectPolicy,
        async () => {
          const sqlite = await this.opener(this.config);
          try {
            sqlite.prepare("SELECT 1").get();
          } catch (error) {
            sqlite.close();
            throw error;
          }
          return { sqlite, db: drizzle(sqlite, { schema }), openedAt: this.now() };
        },
        options,
      );
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new ConnectionError(
        `failed to open database ${this.config.path}: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (this.closed) {
      handle.sqlite.close();
      throw new StorageError("connection manager is closed");
    }

    this.handle = handle;
    logger.debug(`Database connection opened: ${this.config.path}`);
    return handle;
  }

  private isExpired(handle: DatabaseHandle): boolean {
    if (this.config.path === MEMORY_DATABASE) return false;
    if (this.config.maxLifetimeMs <= 0) return false;
    return (
      differenceInMilliseconds(this.now(), handle.openedAt) >=
      this.config.maxLifetimeMs
    );
  }

  private release(): void {
    if (this.handle?.sqlite.open) {
      this.handle.sqlite.close();
    }
    this.handle = null;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError("connection manager is closed");
    }
  }
}
