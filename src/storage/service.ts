// src/storage/service.ts

import {
  ConnectionManager,
  ConnectionManagerOptions,
  DatabaseConfig,
} from "../db/connection";
import { initializeDatabase } from "../db";
import type { OperationOptions } from "../db/retry";
import { CheckpointStore } from "./checkpoints";
import { ConfigurationStore } from "./configurations";
import { ThreadOwnershipStore } from "./threadOwnership";
import { Clock, StorageService, systemClock } from "./types";
import { logger } from "../utils/logger";

export interface SqliteStorageOptions extends ConnectionManagerOptions {
  clock?: Clock;
}

export class SqliteStorageService implements StorageService {
  readonly checkpoints: CheckpointStore;
  readonly threadOwnerships: ThreadOwnershipStore;
  readonly configurations: ConfigurationStore;

  private readonly connection: ConnectionManager;

  constructor(config: DatabaseConfig, options: SqliteStorageOptions = {}) {
    const { clock = systemClock, ...connectionOptions } = options;
    this.connection = new ConnectionManager(config, {
      ...connectionOptions,
      now: connectionOptions.now ?? clock,
    });
    this.checkpoints = new CheckpointStore(this.connection, clock);
    this.threadOwnerships = new ThreadOwnershipStore(this.connection, clock);
    this.configurations = new ConfigurationStore(this.connection, clock);
  }

  /** Connects (with retries) and creates the schema. Call once at startup. */
  async initialize(options: OperationOptions = {}): Promise<void> {
    const { sqlite } = await this.connection.connect(options);
    initializeDatabase(sqlite);
    logger.success(`Storage ready at ${this.connection.databasePath}`);
  }

  healthCheck(options: OperationOptions = {}): Promise<void> {
    return this.connection.execute(
      "database health check",
      ({ sqlite }) => {
        sqlite.prepare("SELECT 1").get();
        sqlite.prepare("SELECT COUNT(*) AS count FROM message_checkpoints").get();
        sqlite.prepare("SELECT COUNT(*) AS count FROM configurations").get();
      },
      options,
    );
  }

  close(): void {
    this.connection.close();
    logger.info("Storage connection closed");
  }
}
