// src/storage/migration.ts

import { StorageError } from "../db/errors";
import type { OperationOptions } from "../db/retry";
import type { StorageService } from "./types";
import { logger } from "../utils/logger";

export interface MigrationReport {
  checkpoints: number;
  threadOwnerships: number;
  configurations: number;
}

const ENTITIES: ReadonlyArray<keyof MigrationReport> = [
  "checkpoints",
  "threadOwnerships",
  "configurations",
];

/**
 * Copies every record from one storage backend to another through the
 * target's upserts, so re-running a migration is harmless and original
 * createdAt values survive.
 */
export class StorageMigrator {
  constructor(
    private readonly source: StorageService,
    private readonly target: StorageService,
  ) {}

  async migrate(options: OperationOptions = {}): Promise<MigrationReport> {
    logger.info("📦 Starting storage migration");

    const checkpoints = await this.source.checkpoints.getAll(options);
    for (const checkpoint of checkpoints) {
      await this.target.checkpoints.upsert(checkpoint, options);
    }

    const ownerships = await this.source.threadOwnerships.getAll(options);
    for (const ownership of ownerships) {
      await this.target.threadOwnerships.upsert(ownership, options);
    }

    const configs = await this.source.configurations.getAll(options);
    for (const config of configs) {
      await this.target.configurations.upsert(config, options);
    }

    const report: MigrationReport = {
      checkpoints: checkpoints.length,
      threadOwnerships: ownerships.length,
      configurations: configs.length,
    };

    logger.success(
      `Migrated ${report.checkpoints} checkpoint(s), ${report.threadOwnerships} thread ownership(s), ${report.configurations} configuration(s)`,
    );
    return report;
  }

  /** Throws when any entity's row count differs between source and target. */
  async validate(options: OperationOptions = {}): Promise<MigrationReport> {
    const source = await this.count(this.source, options);
    const target = await this.count(this.target, options);

    const mismatched = ENTITIES.filter(
      (entity) => source[entity] !== target[entity],
    );

    if (mismatched.length > 0) {
      const details = mismatched
        .map((entity) => `${entity}: source=${source[entity]}, target=${target[entity]}`)
        .join("; ");
      throw new StorageError(`migration count mismatch (${details})`);
    }

    return target;
  }

  private async count(
    storage: StorageService,
    options: OperationOptions,
  ): Promise<MigrationReport> {
    const [checkpoints, ownerships, configs] = await Promise.all([
      storage.checkpoints.getAll(options),
      storage.threadOwnerships.getAll(options),
      storage.configurations.getAll(options),
    ]);
    return {
      checkpoints: checkpoints.length,
      threadOwnerships: ownerships.length,
      configurations: configs.length,
    };
  }
}
