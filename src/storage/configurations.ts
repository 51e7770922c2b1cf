// src/storage/configurations.ts

import { asc, eq } from "drizzle-orm";
import type { ConnectionManager } from "../db/connection";
import { NotFoundError } from "../db/errors";
import type { OperationOptions } from "../db/retry";
import { configurations } from "../db/schema";
import { expectRow, runStorageOperation } from "./operation";
import {
  Clock,
  ConfigValueType,
  Configuration,
  ConfigurationInput,
  ConfigurationRepository,
  systemClock,
} from "./types";

/**
 * Typed, categorised key/value settings. The `type` column is a label
 * for readers; values are stored as text and not checked here.
 */
export class ConfigurationStore implements ConfigurationRepository {
  constructor(
    private readonly connection: ConnectionManager,
    private readonly now: Clock = systemClock,
  ) {}

  get(key: string, options: OperationOptions = {}): Promise<Configuration | null> {
    return runStorageOperation(
      this.connection,
      `get configuration (key=${key})`,
      ({ db }) =>
        db.select().from(configurations).where(eq(configurations.key, key)).get() ??
        null,
      options,
    );
  }

  upsert(
    input: ConfigurationInput,
    options: OperationOptions = {},
  ): Promise<Configuration> {
    const operation = `upsert configuration (key=${input.key})`;

    return runStorageOperation(
      this.connection,
      operation,
      ({ db }) =>
        db.transaction(
          (tx) => {
            const now = this.now();
            const type: ConfigValueType = input.type ?? "string";
            const fields = {
              value: input.value,
              type,
              category: input.category,
              description: input.description ?? "",
            };

            const existing = tx
              .select({ id: configurations.id })
              .from(configurations)
              .where(eq(configurations.key, input.key))
              .get();

            if (!existing) {
              const inserted = tx
                .insert(configurations)
                .values({
                  key: input.key,
                  ...fields,
                  createdAt: input.createdAt ?? now,
                  updatedAt: now,
                })
                .returning()
                .get();
              return expectRow(inserted, operation);
            }

            const updated = tx
              .update(configurations)
              .set({ ...fields, updatedAt: now })
              .where(eq(configurations.id, existing.id))
              .returning()
              .get();
            return expectRow(updated, operation);
          },
          { behavior: "immediate" },
        ),
      options,
    );
  }

  getByCategory(
    category: string,
    options: OperationOptions = {},
  ): Promise<Configuration[]> {
    return runStorageOperation(
      this.connection,
      `list configurations (category=${category})`,
      ({ db }) =>
        db
          .select()
          .from(configurations)
          .where(eq(configurations.category, category))
          .orderBy(asc(configurations.key))
          .all(),
      options,
    );
  }

  getAll(options: OperationOptions = {}): Promise<Configuration[]> {
    return runStorageOperation(
      this.connection,
      "list configurations",
      ({ db }) =>
        db
          .select()
          .from(configurations)
          .orderBy(asc(configurations.category), asc(configurations.key))
          .all(),
      options,
    );
  }

  /** Unlike `get`, a missing key is an error here. */
  delete(key: string, options: OperationOptions = {}): Promise<void> {
    return runStorageOperation(
      this.connection,
      `delete configuration (key=${key})`,
      ({ db }) => {
        const result = db.delete(configurations).where(eq(configurations.key, key)).run();
        if (result.changes === 0) {
          throw new NotFoundError(`configuration with key '${key}' not found`, key);
        }
      },
      options,
    );
  }
}
