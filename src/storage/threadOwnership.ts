// src/storage/threadOwnership.ts

import { desc, eq, lt } from "drizzle-orm";
import { subMilliseconds } from "date-fns";
import type { ConnectionManager } from "../db/connection";
import type { OperationOptions } from "../db/retry";
import { threadOwnerships } from "../db/schema";
import { expectRow, runStorageOperation } from "./operation";
import {
  Clock,
  ThreadOwnership,
  ThreadOwnershipInput,
  ThreadOwnershipRepository,
  systemClock,
} from "./types";
import { logger } from "../utils/logger";

export class ThreadOwnershipStore implements ThreadOwnershipRepository {
  constructor(
    private readonly connection: ConnectionManager,
    private readonly now: Clock = systemClock,
  ) {}

  get(threadId: string, options: OperationOptions = {}): Promise<ThreadOwnership | null> {
    return runStorageOperation(
      this.connection,
      `get thread ownership (thread=${threadId})`,
      ({ db }) =>
        db
          .select()
          .from(threadOwnerships)
          .where(eq(threadOwnerships.threadId, threadId))
          .get() ?? null,
      options,
    );
  }

  upsert(
    input: ThreadOwnershipInput,
    options: OperationOptions = {},
  ): Promise<ThreadOwnership> {
    const operation = `upsert thread ownership (thread=${input.threadId})`;

    return runStorageOperation(
      this.connection,
      operation,
      ({ db }) =>
        db.transaction(
          (tx) => {
            const now = this.now();
            const existing = tx
              .select({ id: threadOwnerships.id })
              .from(threadOwnerships)
              .where(eq(threadOwnerships.threadId, input.threadId))
              .get();

            if (!existing) {
              const inserted = tx
                .insert(threadOwnerships)
                .values({
                  threadId: input.threadId,
                  originalUserId: input.originalUserId,
                  createdBy: input.createdBy,
                  creationTime: input.creationTime,
                  createdAt: input.createdAt ?? now,
                  updatedAt: now,
                })
                .returning()
                .get();
              return expectRow(inserted, operation);
            }

            const updated = tx
              .update(threadOwnerships)
              .set({
                originalUserId: input.originalUserId,
                createdBy: input.createdBy,
                creationTime: input.creationTime,
                updatedAt: now,
              })
              .where(eq(threadOwnerships.id, existing.id))
              .returning()
              .get();
            return expectRow(updated, operation);
          },
          { behavior: "immediate" },
        ),
      options,
    );
  }

  getAll(options: OperationOptions = {}): Promise<ThreadOwnership[]> {
    return runStorageOperation(
      this.connection,
      "list thread ownerships",
      ({ db }) =>
        db
          .select()
          .from(threadOwnerships)
          .orderBy(desc(threadOwnerships.creationTime), desc(threadOwnerships.id))
          .all(),
      options,
    );
  }

  /**
   * Deletes records whose creationTime is strictly before `now - maxAgeMs`
   * and returns how many went. Deleting nothing is fine.
   */
  async cleanupOlderThan(
    maxAgeMs: number,
    options: OperationOptions = {},
  ): Promise<number> {
    const removed = await runStorageOperation(
      this.connection,
      `clean up thread ownerships older than ${maxAgeMs}ms`,
      ({ db }) => {
        const cutoff = subMilliseconds(this.now(), maxAgeMs);
        return db
          .delete(threadOwnerships)
          .where(lt(threadOwnerships.creationTime, cutoff))
          .run().changes;
      },
      options,
    );

    if (removed > 0) {
      logger.info(`🧹 Cleaned up ${removed} old thread ownership record(s)`);
    }
    return removed;
  }
}
