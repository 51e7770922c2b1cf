// src/storage/checkpoints.ts

import { and, desc, eq, gte, isNull } from "drizzle-orm";
import { subMilliseconds } from "date-fns";
import type { ConnectionManager } from "../db/connection";
import type { OperationOptions } from "../db/retry";
import { messageCheckpoints } from "../db/schema";
import { describeContext, expectRow, runStorageOperation } from "./operation";
import {
  CheckpointRepository,
  Clock,
  MessageCheckpoint,
  MessageCheckpointInput,
  systemClock,
} from "./types";

function contextKey(channelId: string, threadId: string | null) {
  return threadId === null
    ? and(eq(messageCheckpoints.channelId, channelId), isNull(messageCheckpoints.threadId))
    : and(
        eq(messageCheckpoints.channelId, channelId),
        eq(messageCheckpoints.threadId, threadId),
      );
}

/**
 * Last-processed-message markers, one per channel or thread.
 * Used to resume after downtime.
 */
export class CheckpointStore implements CheckpointRepository {
  constructor(
    private readonly connection: ConnectionManager,
    private readonly now: Clock = systemClock,
  ) {}

  get(
    channelId: string,
    threadId: string | null,
    options: OperationOptions = {},
  ): Promise<MessageCheckpoint | null> {
    return runStorageOperation(
      this.connection,
      `get message checkpoint (${describeContext(channelId, threadId)})`,
      ({ db }) =>
        db
          .select()
          .from(messageCheckpoints)
          .where(contextKey(channelId, threadId))
          .get() ?? null,
      options,
    );
  }

  /**
   * Check-then-branch inside an IMMEDIATE transaction. The natural key is
   * an expression index (NULL thread ids), which ON CONFLICT can't target
   * through the query builder; the write lock taken at BEGIN keeps another
   * writer from slipping in between the read and the write.
   */
  upsert(
    input: MessageCheckpointInput,
    options: OperationOptions = {},
  ): Promise<MessageCheckpoint> {
    const threadId = input.threadId ?? null;
    const operation = `upsert message checkpoint (${describeContext(input.channelId, threadId)})`;

    return runStorageOperation(
      this.connection,
      operation,
      ({ db }) =>
        db.transaction(
          (tx) => {
            const now = this.now();
            const existing = tx
              .select({ id: messageCheckpoints.id })
              .from(messageCheckpoints)
              .where(contextKey(input.channelId, threadId))
              .get();

            if (!existing) {
              const inserted = tx
                .insert(messageCheckpoints)
                .values({
                  channelId: input.channelId,
                  threadId,
                  lastMessageId: input.lastMessageId,
                  lastSeenAt: input.lastSeenAt,
                  createdAt: input.createdAt ?? now,
                  updatedAt: now,
                })
                .returning()
                .get();
              return expectRow(inserted, operation);
            }

            // createdAt is left untouched
            const updated = tx
              .update(messageCheckpoints)
              .set({
                lastMessageId: input.lastMessageId,
                lastSeenAt: input.lastSeenAt,
                updatedAt: now,
              })
              .where(eq(messageCheckpoints.id, existing.id))
              .returning()
              .get();
            return expectRow(updated, operation);
          },
          { behavior: "immediate" },
        ),
      options,
    );
  }

  getAll(options: OperationOptions = {}): Promise<MessageCheckpoint[]> {
    return runStorageOperation(
      this.connection,
      "list message checkpoints",
      ({ db }) =>
        db
          .select()
          .from(messageCheckpoints)
          .orderBy(desc(messageCheckpoints.lastSeenAt), desc(messageCheckpoints.id))
          .all(),
      options,
    );
  }

  /** Checkpoints seen at or after `now - windowMs`, newest first. */
  getWithinWindow(
    windowMs: number,
    options: OperationOptions = {},
  ): Promise<MessageCheckpoint[]> {
    return runStorageOperation(
      this.connection,
      `list message checkpoints within ${windowMs}ms`,
      ({ db }) => {
        const windowStart = subMilliseconds(this.now(), windowMs);
        return db
          .select()
          .from(messageCheckpoints)
          .where(gte(messageCheckpoints.lastSeenAt, windowStart))
          .orderBy(desc(messageCheckpoints.lastSeenAt), desc(messageCheckpoints.id))
          .all();
      },
      options,
    );
  }
}
