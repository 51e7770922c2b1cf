// src/recovery/recovery.ts

import { CancellationError, describeError } from "../db/errors";
import { throwIfCancelled } from "../db/retry";
import type { CheckpointRepository, MessageCheckpoint } from "../storage/types";
import { logger } from "../utils/logger";

export interface ConversationContext {
  channelId: string;
  threadId: string | null;
}

export interface RecoveredMessage {
  id: string;
  createdAt: Date;
  authorId: string;
  content: string;
  context: ConversationContext;
}

/** Where missed messages come from, e.g. the Discord REST API. */
export interface MessageSource {
  fetchMessagesAfter(
    context: ConversationContext,
    afterMessageId: string,
    signal?: AbortSignal,
  ): Promise<RecoveredMessage[]>;
}

export type RecoveredMessageHandler = (message: RecoveredMessage) => Promise<void>;

export interface RecoveryOptions {
  checkpoints: CheckpointRepository;
  source: MessageSource;
  windowMs: number;
  handle: RecoveredMessageHandler;
  signal?: AbortSignal;
}

export interface RecoverySummary {
  contexts: number;
  processed: number;
  failed: number;
}

function byCreation(a: RecoveredMessage, b: RecoveredMessage): number {
  const diff = a.createdAt.getTime() - b.createdAt.getTime();
  if (diff !== 0) return diff;
  // Discord snowflakes sort by time; fall back to them for same-second messages
  if (a.id.length !== b.id.length) return a.id.length - b.id.length;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

async function recoverContext(
  checkpoint: MessageCheckpoint,
  options: RecoveryOptions,
): Promise<number> {
  const context = { channelId: checkpoint.channelId, threadId: checkpoint.threadId };
  const messages = await options.source.fetchMessagesAfter(
    context,
    checkpoint.lastMessageId,
    options.signal,
  );

  const ordered = [...messages].sort(byCreation);
  for (const message of ordered) {
    throwIfCancelled("recover missed messages", options.signal);
    await options.handle(message);
    await options.checkpoints.upsert(
      {
        channelId: context.channelId,
        threadId: context.threadId,
        lastMessageId: message.id,
        lastSeenAt: message.createdAt,
      },
      { signal: options.signal },
    );
  }
  return ordered.length;
}

/**
 * Catches up on conversations that were active within the recovery window
 * before the process stopped. Older checkpoints are left alone.
 *
 * A failing context is logged and counted; the rest still run. Cancellation
 * stops everything.
 */
export async function recoverRecentActivity(
  options: RecoveryOptions,
): Promise<RecoverySummary> {
  const recent = await options.checkpoints.getWithinWindow(options.windowMs, {
    signal: options.signal,
  });

  const summary: RecoverySummary = { contexts: recent.length, processed: 0, failed: 0 };
  if (recent.length === 0) {
    logger.info("No recent conversations to recover");
    return summary;
  }

  logger.info(`🔁 Recovering ${recent.length} recent conversation(s)`);

  for (const checkpoint of recent) {
    try {
      summary.processed += await recoverContext(checkpoint, options);
    } catch (error) {
      if (error instanceof CancellationError) throw error;
      throwIfCancelled("recover missed messages", options.signal);
      summary.failed++;
      logger.error(
        `Recovery failed for channel ${checkpoint.channelId} thread ${checkpoint.threadId ?? "-"}: ${describeError(error)}`,
      );
    }
  }

  logger.success(
    `Recovery finished: ${summary.processed} message(s) across ${summary.contexts} conversation(s), ${summary.failed} failed`,
  );
  return summary;
}
