// src/recovery/discordSource.ts

import type { Client, Message } from "discord.js";
import { throwIfCancelled } from "../db/retry";
import type {
  ConversationContext,
  MessageSource,
  RecoveredMessage,
} from "./recovery";

const PAGE_SIZE = 100; // Discord's maximum per request

function newestId(ids: Iterable<string>, current: string): string {
  let newest = current;
  for (const id of ids) {
    if (BigInt(id) > BigInt(newest)) newest = id;
  }
  return newest;
}

/** The parts of a discord.js Message that recovery reads. */
export type PageMessage = Pick<Message, "id" | "createdAt" | "content"> & {
  author: { id: string };
};

/** Converts one fetched page, dropping what the bot itself posted. */
export function toRecoveredMessages(
  page: Iterable<PageMessage>,
  selfId: string | null,
  context: ConversationContext,
): RecoveredMessage[] {
  const recovered: RecoveredMessage[] = [];
  for (const message of page) {
    if (selfId !== null && message.author.id === selfId) continue;
    recovered.push({
      id: message.id,
      createdAt: message.createdAt,
      authorId: message.author.id,
      content: message.content,
      context,
    });
  }
  return recovered;
}

/**
 * Reads missed messages over the Discord REST API. Threads are channels in
 * Discord, so a checkpoint with a thread id is read from the thread.
 */
export class DiscordMessageSource implements MessageSource {
  constructor(private readonly client: Client) {}

  async fetchMessagesAfter(
    context: ConversationContext,
    afterMessageId: string,
    signal?: AbortSignal,
  ): Promise<RecoveredMessage[]> {
    const channelId = context.threadId ?? context.channelId;
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || channel.isDMBased()) {
      throw new Error(`Discord channel ${channelId} is not a guild text channel`);
    }

    const recovered: RecoveredMessage[] = [];
    let after = afterMessageId;

    for (;;) {
      throwIfCancelled("fetch missed Discord messages", signal);

      const page = await channel.messages.fetch({ after, limit: PAGE_SIZE });
      recovered.push(
        ...toRecoveredMessages(page.values(), this.client.user?.id ?? null, context),
      );

      if (page.size < PAGE_SIZE) break;
      after = newestId(page.keys(), after);
    }

    return recovered;
  }
}
