// src/storage/types.ts

import type { OperationOptions } from "../db/retry";
import type {
  ConfigValueType,
  Configuration,
  MessageCheckpoint,
  ThreadOwnership,
} from "../db/schema";

export type { ConfigValueType, Configuration, MessageCheckpoint, ThreadOwnership };

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface MessageCheckpointInput {
  channelId: string;
  threadId?: string | null; // omitted or null = the channel itself
  lastMessageId: string;
  lastSeenAt: Date;
  createdAt?: Date; // only used when the checkpoint is new
}

export interface ThreadOwnershipInput {
  threadId: string;
  originalUserId: string;
  createdBy: string;
  creationTime: Date;
  createdAt?: Date;
}

export interface ConfigurationInput {
  key: string;
  value: string;
  type?: ConfigValueType;
  category: string;
  description?: string;
  createdAt?: Date;
}

export interface CheckpointRepository {
  get(
    channelId: string,
    threadId: string | null,
    options?: OperationOptions,
  ): Promise<MessageCheckpoint | null>;
  upsert(
    input: MessageCheckpointInput,
    options?: OperationOptions,
  ): Promise<MessageCheckpoint>;
  getAll(options?: OperationOptions): Promise<MessageCheckpoint[]>;
  getWithinWindow(
    windowMs: number,
    options?: OperationOptions,
  ): Promise<MessageCheckpoint[]>;
}

export interface ThreadOwnershipRepository {
  get(threadId: string, options?: OperationOptions): Promise<ThreadOwnership | null>;
  upsert(
    input: ThreadOwnershipInput,
    options?: OperationOptions,
  ): Promise<ThreadOwnership>;
  getAll(options?: OperationOptions): Promise<ThreadOwnership[]>;
  cleanupOlderThan(maxAgeMs: number, options?: OperationOptions): Promise<number>;
}

export interface ConfigurationRepository {
  get(key: string, options?: OperationOptions): Promise<Configuration | null>;
  upsert(
    input: ConfigurationInput,
    options?: OperationOptions,
  ): Promise<Configuration>;
  getByCategory(category: string, options?: OperationOptions): Promise<Configuration[]>;
  getAll(options?: OperationOptions): Promise<Configuration[]>;
  delete(key: string, options?: OperationOptions): Promise<void>;
}

/** Everything the bot persists, behind one owned resource. */
export interface StorageService {
  readonly checkpoints: CheckpointRepository;
  readonly threadOwnerships: ThreadOwnershipRepository;
  readonly configurations: ConfigurationRepository;

  initialize(options?: OperationOptions): Promise<void>;
  healthCheck(options?: OperationOptions): Promise<void>;
  close(): void;
}
