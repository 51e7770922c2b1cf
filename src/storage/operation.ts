// src/storage/operation.ts

import type { ConnectionManager, DatabaseHandle } from "../db/connection";
import { StorageError, describeError } from "../db/errors";
import type { OperationOptions } from "../db/retry";

/**
 * Runs a store operation through the connection manager. Anything that
 * isn't already a StorageError is wrapped with the operation name.
 */
export async function runStorageOperation<T>(
  connection: ConnectionManager,
  operation: string,
  task: (handle: DatabaseHandle) => T,
  options: OperationOptions = {},
): Promise<T> {
  try {
    return await connection.execute(operation, task, options);
  } catch (error) {
    if (error instanceof StorageError) throw error;
    throw new StorageError(`failed to ${operation}: ${describeError(error)}`, {
      cause: error,
    });
  }
}

export function expectRow<T>(row: T | undefined, operation: string): T {
  if (row === undefined) {
    throw new StorageError(`failed to ${operation}: no row returned`);
  }
  return row;
}

export function describeContext(channelId: string, threadId: string | null): string {
  return `channel=${channelId}, thread=${threadId ?? "-"}`;
}
