// src/db/retry.ts

import { CancellationError, RetryExhaustedError, isTransientError } from "./errors";
import { logger } from "../utils/logger";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

/** Opening and pinging the database. */
export const CONNECT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
};

/** Running an operation against an already-open handle. */
export const EXECUTE_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
};

export interface OperationOptions {
  signal?: AbortSignal;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * 2 ** attempt;
}

export function throwIfCancelled(
  operation: string,
  signal: AbortSignal | undefined,
): void {
  if (signal?.aborted) {
    throw new CancellationError(operation, signal.reason);
  }
}

/**
 * Resolves after `ms`, or rejects with a CancellationError the moment
 * the signal fires.
 */
export function sleep(
  ms: number,
  operation: string,
  signal?: AbortSignal,
): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError(operation, signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError(operation, signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Waits on `promise` for one caller: an abort rejects this wait only and
 * leaves the underlying work alone.
 */
export function abortable<T>(
  promise: Promise<T>,
  operation: string,
  signal?: AbortSignal,
): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancellationError(operation, signal.reason));
      return;
    }

    const onAbort = () => reject(new CancellationError(operation, signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Runs `task` until it succeeds, a non-transient error is thrown, or the
 * policy's attempts are used up. The delay doubles after each failure.
 */
export async function withRetry<T>(
  operation: string,
  policy: RetryPolicy,
  task: (attempt: number) => Promise<T>,
  options: OperationOptions = {},
): Promise<T> {
  const { signal } = options;
  let lastError: unknown;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    throwIfCancelled(operation, signal);

    try {
      return await task(attempt);
    } catch (error) {
      if (error instanceof CancellationError) throw error;
      throwIfCancelled(operation, signal);
      if (!isTransientError(error)) throw error;

      lastError = error;
      if (attempt === policy.maxAttempts - 1) break;

      const delay = backoffDelay(policy, attempt);
      logger.warn(
        `${operation}: attempt ${attempt + 1}/${policy.maxAttempts} failed, retrying in ${delay}ms`,
        error,
      );
      await sleep(delay, operation, signal);
    }
  }

  throw new RetryExhaustedError(
    `${operation} failed after ${policy.maxAttempts} attempts`,
    policy.maxAttempts,
    lastError,
  );
}
