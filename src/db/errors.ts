// src/db/errors.ts

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** A connect failure that retrying will not fix (bad path, permissions, credentials). */
export class ConnectionError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class RetryExhaustedError extends StorageError {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause: unknown) {
    super(message, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

export class CancellationError extends StorageError {
  readonly reason: unknown;

  constructor(operation: string, reason: unknown) {
    super(`${operation} cancelled: ${describeError(reason)}`, {
      cause: reason,
    });
    this.name = "CancellationError";
    this.reason = reason;
  }
}

export class NotFoundError extends StorageError {
  readonly key: string;

  constructor(message: string, key: string) {
    super(message);
    this.name = "NotFoundError";
    this.key = key;
  }
}

// ─── CLASSIFICATION ────────────────────────────────────────────

const TRANSIENT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
]);

const TRANSIENT_PHRASES = [
  "connection refused",
  "connection reset",
  "timeout",
  "timed out",
  "bad connection",
  "invalid connection",
  "broken pipe",
  "no such host",
  "database is locked",
];

function errorCode(err: object): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function isTransientCode(code: string): boolean {
  if (TRANSIENT_CODES.has(code)) return true;
  // Extended SQLite result codes, e.g. SQLITE_BUSY_SNAPSHOT
  return code.startsWith("SQLITE_BUSY_") || code.startsWith("SQLITE_LOCKED_");
}

/**
 * Single place that decides whether a failure is worth retrying.
 * Structured codes win; message matching is the last resort.
 */
export function isTransientError(err: unknown): boolean {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);

    // Raised by this layer itself: already retried, cancelled, or a
    // definite answer such as a missing key. Message text is not inspected.
    if (current instanceof StorageError) return false;

    const code = errorCode(current);
    if (code && isTransientCode(code)) return true;

    const message = current.message.toLowerCase();
    if (TRANSIENT_PHRASES.some((phrase) => message.includes(phrase))) {
      return true;
    }

    current = current.cause;
  }

  return false;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
