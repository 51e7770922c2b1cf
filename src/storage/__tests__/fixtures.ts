// src/storage/__tests__/fixtures.ts

import { MEMORY_DATABASE } from "../../db/connection";
import { SqliteStorageService } from "../service";

export const T0 = new Date("2026-01-01T12:00:00.000Z");

export function secondsBefore(base: Date, seconds: number): Date {
  return new Date(base.getTime() - seconds * 1000);
}

export function secondsAfter(base: Date, seconds: number): Date {
  return new Date(base.getTime() + seconds * 1000);
}

/** A controllable clock; `clock.set()` moves "now". */
export function createClock(start: Date = T0) {
  let current = start;
  return {
    now: () => current,
    set: (next: Date) => {
      current = next;
    },
  };
}

export async function createTestStorage(
  now: () => Date = () => T0,
): Promise<SqliteStorageService> {
  const storage = new SqliteStorageService(
    { path: MEMORY_DATABASE, busyTimeoutMs: 1000, maxLifetimeMs: 0 },
    { clock: now },
  );
  await storage.initialize();
  return storage;
}
