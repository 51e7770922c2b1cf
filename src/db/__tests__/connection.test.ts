// src/db/__tests__/connection.test.ts

import Database from "better-sqlite3";
import { ConnectionManager, DatabaseConfig, MEMORY_DATABASE } from "../connection";
import {
  CancellationError,
  ConnectionError,
  RetryExhaustedError,
  StorageError,
} from "../errors";

const FAST = { maxAttempts: 5, baseDelayMs: 1 };

function fileConfig(path = "test.db", maxLifetimeMs = 0): DatabaseConfig {
  return { path, busyTimeoutMs: 100, maxLifetimeMs };
}

function codedError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function memoryOpener() {
  return jest.fn((_config: DatabaseConfig) => new Database(MEMORY_DATABASE));
}

describe("ConnectionManager.connect", () => {
  it("should give up after every connect attempt fails transiently", async () => {
    const opener = jest.fn((_config: DatabaseConfig): Database.Database => {
      throw codedError("connect ECONNREFUSED 10.0.0.5:3306", "ECONNREFUSED");
    });
    const manager = new ConnectionManager(fileConfig(), { opener, connectPolicy: FAST });

    const connecting = manager.connect();
    await expect(connecting).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(connecting).rejects.toThrow("connect to database failed after 5 attempts");
    expect(opener).toHaveBeenCalledTimes(5);
    expect(manager.isConnected()).toBe(false);
  });

  it("should fail fast on a fatal open error", async () => {
    const opener = jest.fn((_config: DatabaseConfig): Database.Database => {
      throw codedError("unable to open database file", "SQLITE_CANTOPEN");
    });
    const manager = new ConnectionManager(fileConfig("bad.db"), { opener, connectPolicy: FAST });

    const connecting = manager.connect();
    await expect(connecting).rejects.toBeInstanceOf(ConnectionError);
    await expect(connecting).rejects.toThrow(
      "failed to open database bad.db: unable to open database file",
    );
    expect(opener).toHaveBeenCalledTimes(1);
  });

  it("should recover when a later attempt succeeds", async () => {
    let calls = 0;
    const opener = jest.fn((_config: DatabaseConfig) => {
      calls++;
      if (calls < 3) throw codedError("read ECONNRESET", "ECONNRESET");
      return new Database(MEMORY_DATABASE);
    });
    const manager = new ConnectionManager(fileConfig(), { opener, connectPolicy: FAST });

    const handle = await manager.connect();
    expect(handle.sqlite.open).toBe(true);
    expect(opener).toHaveBeenCalledTimes(3);
    expect(manager.isConnected()).toBe(true);
    manager.close();
  });

  it("should not open anything when the signal is already aborted", async () => {
    const opener = memoryOpener();
    const manager = new ConnectionManager(fileConfig(), { opener });

    await expect(manager.connect({ signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
      CancellationError,
    );
    expect(opener).not.toHaveBeenCalled();
  });

  it("should stop waiting between attempts once cancelled", async () => {
    const opener = jest.fn((_config: DatabaseConfig): Database.Database => {
      throw codedError("connect ECONNREFUSED", "ECONNREFUSED");
    });
    const manager = new ConnectionManager(fileConfig(), {
      opener,
      connectPolicy: { maxAttempts: 5, baseDelayMs: 60_000 },
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const started = Date.now();
    await expect(manager.connect({ signal: controller.signal })).rejects.toBeInstanceOf(
      CancellationError,
    );
    expect(Date.now() - started).toBeLessThan(5_000);
    expect(opener).toHaveBeenCalledTimes(1);
  });

  it("should share one open between concurrent callers", async () => {
    const opener = memoryOpener();
    const manager = new ConnectionManager(fileConfig(), { opener });

    const [first, second] = await Promise.all([manager.connect(), manager.connect()]);
    expect(first).toBe(second);
    expect(opener).toHaveBeenCalledTimes(1);
    manager.close();
  });

  it("should keep a shared open going for callers that did not cancel", async () => {
    let calls = 0;
    const opener = jest.fn((_config: DatabaseConfig) => {
      calls++;
      if (calls < 3) throw codedError("connect ECONNREFUSED", "ECONNREFUSED");
      return new Database(MEMORY_DATABASE);
    });
    const manager = new ConnectionManager(fileConfig(), {
      opener,
      connectPolicy: { maxAttempts: 5, baseDelayMs: 30 },
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const cancelled = manager.connect({ signal: controller.signal });
    const patient = manager.connect();

    await expect(cancelled).rejects.toBeInstanceOf(CancellationError);
    const handle = await patient;
    expect(handle.sqlite.open).toBe(true);
    expect(opener).toHaveBeenCalledTimes(3);
    manager.close();
  });

  it("should let a joining caller cancel without waiting for the shared open", async () => {
    let calls = 0;
    const opener = jest.fn((_config: DatabaseConfig) => {
      calls++;
      if (calls < 2) throw codedError("connect ECONNREFUSED", "ECONNREFUSED");
      return new Database(MEMORY_DATABASE);
    });
    const manager = new ConnectionManager(fileConfig(), {
      opener,
      connectPolicy: { maxAttempts: 5, baseDelayMs: 200 },
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const first = manager.connect();
    const joining = manager.connect({ signal: controller.signal });

    await expect(joining).rejects.toThrow("connect to database cancelled");
    // still in the first backoff
    expect(opener).toHaveBeenCalledTimes(1);

    const handle = await first;
    expect(handle.sqlite.open).toBe(true);
    expect(opener).toHaveBeenCalledTimes(2);
    manager.close();
  });

  it("should reopen the handle once its lifetime has passed", async () => {
    let now = new Date("2026-01-01T00:00:00.000Z");
    const opener = memoryOpener();
    const manager = new ConnectionManager(fileConfig("recycle.db", 1000), {
      opener,
      now: () => now,
    });

    const first = await manager.connect();
    now = new Date("2026-01-01T00:00:00.999Z");
    await expect(manager.connect()).resolves.toBe(first);

    now = new Date("2026-01-01T00:00:01.000Z");
    const second = await manager.connect();
    expect(second).not.toBe(first);
    expect(first.sqlite.open).toBe(false);
    expect(opener).toHaveBeenCalledTimes(2);
    manager.close();
  });

  it("should never recycle an in-memory database", async () => {
    let now = new Date("2026-01-01T00:00:00.000Z");
    const opener = memoryOpener();
    const manager = new ConnectionManager(
      { path: MEMORY_DATABASE, busyTimeoutMs: 100, maxLifetimeMs: 1000 },
      { opener, now: () => now },
    );

    const first = await manager.connect();
    now = new Date("2026-01-02T00:00:00.000Z");
    await expect(manager.connect()).resolves.toBe(first);
    expect(opener).toHaveBeenCalledTimes(1);
    manager.close();
  });

  it("should reopen after the driver handle was closed", async () => {
    const opener = memoryOpener();
    const manager = new ConnectionManager(fileConfig(), { opener });

    const first = await manager.connect();
    first.sqlite.close();
    expect(manager.isConnected()).toBe(false);

    const second = await manager.connect();
    expect(second.sqlite.open).toBe(true);
    expect(opener).toHaveBeenCalledTimes(2);
    manager.close();
  });
});

describe("ConnectionManager.execute", () => {
  it("should retry a busy database", async () => {
    const manager = new ConnectionManager(fileConfig(), {
      opener: memoryOpener(),
      executePolicy: { maxAttempts: 3, baseDelayMs: 1 },
    });
    let calls = 0;

    const result = await manager.execute("count rows", () => {
      calls++;
      if (calls === 1) throw codedError("database is locked", "SQLITE_BUSY");
      return 7;
    });

    expect(result).toBe(7);
    expect(calls).toBe(2);
    manager.close();
  });

  it("should hand the task a working drizzle handle", async () => {
    const manager = new ConnectionManager(fileConfig(), { opener: memoryOpener() });

    const row = await manager.execute("ping", ({ sqlite }) =>
      sqlite.prepare("SELECT 41 + 1 AS answer").get(),
    );
    expect(row).toEqual({ answer: 42 });
    manager.close();
  });

  it("should refuse work after close", async () => {
    const opener = memoryOpener();
    const manager = new ConnectionManager(fileConfig(), { opener });
    await manager.connect();
    manager.close();

    const run = manager.execute("ping", () => 1);
    await expect(run).rejects.toBeInstanceOf(StorageError);
    await expect(run).rejects.toThrow("connection manager is closed");
    expect(manager.isConnected()).toBe(false);
  });
});
