// src/storage/__tests__/service.test.ts

import { StorageError } from "../../db/errors";
import { createTestStorage } from "./fixtures";

describe("SqliteStorageService", () => {
  it("should pass a health check once initialized", async () => {
    const storage = await createTestStorage();
    await expect(storage.healthCheck()).resolves.toBeUndefined();
    storage.close();
  });

  it("should tolerate initialize running twice", async () => {
    const storage = await createTestStorage();
    await expect(storage.initialize()).resolves.toBeUndefined();
    storage.close();
  });

  it("should report absent records as null for every entity", async () => {
    const storage = await createTestStorage();

    await expect(storage.checkpoints.get("c", null)).resolves.toBeNull();
    await expect(storage.threadOwnerships.get("t")).resolves.toBeNull();
    await expect(storage.configurations.get("k")).resolves.toBeNull();
    storage.close();
  });

  it("should refuse work after close", async () => {
    const storage = await createTestStorage();
    storage.close();

    const check = storage.healthCheck();
    await expect(check).rejects.toBeInstanceOf(StorageError);
    await expect(check).rejects.toThrow("connection manager is closed");
  });
});
