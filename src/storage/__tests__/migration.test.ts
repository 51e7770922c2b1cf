// src/storage/__tests__/migration.test.ts

import { StorageError } from "../../db/errors";
import { StorageMigrator } from "../migration";
import { SqliteStorageService } from "../service";
import { T0, createTestStorage, secondsAfter, secondsBefore } from "./fixtures";

describe("StorageMigrator", () => {
  let source: SqliteStorageService;
  let target: SqliteStorageService;

  beforeEach(async () => {
    source = await createTestStorage(() => T0);
    target = await createTestStorage(() => secondsAfter(T0, 3600));

    await source.checkpoints.upsert({
      channelId: "42",
      lastMessageId: "A",
      lastSeenAt: secondsBefore(T0, 30),
    });
    await source.checkpoints.upsert({
      channelId: "42",
      threadId: "thread-1",
      lastMessageId: "B",
      lastSeenAt: secondsBefore(T0, 60),
    });
    await source.threadOwnerships.upsert({
      threadId: "thread-1",
      originalUserId: "user-1",
      createdBy: "bot-1",
      creationTime: secondsBefore(T0, 90),
    });
    await source.configurations.upsert({ key: "k1", value: "1", category: "a" });
    await source.configurations.upsert({
      key: "k2",
      value: "2m",
      type: "duration",
      category: "b",
    });
  });

  afterEach(() => {
    source.close();
    target.close();
  });

  it("should copy every record and report counts", async () => {
    const migrator = new StorageMigrator(source, target);

    await expect(migrator.migrate()).resolves.toEqual({
      checkpoints: 2,
      threadOwnerships: 1,
      configurations: 2,
    });

    const thread = await target.checkpoints.get("42", "thread-1");
    expect(thread?.lastMessageId).toBe("B");
    expect(thread?.createdAt).toEqual(T0);

    const config = await target.configurations.get("k2");
    expect(config?.type).toBe("duration");
    expect(config?.value).toBe("2m");

    await expect(migrator.validate()).resolves.toEqual({
      checkpoints: 2,
      threadOwnerships: 1,
      configurations: 2,
    });
  });

  it("should not duplicate rows when run twice", async () => {
    const migrator = new StorageMigrator(source, target);
    await migrator.migrate();
    await migrator.migrate();

    await expect(target.checkpoints.getAll()).resolves.toHaveLength(2);
    await expect(migrator.validate()).resolves.toBeDefined();
  });

  it("should fail validation on a count mismatch", async () => {
    const migrator = new StorageMigrator(source, target);
    await migrator.migrate();
    await source.configurations.upsert({ key: "k3", value: "3", category: "a" });

    const check = migrator.validate();
    await expect(check).rejects.toBeInstanceOf(StorageError);
    await expect(check).rejects.toThrow(
      "migration count mismatch (configurations: source=3, target=2)",
    );
  });
});
