import { describe, it, expect, beforeEach } from "vitest";
import type { AppDatabase } from "../../db";
import { createItemStore } from "../../store/items";
import {
  createTestCaller,
  createTestDatabase,
  seedTestSource,
  testItem,
} from "../../test-utils/db";

describe("items router", () => {
  let db: AppDatabase;

  beforeEach(() => {
    db = createTestDatabase();
    const sourceId = seedTestSource(db);
    const store = createItemStore(db);
    store.insertNew(testItem(sourceId, "a"));
    store.insertNew(testItem(sourceId, "b"));
    store.insertNew(testItem(sourceId, "c"));
    store.mark({ sourceId, itemKey: "b" }, "failed", { lastError: "auth: bad key" });
  });

  it("lists recent items newest first", async () => {
    const result = await createTestCaller(db).items.list({});

    expect(result.map((i) => i.itemKey)).toEqual(["c", "b", "a"]);
  });

  it("filters by state and limit", async () => {
    const caller = createTestCaller(db);

    expect((await caller.items.list({ state: "new", limit: 1 })).map((i) => i.itemKey)).toEqual([
      "c",
    ]);
  });

  it("lists failed items with their error", async () => {
    const failed = await createTestCaller(db).items.failed({});

    expect(failed).toHaveLength(1);
    expect(failed[0]?.lastError).toBe("auth: bad key");
  });

  it("rejects an out-of-range limit", async () => {
    await expect(createTestCaller(db).items.list({ limit: 501 })).rejects.toMatchObject({
      code: "BAD_REQUEST",
    });
  });
});
