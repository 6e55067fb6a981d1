import { describe, it, expect, beforeEach } from "vitest";
import type { AppDatabase } from "../../db";
import { createCycleLog } from "../../store/cycles";
import { createItemStore } from "../../store/items";
import {
  createStubScheduler,
  createTestCaller,
  createTestDatabase,
  seedTestSource,
  testItem,
} from "../../test-utils/db";

describe("control router", () => {
  let db: AppDatabase;

  beforeEach(() => {
    db = createTestDatabase();
  });

  it("reports scheduler state, last cycle and item counts", async () => {
    seedTestSource(db);
    createItemStore(db).insertNew(testItem("test-source", "a"));
    const cycles = createCycleLog(db);
    const cycleId = cycles.open("schedule");

    const status = await createTestCaller(db).control.status();

    expect(status).toMatchObject({
      schedule: "*/15 * * * *",
      paused: false,
      running: false,
      stopped: false,
      phase: "idle",
      provider: "anthropic",
      model: "claude-3-5-sonnet-20241022",
      sourceCount: 1,
      itemCounts: { new: 1, summarized: 0, posted: 0, failed: 0 },
    });
    expect(status.lastCycle?.id).toBe(cycleId);
  });

  it("pauses and resumes the scheduler", async () => {
    const scheduler = createStubScheduler();
    const caller = createTestCaller(db, { scheduler });

    const paused = await caller.control.pause();
    expect(paused.paused).toBe(true);

    const resumed = await caller.control.resume();
    expect(resumed.paused).toBe(false);
    expect(scheduler.calls).toEqual(["pause", "resume"]);
  });

  it("triggers a cycle", async () => {
    const scheduler = createStubScheduler();

    const result = await createTestCaller(db, { scheduler }).control.trigger();

    expect(result).toEqual({ accepted: true, queued: false, message: "cycle started" });
    expect(scheduler.calls).toEqual(["triggerNow"]);
  });

  describe("authorization", () => {
    it("rejects a request without a token", async () => {
      const caller = createTestCaller(db, { requestToken: null });

      await expect(caller.control.status()).rejects.toMatchObject({
        code: "UNAUTHORIZED",
        message: "admin token required",
      });
    });

    it("rejects a wrong token and leaves the scheduler alone", async () => {
      const scheduler = createStubScheduler();
      const caller = createTestCaller(db, { scheduler, requestToken: "wrong" });

      await expect(caller.control.pause()).rejects.toMatchObject({
        code: "UNAUTHORIZED",
      });
      expect(scheduler.calls).toEqual([]);
    });

    it("refuses every call when no admin token is configured", async () => {
      const caller = createTestCaller(db, { adminToken: null, requestToken: null });

      await expect(caller.control.trigger()).rejects.toMatchObject({
        code: "FORBIDDEN",
        message: "control API disabled: no admin token configured",
      });
    });
  });
});
