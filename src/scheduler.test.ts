import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Mock } from "vitest";
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import pino from "pino";
import { createCycleScheduler } from "./scheduler";
import type { RunCycleFn } from "./scheduler";
import type { CycleReport } from "./pipeline/orchestrator";
import type { CycleTrigger } from "./db/schema";

vi.mock("node-cron");

const logger = pino({ level: "silent" });

function report(trigger: CycleTrigger, cycleId = 1): CycleReport {
  return {
    cycleId,
    trigger,
    outcome: "ok",
    itemsConsidered: 0,
    itemsPosted: 0,
    sourcesFailed: 0,
    batchesPosted: 0,
    batchesFailed: 0,
    failures: [],
    startedAt: new Date("2026-03-01T12:00:00Z"),
    finishedAt: new Date("2026-03-01T12:00:05Z"),
  };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("createCycleScheduler", () => {
  let tick: () => void;
  let taskStop: ReturnType<typeof vi.fn>;
  let runCycle: Mock<RunCycleFn>;

  beforeEach(() => {
    vi.clearAllMocks();
    tick = () => undefined;
    taskStop = vi.fn();

    vi.mocked(cron.schedule).mockImplementation((_expression, callback) => {
      tick = () => {
        if (typeof callback === "function") callback(new Date());
      };
      return { stop: taskStop } as unknown as ScheduledTask;
    });

    runCycle = vi.fn<RunCycleFn>(async (trigger) => report(trigger));
  });

  it("registers a cron task with the configured schedule", () => {
    createCycleScheduler({ schedule: "*/10 * * * *", runCycle, logger });

    expect(vi.mocked(cron.schedule)).toHaveBeenCalledWith(
      "*/10 * * * *",
      expect.any(Function),
    );
  });

  it("runs a cycle on each tick", async () => {
    const scheduler = createCycleScheduler({ schedule: "* * * * *", runCycle, logger });

    tick();
    await scheduler.idle();

    expect(runCycle).toHaveBeenCalledWith("schedule", expect.any(Function));
    expect(scheduler.status().lastReport?.trigger).toBe("schedule");
  });

  it("skips ticks while paused but still runs manual triggers", async () => {
    const scheduler = createCycleScheduler({ schedule: "* * * * *", runCycle, logger });

    scheduler.pause();
    tick();
    expect(runCycle).not.toHaveBeenCalled();

    const result = scheduler.triggerNow();
    await scheduler.idle();

    expect(result).toEqual({ accepted: true, queued: false, message: "cycle started" });
    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(runCycle).toHaveBeenCalledWith("manual", expect.any(Function));

    scheduler.resume();
    tick();
    await scheduler.idle();
    expect(runCycle).toHaveBeenCalledTimes(2);
  });

  it("never runs two cycles at once and coalesces queued requests", async () => {
    const first = deferred<CycleReport>();
    runCycle.mockImplementationOnce(() => first.promise);
    const scheduler = createCycleScheduler({ schedule: "* * * * *", runCycle, logger });

    tick();
    expect(scheduler.status().running).toBe(true);

    tick();
    const queued = scheduler.triggerNow();
    scheduler.triggerNow();

    expect(queued).toEqual({
      accepted: true,
      queued: true,
      message: "cycle in flight, run queued",
    });
    expect(scheduler.status().queued).toBe("manual");
    expect(runCycle).toHaveBeenCalledTimes(1);

    first.resolve(report("schedule"));
    await scheduler.idle();

    expect(runCycle).toHaveBeenCalledTimes(2);
    expect(runCycle.mock.calls[1]?.[0]).toBe("manual");
    expect(scheduler.status().running).toBe(false);
  });

  it("drops a queued tick when paused in the meantime", async () => {
    const first = deferred<CycleReport>();
    runCycle.mockImplementationOnce(() => first.promise);
    const scheduler = createCycleScheduler({ schedule: "* * * * *", runCycle, logger });

    tick();
    tick();
    scheduler.pause();
    first.resolve(report("schedule"));
    await scheduler.idle();

    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it("exposes the phase of the running cycle", async () => {
    const gate = deferred<CycleReport>();
    runCycle.mockImplementationOnce((_trigger, onPhase) => {
      onPhase("summarizing");
      return gate.promise;
    });
    const scheduler = createCycleScheduler({ schedule: "* * * * *", runCycle, logger });

    scheduler.triggerNow();
    expect(scheduler.status().phase).toBe("summarizing");

    gate.resolve(report("manual"));
    await scheduler.idle();
    expect(scheduler.status().phase).toBe("idle");
  });

  it("returns the report from runOnce", async () => {
    const scheduler = createCycleScheduler({ schedule: "* * * * *", runCycle, logger });

    const result = await scheduler.runOnce("startup");

    expect(result?.trigger).toBe("startup");
  });

  it("stops and reports a fatal cycle error", async () => {
    const failure = new Error("disk I/O error");
    runCycle.mockRejectedValueOnce(failure);
    const onFatal = vi.fn();
    const scheduler = createCycleScheduler({
      schedule: "* * * * *",
      runCycle,
      logger,
      onFatal,
    });

    await scheduler.runOnce("manual");

    expect(onFatal).toHaveBeenCalledWith(failure);
    expect(scheduler.status()).toMatchObject({
      stopped: true,
      lastFatalError: "disk I/O error",
    });
    expect(scheduler.triggerNow()).toEqual({
      accepted: false,
      queued: false,
      message: "scheduler is stopped",
    });
    tick();
    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it("stops the cron task", () => {
    const scheduler = createCycleScheduler({ schedule: "* * * * *", runCycle, logger });

    scheduler.stop();

    expect(taskStop).toHaveBeenCalledTimes(1);
    expect(scheduler.status().stopped).toBe(true);
  });
});
