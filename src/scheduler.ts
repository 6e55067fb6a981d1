import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { CycleTrigger } from "./db/schema";
import { errorMessage } from "./errors";
import type { CyclePhase, CycleReport } from "./pipeline/orchestrator";

export type RunCycleFn = (
  trigger: CycleTrigger,
  onPhase: (phase: CyclePhase) => void,
) => Promise<CycleReport>;

export type SchedulerStatus = {
  readonly schedule: string;
  readonly paused: boolean;
  readonly running: boolean;
  readonly stopped: boolean;
  readonly queued: CycleTrigger | null;
  readonly phase: CyclePhase;
  readonly lastReport: CycleReport | null;
  readonly lastFatalError: string | null;
};

export type TriggerResult = {
  readonly accepted: boolean;
  readonly queued: boolean;
  readonly message: string;
};

export type CycleScheduler = {
  readonly stop: () => void;
  readonly pause: () => void;
  readonly resume: () => void;
  readonly triggerNow: () => TriggerResult;
  readonly runOnce: (trigger: CycleTrigger) => Promise<CycleReport | null>;
  readonly idle: () => Promise<void>;
  readonly status: () => SchedulerStatus;
};

export type CycleSchedulerDeps = {
  readonly schedule: string;
  readonly runCycle: RunCycleFn;
  readonly logger: Logger;
  readonly onFatal?: (err: unknown) => void;
};

/**
 * Creates and starts a scheduler that runs pipeline cycles on the configured
 * cron schedule, one at a time.
 *
 * All triggers (cron ticks, manual triggers, startup runs) pass through one
 * lock: a request that arrives while a cycle is running is queued and runs
 * right after it. Queued requests coalesce, so at most one run is pending.
 * Pausing skips cron ticks only; manual triggers still run.
 *
 * A cycle that throws is treated as fatal: the scheduler stops taking work
 * and hands the error to `onFatal`.
 */
export function createCycleScheduler(deps: CycleSchedulerDeps): CycleScheduler {
  const { logger } = deps;

  let paused = false;
  let stopped = false;
  let phase: CyclePhase = "idle";
  let queued: CycleTrigger | null = null;
  let running: Promise<void> | null = null;
  let lastReport: CycleReport | null = null;
  let lastFatalError: string | null = null;

  async function execute(trigger: CycleTrigger): Promise<void> {
    try {
      lastReport = await deps.runCycle(trigger, (next) => {
        phase = next;
      });
    } catch (err) {
      const message = errorMessage(err);
      lastFatalError = message;
      stopped = true;
      logger.fatal({ trigger, error: message }, "cycle failed in store bookkeeping");
      deps.onFatal?.(err);
    } finally {
      phase = "idle";
    }
  }

  async function drain(first: CycleTrigger): Promise<void> {
    let next: CycleTrigger | null = first;
    while (next !== null && !stopped) {
      await execute(next);
      next = queued;
      queued = null;
      if (next === "schedule" && paused) {
        logger.info("scheduler paused, dropping queued tick");
        next = null;
      }
    }
    running = null;
  }

  function request(trigger: CycleTrigger): "started" | "queued" {
    if (running) {
      if (queued === null || trigger === "manual") queued = trigger;
      logger.info({ trigger }, "cycle in flight, request queued");
      return "queued";
    }
    running = drain(trigger);
    return "started";
  }

  const task: ScheduledTask = cron.schedule(deps.schedule, () => {
    if (stopped) return;
    if (paused) {
      logger.info("scheduler paused, skipping tick");
      return;
    }
    request("schedule");
  });

  return {
    stop: () => {
      stopped = true;
      queued = null;
      task.stop();
    },

    pause: () => {
      paused = true;
      logger.info("scheduler paused");
    },

    resume: () => {
      paused = false;
      logger.info("scheduler resumed");
    },

    triggerNow: () => {
      if (stopped) {
        return { accepted: false, queued: false, message: "scheduler is stopped" };
      }
      const result = request("manual");
      return result === "queued"
        ? { accepted: true, queued: true, message: "cycle in flight, run queued" }
        : { accepted: true, queued: false, message: "cycle started" };
    },

    runOnce: async (trigger) => {
      if (stopped) return null;
      request(trigger);
      await (running ?? Promise.resolve());
      return lastReport;
    },

    idle: () => running ?? Promise.resolve(),

    status: () => ({
      schedule: deps.schedule,
      paused,
      running: running !== null,
      stopped,
      queued,
      phase,
      lastReport,
      lastFatalError,
    }),
  };
}
