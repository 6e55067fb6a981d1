// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { CycleOutcome, CycleTrigger } from "../db/schema";
import { StoreInvariantViolation, errorMessage } from "../errors";
import type { RawItem, SourceAdapter } from "../sources";
import type { CycleLog } from "../store/cycles";
import type { Item, ItemStore } from "../store/items";
import type { SourceRegistry } from "../store/sources";
import { filterNew } from "./dedup";
import type { Publisher } from "./publisher";
import { splitIntoBatches } from "./summarizer";
import type { Summarizer } from "./summarizer";

export type CyclePhase =
  | "idle"
  | "fetching"
  | "deduping"
  | "summarizing"
  | "publishing"
  | "finalizing";

export type BatchFailure = {
  readonly stage: "summarize" | "publish";
  readonly itemCount: number;
  readonly error: string;
  readonly permanent: boolean;
};

export type CycleReport = {
  readonly cycleId: number;
  readonly trigger: CycleTrigger;
  readonly outcome: CycleOutcome;
  readonly itemsConsidered: number;
  readonly itemsPosted: number;
  readonly sourcesFailed: number;
  readonly batchesPosted: number;
  readonly batchesFailed: number;
  readonly failures: ReadonlyArray<BatchFailure>;
  readonly startedAt: Date;
  readonly finishedAt: Date;
};

export type CycleDeps = {
  readonly items: ItemStore;
  readonly cycles: CycleLog;
  readonly sourceRegistry: SourceRegistry;
  readonly sources: ReadonlyArray<SourceAdapter>;
  readonly summarizer: Summarizer;
  readonly publisher: Publisher;
  readonly config: Pick<AppConfig, "fetch" | "batch" | "items" | "filter">;
  readonly logger: Logger;
  readonly onPhase?: (phase: CyclePhase) => void;
};

type FetchOutcome = {
  readonly source: SourceAdapter;
  readonly items: ReadonlyArray<RawItem>;
  readonly error: string | null;
};

export function decideOutcome(failures: number, successes: number): CycleOutcome {
  if (failures === 0) return "ok";
  return successes > 0 ? "partial" : "failed";
}

async function fetchAll(deps: CycleDeps): Promise<Array<FetchOutcome>> {
  const limit = pLimit(deps.config.fetch.maxConcurrency);

  return Promise.all(
    deps.sources.map((source) =>
      limit(async (): Promise<FetchOutcome> => {
        let outcome: FetchOutcome;
        try {
          const items = await source.fetch();
          deps.logger.info(
            { sourceId: source.id, itemCount: items.length },
            "source fetched",
          );
          outcome = { source, items, error: null };
        } catch (err) {
          const message = errorMessage(err);
          deps.logger.warn(
            { sourceId: source.id, error: message },
            "source fetch failed, skipping for this cycle",
          );
          outcome = { source, items: [], error: message };
        }

        deps.sourceRegistry.recordFetch(source.id, outcome.error);
        return outcome;
      }),
    ),
  );
}

/**
 * Runs one polling cycle: fetch → dedup → (summarize → publish) per batch →
 * finalize. Source and batch failures are contained and reported, as is
 * an invariant violation in a batch's state bookkeeping. Database errors and
 * violations while recording a completed post propagate to the caller.
 */
export async function runCycle(
  deps: CycleDeps,
  trigger: CycleTrigger,
): Promise<CycleReport> {
  const { items: store, logger } = deps;
  const phase = (next: CyclePhase) => deps.onPhase?.(next);

  const startedAt = new Date();
  const cycleId = deps.cycles.open(trigger);
  logger.info({ cycleId, trigger }, "cycle starting");

  phase("fetching");
  const fetched = await fetchAll(deps);
  const sourcesFailed = fetched.filter((f) => f.error !== null).length;

  phase("deduping");
  const carried = store.listByState(["new", "summarized"]);
  const fresh: Array<Item> = [];
  for (const result of fetched) {
    if (result.error !== null) continue;
    const dedup = filterNew(
      store,
      result.source.id,
      result.items,
      logger,
      deps.config.filter.keywords,
    );
    fresh.push(...dedup.fresh);
  }

  const pending = [...carried, ...fresh];
  if (carried.length > 0) {
    logger.info({ cycleId, carriedCount: carried.length }, "re-queued pending items");
  }

  let itemsPosted = 0;
  let batchesPosted = 0;
  const failures: Array<BatchFailure> = [];

  /**
   * Runs a per-batch store update. An invariant violation aborts only this
   * batch: it is logged, counted as a failure and the cycle moves on.
   * Any other store error propagates.
   */
  const guardBatch = (
    batch: ReadonlyArray<Item>,
    stage: BatchFailure["stage"],
    update: () => void,
  ): boolean => {
    try {
      update();
      return true;
    } catch (err) {
      if (!(err instanceof StoreInvariantViolation)) throw err;
      logger.error(
        { cycleId, stage, reason: err.reason, itemCount: batch.length, error: err.message },
        "store rejected batch update, batch aborted",
      );
      failures.push({ stage, itemCount: batch.length, error: err.message, permanent: true });
      return false;
    }
  };

  const recordFailure = (
    batch: ReadonlyArray<Item>,
    stage: BatchFailure["stage"],
    error: string,
    transient: boolean,
  ) => {
    const recorded = guardBatch(batch, stage, () => {
      if (transient) {
        const result = store.recordFailedAttempt(
          batch,
          error,
          deps.config.items.maxAttempts,
        );
        if (result.failed.length > 0) {
          logger.error(
            { cycleId, stage, failedCount: result.failed.length, error },
            "items exceeded retry limit, marked failed",
          );
        }
      } else {
        store.markMany(batch, "failed", { lastError: error });
        logger.error(
          { cycleId, stage, itemCount: batch.length, error },
          "permanent failure, batch marked failed",
        );
      }
    });
    if (recorded) {
      failures.push({ stage, itemCount: batch.length, error, permanent: !transient });
    }
  };

  if (pending.length === 0) {
    logger.info({ cycleId }, "no pending items, skipping summarize and publish");
  } else {
    const batches = splitIntoBatches(pending, deps.config.batch);
    logger.info(
      { cycleId, itemCount: pending.length, batchCount: batches.length },
      "processing batches",
    );

    for (const batch of batches) {
      phase("summarizing");
      const summary = await deps.summarizer.summarize(batch, logger);
      if (!summary.success) {
        recordFailure(batch, "summarize", summary.error, summary.transient);
        continue;
      }

      const marked = guardBatch(batch, "summarize", () =>
        store.markMany(
          batch.filter((item) => item.state === "new"),
          "summarized",
        ),
      );
      if (!marked) continue;

      phase("publishing");
      const published = await deps.publisher.publish(summary.text, logger);
      if (!published.success) {
        recordFailure(batch, "publish", published.error, published.transient);
        continue;
      }

      store.markPosted(batch, {
        cycleId,
        messageId: published.messageId,
        text: summary.text,
      });
      itemsPosted += batch.length;
      batchesPosted++;
    }
  }

  phase("finalizing");
  const successes = fetched.length - sourcesFailed + batchesPosted;
  const outcome = decideOutcome(sourcesFailed + failures.length, successes);
  const firstError =
    failures[0]?.error ?? fetched.find((f) => f.error !== null)?.error ?? null;

  const row = deps.cycles.complete(cycleId, {
    outcome,
    itemsConsidered: pending.length,
    itemsPosted,
    sourcesFailed,
    batchesFailed: failures.length,
    error: firstError,
  });
  phase("idle");

  const report: CycleReport = {
    cycleId,
    trigger,
    outcome,
    itemsConsidered: pending.length,
    itemsPosted,
    sourcesFailed,
    batchesPosted,
    batchesFailed: failures.length,
    failures,
    startedAt,
    finishedAt: row.finishedAt ?? new Date(),
  };

  const level = outcome === "ok" ? "info" : outcome === "partial" ? "warn" : "error";
  logger[level](
    {
      cycleId,
      outcome,
      itemsConsidered: report.itemsConsidered,
      itemsPosted,
      sourcesFailed,
      batchesFailed: report.batchesFailed,
    },
    "cycle complete",
  );

  return report;
}

export type ReconcileResult = {
  readonly interruptedCycles: ReadonlyArray<number>;
  readonly requeued: number;
};

/**
 * Startup recovery: closes cycles left open by an earlier process and counts
 * the `new`/`summarized` items the next cycle will pick up again.
 */
export function reconcile(
  deps: Pick<CycleDeps, "items" | "cycles" | "logger">,
): ReconcileResult {
  const interruptedCycles = deps.cycles.closeInterrupted();
  const requeued = deps.items.listByState(["new", "summarized"]).length;

  if (interruptedCycles.length > 0) {
    deps.logger.warn(
      { cycleIds: interruptedCycles },
      "closed cycles interrupted by a previous shutdown",
    );
  }
  deps.logger.info({ requeued }, "reconciliation complete");

  return { interruptedCycles, requeued };
}
