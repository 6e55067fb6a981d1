// pattern: Imperative Shell
import { and, desc, eq, isNull } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { cycles, posts } from "../db/schema";
import type { CycleOutcome, CycleRow, CycleTrigger, PostRow } from "../db/schema";
import { StoreInvariantViolation } from "../errors";

export type CycleCompletion = {
  readonly outcome: CycleOutcome;
  readonly itemsConsidered: number;
  readonly itemsPosted: number;
  readonly sourcesFailed: number;
  readonly batchesFailed: number;
  readonly error: string | null;
};

export type CycleLog = ReturnType<typeof createCycleLog>;

/**
 * Append-only cycle audit log. A row is opened when a cycle starts and
 * completed exactly once; completed rows are never touched again.
 */
export function createCycleLog(
  db: AppDatabase,
  clock: () => Date = () => new Date(),
) {
  return {
    open(trigger: CycleTrigger): number {
      const rows = db
        .insert(cycles)
        .values({ trigger, startedAt: clock() })
        .returning({ id: cycles.id })
        .all();

      const id = rows[0]?.id;
      if (id === undefined) {
        throw new StoreInvariantViolation("missing_row", "cycle row was not created");
      }
      return id;
    },

    complete(id: number, completion: CycleCompletion): CycleRow {
      const rows = db
        .update(cycles)
        .set({ ...completion, finishedAt: clock() })
        .where(and(eq(cycles.id, id), isNull(cycles.finishedAt)))
        .returning()
        .all();

      const row = rows[0];
      if (!row) {
        throw new StoreInvariantViolation(
          "cycle_closed",
          `cycle ${id} is missing or already completed`,
        );
      }
      return row;
    },

    /**
     * Closes every cycle left open by a crashed or killed process.
     * Returns the ids that were closed.
     */
    closeInterrupted(): Array<number> {
      return db
        .update(cycles)
        .set({ outcome: "failed", finishedAt: clock(), error: "interrupted" })
        .where(isNull(cycles.finishedAt))
        .returning({ id: cycles.id })
        .all()
        .map((row) => row.id);
    },

    recent(limit: number): Array<CycleRow> {
      return db
        .select()
        .from(cycles)
        .orderBy(desc(cycles.id))
        .limit(limit)
        .all();
    },

    recentPosts(limit: number): Array<PostRow> {
      return db
        .select()
        .from(posts)
        .orderBy(desc(posts.id))
        .limit(limit)
        .all();
    },
  };
}
