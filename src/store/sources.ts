// pattern: Imperative Shell
import { asc, eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { sources } from "../db/schema";
import type { SourceRow } from "../db/schema";

export type SourceRegistry = ReturnType<typeof createSourceRegistry>;

export function createSourceRegistry(
  db: AppDatabase,
  clock: () => Date = () => new Date(),
) {
  return {
    /** Records the result of one fetch attempt; `error` null means success. */
    recordFetch(sourceId: string, error: string | null): void {
      db.update(sources)
        .set(
          error === null
            ? { lastFetchedAt: clock(), lastError: null }
            : { lastError: error },
        )
        .where(eq(sources.id, sourceId))
        .run();
    },

    list(): Array<SourceRow> {
      return db.select().from(sources).orderBy(asc(sources.id)).all();
    },
  };
}
