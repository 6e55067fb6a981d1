// pattern: Imperative Shell
import { and, asc, desc, eq, inArray, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { items, posts } from "../db/schema";
import type { ItemRow, ItemState } from "../db/schema";
import { StoreInvariantViolation } from "../errors";

export type Item = ItemRow;

export type ItemRef = {
  readonly sourceId: string;
  readonly itemKey: string;
};

export type NewItem = ItemRef & {
  readonly title: string | null;
  readonly url: string | null;
  readonly excerpt: string | null;
  readonly publishedAt: Date | null;
  readonly metadata: Readonly<Record<string, unknown>>;
};

export type InsertResult =
  | { readonly status: "inserted"; readonly item: Item }
  | { readonly status: "already_exists" };

export type MarkResult = "ok" | "not_found";

export type MarkPatch = {
  readonly lastError?: string | null;
};

export type PostRecord = {
  readonly cycleId: number;
  readonly messageId: string;
  readonly text: string;
};

type Tx = Parameters<Parameters<AppDatabase["transaction"]>[0]>[0];

type ItemUpdate = Partial<
  Pick<typeof items.$inferInsert, "lastError" | "postId">
>;

export type FailedAttemptResult = {
  readonly failed: ReadonlyArray<ItemRef>;
  readonly remaining: ReadonlyArray<ItemRef>;
};

/**
 * Legal forward moves of the item state machine. `posted` and `failed` are
 * terminal; `posted` is only reachable from `summarized`.
 */
const TRANSITIONS: Readonly<Record<ItemState, ReadonlyArray<ItemState>>> = {
  new: ["summarized", "failed"],
  summarized: ["posted", "failed"],
  posted: [],
  failed: [],
};

export function canTransition(from: ItemState, to: ItemState): boolean {
  return TRANSITIONS[from].includes(to);
}

function assertTransition(ref: ItemRef, from: ItemState, to: ItemState): void {
  if (!canTransition(from, to)) {
    throw new StoreInvariantViolation(
      "invalid_transition",
      `illegal transition ${from} -> ${to} for ${ref.sourceId}/${ref.itemKey}`,
    );
  }
}

function matchRef(ref: ItemRef) {
  return and(eq(items.sourceId, ref.sourceId), eq(items.itemKey, ref.itemKey));
}

function timestampsFor(state: ItemState, now: Date) {
  switch (state) {
    case "summarized":
      return { summarizedAt: now };
    case "posted":
      return { postedAt: now };
    default:
      return {};
  }
}

export type ItemStore = ReturnType<typeof createItemStore>;

/**
 * Durable item store. The single source of truth for which items have been
 * seen and how far each has progressed. Every method is a synchronous
 * better-sqlite3 statement or transaction, so state is persisted before it
 * returns.
 */
export function createItemStore(
  db: AppDatabase,
  clock: () => Date = () => new Date(),
) {
  function transition(
    tx: Tx,
    ref: ItemRef,
    to: ItemState,
    extra: ItemUpdate,
  ): MarkResult {
    const row = tx
      .select({ state: items.state })
      .from(items)
      .where(matchRef(ref))
      .get();

    if (!row) return "not_found";

    assertTransition(ref, row.state, to);

    tx.update(items)
      .set({ state: to, ...timestampsFor(to, clock()), ...extra })
      .where(and(matchRef(ref), eq(items.state, row.state)))
      .run();

    return "ok";
  }

  function transitionAll(
    refs: ReadonlyArray<ItemRef>,
    to: ItemState,
    extra: ItemUpdate,
  ): void {
    db.transaction((tx) => {
      for (const ref of refs) {
        if (transition(tx, ref, to, extra) === "not_found") {
          throw new StoreInvariantViolation(
            "missing_row",
            `item ${ref.sourceId}/${ref.itemKey} vanished from the store`,
          );
        }
      }
    });
  }

  return {
    hasSeen(sourceId: string, itemKey: string): boolean {
      const row = db
        .select({ id: items.id })
        .from(items)
        .where(matchRef({ sourceId, itemKey }))
        .get();
      return row !== undefined;
    },

    /**
     * Inserts an item in state `new`. Relies on the unique
     * `(source_id, item_key)` index, so of two racing inserts exactly one
     * reports `inserted`.
     */
    insertNew(item: NewItem): InsertResult {
      const rows = db
        .insert(items)
        .values({
          sourceId: item.sourceId,
          itemKey: item.itemKey,
          title: item.title,
          url: item.url,
          excerpt: item.excerpt,
          publishedAt: item.publishedAt,
          metadata: { ...item.metadata },
          state: "new",
          fetchedAt: clock(),
        })
        .onConflictDoNothing({ target: [items.sourceId, items.itemKey] })
        .returning()
        .all();

      const inserted = rows[0];
      return inserted
        ? { status: "inserted", item: inserted }
        : { status: "already_exists" };
    },

    get(ref: ItemRef): Item | undefined {
      return db.select().from(items).where(matchRef(ref)).get();
    },

    /**
     * Moves one item forward. Throws StoreInvariantViolation on a backward
     * or skipping move.
     */
    mark(ref: ItemRef, to: ItemState, patch: MarkPatch = {}): MarkResult {
      return db.transaction((tx) => transition(tx, ref, to, { ...patch }));
    },

    /** All-or-nothing version of `mark` for a whole batch. */
    markMany(
      refs: ReadonlyArray<ItemRef>,
      to: ItemState,
      patch: MarkPatch = {},
    ): void {
      transitionAll(refs, to, { ...patch });
    },

    /**
     * Records a successful publish: inserts the post row and moves every
     * item of the batch to `posted` in one transaction.
     */
    markPosted(refs: ReadonlyArray<ItemRef>, post: PostRecord): number {
      return db.transaction((tx) => {
        const inserted = tx
          .insert(posts)
          .values({
            cycleId: post.cycleId,
            messageId: post.messageId,
            text: post.text,
            itemCount: refs.length,
            postedAt: clock(),
          })
          .returning({ id: posts.id })
          .all();

        const postId = inserted[0]?.id;
        if (postId === undefined) {
          throw new StoreInvariantViolation("missing_row", "post row was not created");
        }

        for (const ref of refs) {
          const result = transition(tx, ref, "posted", {
            postId,
            lastError: null,
          });
          if (result === "not_found") {
            throw new StoreInvariantViolation(
              "missing_row",
              `item ${ref.sourceId}/${ref.itemKey} vanished from the store`,
            );
          }
        }

        return postId;
      });
    },

    /**
     * Bumps the retry counter of every item in a failed batch. Items that
     * reach `maxAttempts` move to `failed`; the rest keep their state.
     */
    recordFailedAttempt(
      refs: ReadonlyArray<ItemRef>,
      error: string,
      maxAttempts: number,
    ): FailedAttemptResult {
      return db.transaction((tx) => {
        const failed: Array<ItemRef> = [];
        const remaining: Array<ItemRef> = [];

        for (const ref of refs) {
          const row = tx
            .select({ state: items.state, attempts: items.attempts })
            .from(items)
            .where(matchRef(ref))
            .get();

          if (!row) {
            throw new StoreInvariantViolation(
              "missing_row",
              `item ${ref.sourceId}/${ref.itemKey} vanished from the store`,
            );
          }

          const attempts = row.attempts + 1;
          tx.update(items)
            .set({ attempts, lastError: error })
            .where(matchRef(ref))
            .run();

          if (attempts >= maxAttempts) {
            transition(tx, ref, "failed", {});
            failed.push(ref);
          } else {
            remaining.push(ref);
          }
        }

        return { failed, remaining };
      });
    },

    /** Items in the given state(s), oldest first (insertion = fetch order). */
    listByState(
      state: ItemState | ReadonlyArray<ItemState>,
      limit?: number,
    ): Array<Item> {
      const states = typeof state === "string" ? [state] : [...state];
      const query = db
        .select()
        .from(items)
        .where(inArray(items.state, states))
        .orderBy(asc(items.id));
      return limit === undefined ? query.all() : query.limit(limit).all();
    },

    listRecent(limit: number, state?: ItemState): Array<Item> {
      return db
        .select()
        .from(items)
        .where(state ? eq(items.state, state) : undefined)
        .orderBy(desc(items.id))
        .limit(limit)
        .all();
    },

    countByState(): Record<ItemState, number> {
      const rows = db
        .select({ state: items.state, count: sql<number>`count(*)` })
        .from(items)
        .groupBy(items.state)
        .all();

      const counts: Record<ItemState, number> = {
        new: 0,
        summarized: 0,
        posted: 0,
        failed: 0,
      };
      for (const row of rows) {
        counts[row.state] = row.count;
      }
      return counts;
    },
  };
}
