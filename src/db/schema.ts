import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Enums ----------

export const itemStates = ["new", "summarized", "posted", "failed"] as const;
export type ItemState = (typeof itemStates)[number];

export const cycleOutcomes = ["ok", "partial", "failed"] as const;
export type CycleOutcome = (typeof cycleOutcomes)[number];

export const cycleTriggers = ["schedule", "manual", "startup"] as const;
export type CycleTrigger = (typeof cycleTriggers)[number];

// ---------- Tables ----------

export const sources = sqliteTable("sources", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  kind: text("kind", { enum: ["rss", "html"] }).notNull(),
  url: text("url").notNull(),
  enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
  lastFetchedAt: integer("last_fetched_at", { mode: "timestamp" }),
  lastError: text("last_error"),
  createdAt: integer("created_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

export const cycles = sqliteTable(
  "cycles",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    trigger: text("trigger", { enum: cycleTriggers }).notNull(),
    startedAt: integer("started_at", { mode: "timestamp" }).notNull(),
    finishedAt: integer("finished_at", { mode: "timestamp" }),
    outcome: text("outcome", { enum: cycleOutcomes }),
    itemsConsidered: integer("items_considered").notNull().default(0),
    itemsPosted: integer("items_posted").notNull().default(0),
    sourcesFailed: integer("sources_failed").notNull().default(0),
    batchesFailed: integer("batches_failed").notNull().default(0),
    error: text("error"),
  },
  (table) => ({
    finishedAtIdx: index("cycles_finished_at_idx").on(table.finishedAt),
  }),
);

export const posts = sqliteTable("posts", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  cycleId: integer("cycle_id")
    .notNull()
    .references(() => cycles.id),
  messageId: text("message_id").notNull(),
  text: text("text").notNull(),
  itemCount: integer("item_count").notNull(),
  postedAt: integer("posted_at", { mode: "timestamp" }).notNull(),
});

export const items = sqliteTable(
  "items",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sourceId: text("source_id")
      .notNull()
      .references(() => sources.id),
    itemKey: text("item_key").notNull(),
    title: text("title"),
    url: text("url"),
    excerpt: text("excerpt"),
    publishedAt: integer("published_at", { mode: "timestamp" }),
    metadata: text("metadata", { mode: "json" })
      .$type<Record<string, unknown>>()
      .notNull(),
    state: text("state", { enum: itemStates }).notNull().default("new"),
    attempts: integer("attempts").notNull().default(0),
    lastError: text("last_error"),
    fetchedAt: integer("fetched_at", { mode: "timestamp" }).notNull(),
    summarizedAt: integer("summarized_at", { mode: "timestamp" }),
    postedAt: integer("posted_at", { mode: "timestamp" }),
    postId: integer("post_id").references(() => posts.id),
  },
  (table) => ({
    sourceKeyIdx: uniqueIndex("items_source_key_idx").on(
      table.sourceId,
      table.itemKey,
    ),
    stateIdx: index("items_state_idx").on(table.state),
  }),
);

export type SourceRow = typeof sources.$inferSelect;
export type ItemRow = typeof items.$inferSelect;
export type CycleRow = typeof cycles.$inferSelect;
export type PostRow = typeof posts.$inferSelect;
