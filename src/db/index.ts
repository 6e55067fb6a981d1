// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { migrate } from "drizzle-orm/better-sqlite3/migrator";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

const MEMORY = ":memory:";

/**
 * Opens the SQLite database that backs the item store and cycle log.
 * WAL journaling with `synchronous = FULL` so every committed write is on
 * disk before the statement returns.
 */
export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  if (dbPath !== MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("synchronous = FULL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma("busy_timeout = 5000");

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

/** Applies the SQL migrations under `migrationsFolder` (default `./drizzle`). */
export function migrateDatabase(
  db: AppDatabase,
  migrationsFolder: string = resolve("./drizzle"),
): void {
  migrate(db, { migrationsFolder });
}

export type DatabaseResult = ReturnType<typeof createDatabase>;
export type AppDatabase = BetterSQLite3Database<typeof schema>;
