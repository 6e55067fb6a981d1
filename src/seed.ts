import { eq, notInArray } from "drizzle-orm";
import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { sources } from "./db/schema";

/**
 * Syncs the configured sources into the `sources` table.
 *
 * Configuration is authoritative: new sources are inserted, existing ones
 * get their name, kind, url and enabled flag refreshed, and sources that
 * were removed from the config are disabled (their items are kept so the
 * dedup history survives).
 */
export function seedSources(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
): void {
  const configuredIds = config.sources.map((s) => s.id);

  db.transaction((tx) => {
    for (const source of config.sources) {
      tx.insert(sources)
        .values({
          id: source.id,
          name: source.name,
          kind: source.kind,
          url: source.url,
          enabled: source.enabled,
        })
        .onConflictDoUpdate({
          target: sources.id,
          set: {
            name: source.name,
            kind: source.kind,
            url: source.url,
            enabled: source.enabled,
          },
        })
        .run();
    }

    const retired = tx
      .update(sources)
      .set({ enabled: false })
      .where(notInArray(sources.id, configuredIds))
      .returning({ id: sources.id })
      .all();

    if (retired.length > 0) {
      logger.info(
        { sourceIds: retired.map((r) => r.id) },
        "disabled sources no longer in config",
      );
    }
  });

  const enabledCount = db
    .select({ id: sources.id })
    .from(sources)
    .where(eq(sources.enabled, true))
    .all().length;

  logger.info(
    { configured: configuredIds.length, enabled: enabledCount },
    "sources synced from config",
  );
}
