import pino from "pino";
import { createDatabase, migrateDatabase } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { sources } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import type { CycleScheduler } from "../scheduler";
import { createItemStore } from "../store/items";
import type { NewItem } from "../store/items";
import { createCycleLog } from "../store/cycles";
import { createSourceRegistry } from "../store/sources";

export const TEST_ADMIN_TOKEN = "test-secret";

/**
 * Creates an in-memory SQLite test database with all migrations applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  migrateDatabase(db, "./drizzle");
  return db;
}

/**
 * Seeds a test source row and returns its id.
 */
export function seedTestSource(
  db: AppDatabase,
  overrides?: Partial<typeof sources.$inferInsert>,
): string {
  const result = db
    .insert(sources)
    .values({
      id: "test-source",
      name: "Test Source",
      kind: "rss",
      url: "https://example.com/rss",
      ...overrides,
    })
    .returning({ id: sources.id })
    .get();

  return result.id;
}

/** A `NewItem` with placeholder content, keyed by `itemKey`. */
export function testItem(
  sourceId: string,
  itemKey: string,
  overrides?: Partial<NewItem>,
): NewItem {
  return {
    sourceId,
    itemKey,
    title: `Item ${itemKey}`,
    url: `https://example.com/${itemKey}`,
    excerpt: null,
    publishedAt: null,
    metadata: {},
    ...overrides,
  };
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(): AppConfig {
  return {
    llm: {
      provider: "anthropic",
      model: "claude-3-5-sonnet-20241022",
      timeoutMs: 60000,
      maxOutputChars: 3500,
    },
    sources: [
      {
        id: "test-source",
        kind: "rss",
        name: "Test Source",
        url: "https://example.com/rss",
        enabled: true,
      },
    ],
    channel: {
      chatId: "@test-channel",
      disableWebPagePreview: true,
      timeoutMs: 15000,
    },
    schedule: {
      poll: "*/15 * * * *",
      runOnStart: false,
    },
    fetch: { maxConcurrency: 2, timeoutMs: 15000 },
    batch: { maxItems: 10, maxChars: 12000 },
    retry: {
      llm: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
      channel: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    },
    items: { maxAttempts: 5 },
    filter: { keywords: [] },
  };
}

/**
 * Scheduler stand-in that records control calls without running cycles.
 */
export function createStubScheduler(): CycleScheduler & {
  readonly calls: Array<string>;
} {
  const calls: Array<string> = [];
  let paused = false;

  return {
    calls,
    stop: () => {
      calls.push("stop");
    },
    pause: () => {
      calls.push("pause");
      paused = true;
    },
    resume: () => {
      calls.push("resume");
      paused = false;
    },
    triggerNow: () => {
      calls.push("triggerNow");
      return { accepted: true, queued: false, message: "cycle started" };
    },
    runOnce: async () => null,
    idle: async () => undefined,
    status: () => ({
      schedule: "*/15 * * * *",
      paused,
      running: false,
      stopped: false,
      queued: null,
      phase: "idle",
      lastReport: null,
      lastFatalError: null,
    }),
  };
}

export type TestCallerOptions = {
  readonly requestToken?: string | null;
  readonly adminToken?: string | null;
  readonly scheduler?: CycleScheduler;
  readonly config?: AppConfig;
};

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 * By default the caller presents the configured admin token.
 */
export function createTestCaller(
  db: AppDatabase,
  options: TestCallerOptions = {},
) {
  const createCaller = createCallerFactory(appRouter);
  const adminToken =
    options.adminToken === undefined ? TEST_ADMIN_TOKEN : options.adminToken;
  const requestToken =
    options.requestToken === undefined ? TEST_ADMIN_TOKEN : options.requestToken;

  return createCaller({
    items: createItemStore(db),
    cycles: createCycleLog(db),
    sources: createSourceRegistry(db),
    scheduler: options.scheduler ?? createStubScheduler(),
    config: options.config ?? createTestConfig(),
    logger: pino({ level: "silent" }),
    adminToken,
    requestToken,
  });
}
