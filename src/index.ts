import { resolve } from "node:path";
import { createLogger } from "./logger";
import { ConfigError, loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase, migrateDatabase } from "./db";
import { createLlmClient } from "./llm/providers";
import { createCompletion } from "./llm/completion";
import { createTelegramSender } from "./channel/telegram";
import { seedSources } from "./seed";
import { createItemStore } from "./store/items";
import { createCycleLog } from "./store/cycles";
import { createSourceRegistry } from "./store/sources";
import { createSourceAdapters } from "./sources";
import { createExternalCallPolicy } from "./pipeline/retry";
import { createSummarizer } from "./pipeline/summarizer";
import { createPublisher } from "./pipeline/publisher";
import { reconcile, runCycle } from "./pipeline/orchestrator";
import { createCycleScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";
import { errorMessage } from "./errors";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/news-relay.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("news-relay starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      err instanceof ConfigError
        ? { configPath: err.configPath, issues: err.issues, error: err.message }
        : { error: errorMessage(err) },
      "configuration error",
    );
    process.exit(1);
  }

  const botToken = process.env["TELEGRAM_BOT_TOKEN"];
  if (!botToken) {
    logger.fatal("TELEGRAM_BOT_TOKEN not set");
    process.exit(1);
  }

  const adminToken = process.env["ADMIN_TOKEN"] ?? null;
  if (!adminToken) {
    logger.warn("ADMIN_TOKEN not set, control API will refuse every request");
  }

  logger.info(
    { provider: config.llm.provider, model: config.llm.model, sources: config.sources.length },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));
  migrateDatabase(db);
  logger.info("database migrations applied");

  seedSources(db, config, logger);

  const items = createItemStore(db);
  const cycles = createCycleLog(db);
  const sourceRegistry = createSourceRegistry(db);

  reconcile({ items, cycles, logger });

  const model = createLlmClient(config);
  const summarizer = createSummarizer({
    complete: createCompletion(model, { timeoutMs: config.llm.timeoutMs }),
    policy: createExternalCallPolicy(config.retry.llm),
    maxOutputChars: config.llm.maxOutputChars,
    maxInputChars: config.batch.maxChars,
    systemPrompt: config.llm.systemPrompt,
  });
  logger.info(
    { provider: config.llm.provider, model: config.llm.model },
    "llm client initialised",
  );

  const publisher = createPublisher(
    createTelegramSender({
      botToken,
      chatId: config.channel.chatId,
      timeoutMs: config.channel.timeoutMs,
      disableWebPagePreview: config.channel.disableWebPagePreview,
      onTruncate: (length) =>
        logger.warn({ length }, "summary exceeds telegram limit, truncated"),
    }),
    createExternalCallPolicy(config.retry.channel),
  );

  const sources = createSourceAdapters(config.sources, {
    timeoutMs: config.fetch.timeoutMs,
  });

  let onFatal: (err: unknown) => void = () => undefined;

  const scheduler = createCycleScheduler({
    schedule: config.schedule.poll,
    logger,
    onFatal: (err) => onFatal(err),
    runCycle: (trigger, onPhase) =>
      runCycle(
        {
          items,
          cycles,
          sourceRegistry,
          sources,
          summarizer,
          publisher,
          config,
          logger,
          onPhase,
        },
        trigger,
      ),
  });
  logger.info({ schedule: config.schedule.poll }, "cycle scheduler started");

  const app = createApiServer({
    items,
    cycles,
    sources: sourceRegistry,
    scheduler,
    config,
    logger,
    adminToken,
  });
  const server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });

  const shutdown = registerShutdownHandlers({
    schedulers: [scheduler],
    drain: () => scheduler.idle(),
    closeServer: () => server.close(),
    closeDb,
    logger,
  });

  onFatal = () => {
    shutdown("fatal store error", 1).catch((err: unknown) => {
      logger.fatal({ error: String(err) }, "shutdown failed");
      process.exit(1);
    });
  };

  if (config.schedule.runOnStart) {
    await scheduler.runOnce("startup");
  }
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
