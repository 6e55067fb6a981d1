// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents an object with a stop method for graceful shutdown.
 */
export type Stoppable = {
  readonly stop: () => void;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  /** Resolves once in-flight work has settled; awaited before the DB closes. */
  readonly drain?: () => Promise<void>;
  readonly closeServer?: () => void;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

export type Shutdown = (reason: string, exitCode?: number) => Promise<void>;

/**
 * Builds the shutdown routine.
 *
 * - Guards against double shutdown (re-entrant signal delivery)
 * - Stops schedulers, waits for the in-flight cycle, then closes the server
 *   and the database
 * - Each cleanup step is isolated so a failing step does not skip the rest
 * - Exits with `exitCode` (0 for signals, 1 for fatal errors)
 */
export function createShutdown(deps: ShutdownDeps): Shutdown {
  let shuttingDown = false;

  return async (reason, exitCode = 0) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ reason, exitCode }, "shutdown started");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    if (deps.drain) {
      try {
        await deps.drain();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error waiting for in-flight cycle");
      }
    }

    if (deps.closeServer) {
      try {
        deps.closeServer();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error closing api server");
      }
    }

    try {
      deps.closeDb();
      deps.logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing database");
    }

    deps.logger.info("shutdown complete");
    process.exit(exitCode);
  };
}

/**
 * Registers SIGTERM and SIGINT handlers that run the shutdown routine.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): Shutdown {
  const shutdown = createShutdown(deps);

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      deps.logger.fatal({ error: String(err) }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  return shutdown;
}
