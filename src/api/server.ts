// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppServices } from "./context";

export function readBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1]?.trim() || null;
}

/**
 * Creates an Express app with the tRPC control API mounted at `/api/trpc`
 * and an unauthenticated `/health` endpoint.
 *
 * @returns Configured Express app, not yet listening
 */
export function createApiServer(services: AppServices): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: ({ req }) => ({
        ...services,
        requestToken: readBearerToken(req.headers.authorization),
      }),
    }),
  );

  app.get("/health", (_req, res) => {
    const status = services.scheduler.status();
    res.status(status.stopped ? 503 : 200).json({
      status: status.stopped ? "stopped" : "ok",
      paused: status.paused,
    });
  });

  return app;
}
