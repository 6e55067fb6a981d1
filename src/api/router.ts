// pattern: Imperative Shell
import { router } from "./trpc";
import { controlRouter } from "./routers/control";
import { itemsRouter } from "./routers/items";
import { cyclesRouter } from "./routers/cycles";
import { sourcesRouter } from "./routers/sources";

/**
 * Root tRPC router combining the control surface and the read-only views of
 * items, cycles and sources.
 */
export const appRouter = router({
  control: controlRouter,
  items: itemsRouter,
  cycles: cyclesRouter,
  sources: sourcesRouter,
});

export type AppRouter = typeof appRouter;
