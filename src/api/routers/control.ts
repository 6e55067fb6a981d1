// pattern: Imperative Shell
import { router, adminProcedure } from "../trpc";
import type { AppContext } from "../context";

function buildStatus(ctx: AppContext) {
  const scheduler = ctx.scheduler.status();
  const lastCycle = ctx.cycles.recent(1)[0] ?? null;

  return {
    ...scheduler,
    lastCycle,
    itemCounts: ctx.items.countByState(),
    provider: ctx.config.llm.provider,
    model: ctx.config.llm.model,
    sourceCount: ctx.config.sources.length,
  };
}

/**
 * Administrator control surface. Every mutation goes through the scheduler,
 * whose single-cycle lock serializes it against running cycles.
 */
export const controlRouter = router({
  status: adminProcedure.query(({ ctx }) => buildStatus(ctx)),

  pause: adminProcedure.mutation(({ ctx }) => {
    ctx.scheduler.pause();
    ctx.logger.info("pause requested via control API");
    return buildStatus(ctx);
  }),

  resume: adminProcedure.mutation(({ ctx }) => {
    ctx.scheduler.resume();
    ctx.logger.info("resume requested via control API");
    return buildStatus(ctx);
  }),

  trigger: adminProcedure.mutation(({ ctx }) => {
    const result = ctx.scheduler.triggerNow();
    ctx.logger.info({ ...result }, "manual trigger requested via control API");
    return result;
  }),
});
