// pattern: Imperative Shell
import { z } from "zod";
import { router, adminProcedure } from "../trpc";

const limitSchema = z.number().int().positive().max(200).default(20);

export const cyclesRouter = router({
  recent: adminProcedure
    .input(z.object({ limit: limitSchema }))
    .query(({ ctx, input }) => ctx.cycles.recent(input.limit)),

  posts: adminProcedure
    .input(z.object({ limit: limitSchema }))
    .query(({ ctx, input }) => ctx.cycles.recentPosts(input.limit)),
});
