// pattern: Imperative Shell
import { z } from "zod";
import { router, adminProcedure } from "../trpc";
import { itemStates } from "../../db/schema";

const limitSchema = z.number().int().positive().max(500).default(50);

export const itemsRouter = router({
  list: adminProcedure
    .input(
      z.object({
        state: z.enum(itemStates).optional(),
        limit: limitSchema,
      }),
    )
    .query(({ ctx, input }) => ctx.items.listRecent(input.limit, input.state)),

  /** Items given up on, with the error that caused it. */
  failed: adminProcedure
    .input(z.object({ limit: limitSchema }))
    .query(({ ctx, input }) => ctx.items.listRecent(input.limit, "failed")),
});
